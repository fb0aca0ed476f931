/**
 * Knowledge Graph - immutable typed graph of educational entities
 *
 * Built once at start-up from the knowledge base file and shared read-only by
 * every session. Exposes lookup by name/alias, free-text search and
 * bounded-depth traversal of outgoing relationships.
 */
import { promises as fs } from 'fs';
import {
  EntityMatch,
  GraphStats,
  KnowledgeNode,
  KnowledgeNodeInput,
  KnowledgeRecord,
  PropertyValue,
  RelatedNode,
  Relationship,
} from '../types/knowledge';
import { IntegrityError, NotFoundError } from '../errors';
import { SchemaValidationError, validateKnowledgeBaseRecords } from '../utils/schema-validator';
import { contentTokens, indexOfWord, normalizeText, tokenize, isStopWord } from '../utils/text';
import { logger } from '../utils/logger';

// Confidence model shared with the entity linker
export const EXACT_CONFIDENCE = 1.0;
export const ALIAS_CONFIDENCE = 0.9;
export const MIN_SUBSTRING_CONFIDENCE = 0.5;
export const MAX_SUBSTRING_CONFIDENCE = 0.9;

// Substring queries shorter than this would match almost every node
export const MIN_SUBSTRING_LENGTH = 3;

// Search scoring weights
const SCORE_EXACT_NAME = 10;
const SCORE_NAME_TERM = 3;
const SCORE_SUMMARY_TERM = 2;
const SCORE_DESCRIPTION_TERM = 1;
const SCORE_PROPERTY_TERM = 1;

const DEFAULT_TOP_K = 5;

export interface KnowledgeGraphOptions {
  /** Default result limit of `search` */
  searchTopK?: number;
}

/** Per-node lookup data, derived at load time */
interface IndexedNode {
  node: KnowledgeNode;
  name: string;
  /** Name with stop words removed: "theory of evolution" is keyed "theory evolution" */
  nameKey: string;
  /** Stop-word-free key of each alias, mapped to the alias */
  aliasKeys: Map<string, string>;
  summary: string;
  description: string;
  propertyText: string[];
}

export function substringConfidence(matchedLength: number, nameLength: number): number {
  const ratio = nameLength > 0 ? matchedLength / nameLength : 0;
  const confidence = MIN_SUBSTRING_CONFIDENCE + 0.4 * ratio;
  return Math.min(MAX_SUBSTRING_CONFIDENCE, Math.max(MIN_SUBSTRING_CONFIDENCE, confidence));
}

/**
 * Aliases derived from the content tokens of the entity name, plus explicit ones.
 * "Cellular Respiration" yields ["cellular", "respiration"].
 */
export function deriveAliases(entity: string, explicit: readonly string[] = []): string[] {
  const name = normalizeText(entity);
  const aliases = new Set<string>();

  for (const alias of explicit) {
    const normalized = normalizeText(alias);
    if (normalized && normalized !== name) aliases.add(normalized);
  }

  for (const token of tokenize(entity)) {
    if (token.text.length >= MIN_SUBSTRING_LENGTH && !isStopWord(token.text) && token.text !== name) {
      aliases.add(token.text);
    }
  }

  return [...aliases].sort();
}

/**
 * The content tokens of `text` joined by single spaces, the form in which the
 * entity linker looks up a question
 */
export function contentKey(text: string): string {
  return contentTokens(text).map(token => token.text).join(' ');
}

function freezeProperties(properties: Record<string, PropertyValue>): Readonly<Record<string, PropertyValue>> {
  const copy: Record<string, PropertyValue> = {};
  for (const [key, value] of Object.entries(properties)) {
    copy[key] = typeof value === 'object' ? Object.freeze([...value]) : value;
  }
  return Object.freeze(copy);
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class KnowledgeGraph {
  private readonly indexed: Map<string, IndexedNode>;
  private readonly adjacency: Map<string, readonly Relationship[]>;
  private readonly relationshipCount: number;
  private readonly searchTopK: number;
  private readonly keyTokens: number;

  private constructor(
    indexed: Map<string, IndexedNode>,
    adjacency: Map<string, readonly Relationship[]>,
    options: KnowledgeGraphOptions,
  ) {
    this.indexed = indexed;
    this.adjacency = adjacency;
    this.searchTopK = options.searchTopK ?? DEFAULT_TOP_K;

    let count = 0;
    for (const edges of adjacency.values()) count += edges.length;
    this.relationshipCount = count;

    let longest = 1;
    for (const entry of indexed.values()) {
      for (const key of [entry.nameKey, ...entry.node.aliases.map(contentKey)]) {
        longest = Math.max(longest, key.split(' ').length);
      }
    }
    this.keyTokens = longest;
  }

  /**
   * Build the graph from node data and directed relationships
   * @throws IntegrityError on duplicate node ids or dangling relationship endpoints
   */
  static load(
    nodes: readonly KnowledgeNodeInput[],
    relationships: readonly Relationship[],
    options: KnowledgeGraphOptions = {},
  ): KnowledgeGraph {
    const issues: string[] = [];
    const indexed = new Map<string, IndexedNode>();

    for (const input of nodes) {
      if (indexed.has(input.id)) {
        issues.push(`duplicate node id '${input.id}'`);
        continue;
      }

      const properties = freezeProperties(input.properties ?? {});
      const node: KnowledgeNode = Object.freeze({
        id: input.id,
        entity: input.entity,
        type: input.type,
        summary: input.summary,
        description: input.description,
        properties,
        aliases: Object.freeze(deriveAliases(input.entity, input.aliases)),
      });

      const aliasKeys = new Map<string, string>();
      for (const alias of node.aliases) {
        const key = contentKey(alias);
        if (key && key !== alias && !aliasKeys.has(key)) aliasKeys.set(key, alias);
      }

      indexed.set(node.id, {
        node,
        name: normalizeText(node.entity),
        nameKey: contentKey(node.entity),
        aliasKeys,
        summary: node.summary.toLowerCase(),
        description: node.description.toLowerCase(),
        propertyText: Object.values(properties)
          .flatMap(value => (typeof value === 'object' ? [...value] : [String(value)]))
          .map(value => value.toLowerCase()),
      });
    }

    const edges = new Map<string, Relationship[]>();
    for (const rel of relationships) {
      if (!indexed.has(rel.sourceId)) {
        issues.push(`relationship '${rel.relationType}' has unknown source '${rel.sourceId}'`);
        continue;
      }
      if (!indexed.has(rel.targetId)) {
        issues.push(`relationship '${rel.relationType}' from '${rel.sourceId}' has unknown target '${rel.targetId}'`);
        continue;
      }

      const list = edges.get(rel.sourceId) ?? [];
      list.push(Object.freeze({ ...rel }));
      edges.set(rel.sourceId, list);
    }

    if (issues.length > 0) {
      logger.error({ issues }, 'Knowledge base failed integrity checks');
      throw new IntegrityError(`Knowledge base has ${issues.length} integrity problem(s)`, issues);
    }

    const adjacency = new Map<string, readonly Relationship[]>();
    for (const [sourceId, list] of edges) {
      adjacency.set(sourceId, Object.freeze(list));
    }

    const graph = new KnowledgeGraph(indexed, adjacency, options);
    logger.info({
      entities: graph.size,
      relationships: graph.relationshipCount,
    }, 'Knowledge graph loaded');

    return graph;
  }

  /**
   * Validate records in the knowledge base load format and build the graph
   * @throws IntegrityError if any record is malformed or inconsistent
   */
  static fromRecords(data: unknown, options: KnowledgeGraphOptions = {}): KnowledgeGraph {
    let records: KnowledgeRecord[];
    try {
      records = validateKnowledgeBaseRecords(data);
    } catch (err) {
      if (err instanceof SchemaValidationError) {
        throw new IntegrityError(
          'Knowledge base does not match its schema',
          err.errors.map(e => `${e.path}: ${e.message}`),
          { cause: err },
        );
      }
      throw err;
    }

    const nodes: KnowledgeNodeInput[] = records.map(record => ({
      id: record.id,
      entity: record.entity,
      type: record.type,
      summary: record.summary,
      description: record.description,
      properties: record.properties,
      aliases: record.aliases,
    }));

    const relationships: Relationship[] = records.flatMap(record =>
      record.relationships.map(rel => ({
        sourceId: record.id,
        targetId: rel.target_id,
        relationType: rel.relation_type,
        description: rel.description,
      })),
    );

    return KnowledgeGraph.load(nodes, relationships, options);
  }

  get size(): number {
    return this.indexed.size;
  }

  getNode(id: string): KnowledgeNode | undefined {
    return this.indexed.get(id)?.node;
  }

  /** Word count of the longest name or alias key; bounds the linker's n-grams */
  get longestKeyTokens(): number {
    return this.keyTokens;
  }

  /** Nodes in load order */
  nodes(): KnowledgeNode[] {
    return [...this.indexed.values()].map(entry => entry.node);
  }

  /**
   * Case-insensitive exact and substring match of `text` against entity names and aliases.
   * A name or alias also matches at its own confidence when `text` is its
   * stop-word-free form.
   * @returns Best match per node; confidence desc, longer span first, then node id
   */
  findByName(text: string): EntityMatch[] {
    const query = normalizeText(text);
    if (!query) return [];

    const matches: EntityMatch[] = [];
    for (const entry of this.indexed.values()) {
      const match = this.matchNode(entry, query);
      if (match) matches.push(match);
    }

    return matches.sort((a, b) =>
      b.confidence - a.confidence ||
      b.matchedSpan.length - a.matchedSpan.length ||
      compareIds(a.nodeId, b.nodeId),
    );
  }

  private matchNode(entry: IndexedNode, query: string): EntityMatch | null {
    const { node, name } = entry;

    // Exact name, or the full name appearing as words inside the query
    if (query === name) {
      return { nodeId: node.id, matchedSpan: query, offset: 0, confidence: EXACT_CONFIDENCE };
    }
    const nameAt = indexOfWord(query, name);
    if (nameAt !== -1) {
      return { nodeId: node.id, matchedSpan: name, offset: nameAt, confidence: EXACT_CONFIDENCE };
    }
    if (query === entry.nameKey) {
      return { nodeId: node.id, matchedSpan: query, offset: 0, confidence: EXACT_CONFIDENCE };
    }

    // Alias equal to, or contained in, the query; longest alias wins
    let aliasMatch: EntityMatch | null = null;
    for (const alias of node.aliases) {
      const at = alias === query ? 0 : indexOfWord(query, alias);
      if (at !== -1 && (!aliasMatch || alias.length > aliasMatch.matchedSpan.length)) {
        aliasMatch = { nodeId: node.id, matchedSpan: alias, offset: at, confidence: ALIAS_CONFIDENCE };
      }
    }
    if (aliasMatch) return aliasMatch;
    if (entry.aliasKeys.has(query)) {
      return { nodeId: node.id, matchedSpan: query, offset: 0, confidence: ALIAS_CONFIDENCE };
    }

    // The query as a fragment of the name or of an alias
    if (query.length >= MIN_SUBSTRING_LENGTH &&
        (name.includes(query) || node.aliases.some(alias => alias.includes(query)))) {
      return {
        nodeId: node.id,
        matchedSpan: query,
        offset: 0,
        confidence: substringConfidence(query.length, name.length),
      };
    }

    return null;
  }

  /**
   * Free-text search across names, summaries, descriptions and property values
   * @param topK Result limit, defaults to the graph's configured limit
   */
  search(query: string, topK: number = this.searchTopK): KnowledgeNode[] {
    const normalized = normalizeText(query);
    if (!normalized || topK <= 0) return [];

    const terms = [...new Set(tokenize(normalized)
      .map(token => token.text)
      .filter(term => !isStopWord(term)))];

    const scored: { node: KnowledgeNode; score: number }[] = [];
    for (const entry of this.indexed.values()) {
      const score = this.scoreNode(entry, normalized, terms);
      if (score > 0) scored.push({ node: entry.node, score });
    }

    return scored
      .sort((a, b) => b.score - a.score || compareIds(a.node.id, b.node.id))
      .slice(0, topK)
      .map(result => result.node);
  }

  private scoreNode(entry: IndexedNode, query: string, terms: string[]): number {
    let score = 0;

    if (query === entry.name || entry.node.aliases.includes(query)) {
      score += SCORE_EXACT_NAME;
    }

    for (const term of terms) {
      if (entry.name.includes(term)) score += SCORE_NAME_TERM;
      if (entry.summary.includes(term)) score += SCORE_SUMMARY_TERM;
      if (entry.description.includes(term)) score += SCORE_DESCRIPTION_TERM;
      if (entry.propertyText.some(value => value.includes(term))) score += SCORE_PROPERTY_TERM;
    }

    return score;
  }

  /**
   * Breadth-first traversal of outgoing relationships, at most `maxDepth` hops.
   * Each node is returned once, paired with the edge that first reached it;
   * the start node is never returned.
   * @throws NotFoundError if `nodeId` is not in the graph
   */
  relatedTo(nodeId: string, maxDepth: number): RelatedNode[] {
    if (!this.indexed.has(nodeId)) {
      throw new NotFoundError(nodeId);
    }

    const related: RelatedNode[] = [];
    const visited = new Set<string>([nodeId]);
    const queue: { id: string; depth: number }[] = [{ id: nodeId, depth: 0 }];

    for (let head = 0; head < queue.length; head++) {
      const { id, depth } = queue[head];
      if (depth >= maxDepth) continue;

      for (const relationship of this.adjacency.get(id) ?? []) {
        if (visited.has(relationship.targetId)) continue;
        visited.add(relationship.targetId);

        const target = this.indexed.get(relationship.targetId);
        if (!target) continue;

        related.push({ node: target.node, relationship, depth: depth + 1 });
        queue.push({ id: relationship.targetId, depth: depth + 1 });
      }
    }

    return related;
  }

  /** Outgoing relationships of a node, in load order */
  relationshipsOf(nodeId: string): readonly Relationship[] {
    if (!this.indexed.has(nodeId)) {
      throw new NotFoundError(nodeId);
    }
    return this.adjacency.get(nodeId) ?? [];
  }

  stats(): GraphStats {
    const entityTypes: Record<string, number> = {};
    for (const { node } of this.indexed.values()) {
      entityTypes[node.type] = (entityTypes[node.type] ?? 0) + 1;
    }

    return {
      totalEntities: this.size,
      entityTypes,
      totalRelationships: this.relationshipCount,
      averageRelationshipsPerEntity: this.size > 0 ? this.relationshipCount / this.size : 0,
    };
  }
}

/**
 * Read the knowledge base file and build the graph. Fails fast: no partial graph.
 * @throws IntegrityError if the file is unreadable, not JSON, or malformed
 */
export async function loadKnowledgeBase(
  path: string,
  options: KnowledgeGraphOptions = {},
): Promise<KnowledgeGraph> {
  logger.info({ path }, 'Loading knowledge base');

  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (err) {
    throw new IntegrityError(`Cannot read knowledge base at ${path}`, [], { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new IntegrityError(`Knowledge base at ${path} is not valid JSON`, [], { cause: err });
  }

  return KnowledgeGraph.fromRecords(data, options);
}
