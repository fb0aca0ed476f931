/**
 * Entity Linker - maps spans of a student's question to knowledge graph nodes
 */
import { KnowledgeGraph } from '../knowledge-graph';
import { EntityMatch } from '../types/knowledge';
import { Token, contentTokens, normalizeText } from '../utils/text';

/**
 * An n-gram of content tokens. Its text is rebuilt as "first second ...",
 * so it keeps the source offset of each token to map match offsets back.
 */
interface Candidate {
  text: string;
  tokens: Token[];
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class EntityLinker {
  constructor(private readonly graph: KnowledgeGraph) {}

  /**
   * Link an utterance to graph entities.
   *
   * Candidates are the n-grams of the utterance's content tokens, up to the
   * word count of the graph's longest name or alias key. Each node is reported
   * once, with its highest-confidence match.
   * @returns Matches by confidence desc, then position in the utterance
   */
  link(utteranceText: string): EntityMatch[] {
    const best = new Map<string, EntityMatch>();

    for (const candidate of this.candidates(utteranceText)) {
      for (const match of this.graph.findByName(candidate.text)) {
        const located: EntityMatch = {
          ...match,
          // A match on the whole candidate reports the words as spoken, stop words included
          matchedSpan: match.matchedSpan === candidate.text ? sourceSpan(utteranceText, candidate) : match.matchedSpan,
          offset: sourceOffset(candidate, match.offset),
        };

        const current = best.get(located.nodeId);
        if (!current ||
            located.confidence > current.confidence ||
            (located.confidence === current.confidence && located.offset < current.offset)) {
          best.set(located.nodeId, located);
        }
      }
    }

    return [...best.values()].sort((a, b) =>
      b.confidence - a.confidence ||
      a.offset - b.offset ||
      compareIds(a.nodeId, b.nodeId),
    );
  }

  private candidates(text: string): Candidate[] {
    const tokens = contentTokens(text);
    const candidates: Candidate[] = [];

    for (let size = Math.min(this.graph.longestKeyTokens, tokens.length); size >= 1; size--) {
      for (let i = 0; i + size <= tokens.length; i++) {
        const run = tokens.slice(i, i + size);
        candidates.push({ text: run.map(token => token.text).join(' '), tokens: run });
      }
    }

    return candidates;
  }
}

function sourceSpan(text: string, candidate: Candidate): string {
  const first = candidate.tokens[0];
  const last = candidate.tokens[candidate.tokens.length - 1];
  return normalizeText(text.slice(first.offset, last.offset + last.text.length));
}

/**
 * Map an offset inside the candidate text to an offset in the utterance
 */
function sourceOffset(candidate: Candidate, offset: number): number {
  let start = 0;
  for (let i = 0; i < candidate.tokens.length; i++) {
    const token = candidate.tokens[i];
    const end = start + token.text.length;
    if (offset < end || i === candidate.tokens.length - 1) {
      return token.offset + Math.max(0, offset - start);
    }
    start = end + 1;
  }
  return 0;
}
