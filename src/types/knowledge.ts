/**
 * Knowledge graph types
 */

/** Scalar or list value of a node property (e.g. `{ "discovered_by": ["Jan Ingenhousz"] }`). */
export type PropertyValue = string | number | boolean | readonly string[];

/**
 * One record of the knowledge base file, as loaded from disk.
 */
export interface KnowledgeRecord {
  id: string;
  entity: string;
  type: string;
  summary: string;
  description: string;
  aliases: string[];
  properties: Record<string, PropertyValue>;
  relationships: {
    target_id: string;
    relation_type: string;
    description: string;
  }[];
}

/** Directed edge, stored on its source node. */
export interface Relationship {
  readonly sourceId: string;
  readonly targetId: string;
  readonly relationType: string;
  readonly description: string;
}

/** Node data accepted by `KnowledgeGraph.load`. Aliases are optional extras. */
export interface KnowledgeNodeInput {
  id: string;
  entity: string;
  type: string;
  summary: string;
  description: string;
  properties?: Record<string, PropertyValue>;
  aliases?: string[];
}

export interface KnowledgeNode {
  readonly id: string;
  readonly entity: string;
  readonly type: string;
  readonly summary: string;
  readonly description: string;
  readonly properties: Readonly<Record<string, PropertyValue>>;
  /** Lower-cased alternate names: explicit aliases plus content tokens of the entity name */
  readonly aliases: readonly string[];
}

export interface EntityMatch {
  readonly nodeId: string;
  /** Lower-cased text of the matched span */
  readonly matchedSpan: string;
  /** Character offset of the span in the text that was matched */
  readonly offset: number;
  /** Confidence in [0, 1] */
  readonly confidence: number;
}

export interface RelatedNode {
  readonly node: KnowledgeNode;
  /** The edge that first reached `node` during traversal */
  readonly relationship: Relationship;
  /** Hops from the start node */
  readonly depth: number;
}

export interface GraphStats {
  totalEntities: number;
  entityTypes: Record<string, number>;
  totalRelationships: number;
  averageRelationshipsPerEntity: number;
}
