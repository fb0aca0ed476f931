/**
 * Session and interaction types
 */
import { LearnerLevel } from '../config';

export interface Interaction {
  readonly id: string;
  readonly sessionId: string;
  /** ISO 8601 time the turn completed */
  readonly timestamp: string;
  readonly queryText: string;
  /** Knowledge node ids, best match first */
  readonly matchedEntities: readonly string[];
  readonly responseText: string;
  /** Estimated level of the question, when the answer was pitched to it */
  readonly complexity?: LearnerLevel;
}

export interface Session {
  readonly sessionId: string;
  /** ISO 8601 time of the first interaction, null until one is recorded */
  startedAt: string | null;
  readonly interactions: Interaction[];
}

export interface AnalyticsSummary {
  topicCounts: Record<string, number>;
  interactionCount: number;
  sessionDurationSeconds: number;
}

export type ComplexityTrend = 'increasing' | 'decreasing' | 'stable';

/** How estimated question levels moved over a session */
export type ComplexityProgression =
  | { trend: 'insufficient_data' }
  | { trend: ComplexityTrend; levels: LearnerLevel[]; mostCommon: LearnerLevel };

export interface SessionInsights {
  topicsDiscussed: string[];
  averageQueryLength: number;
  complexityProgression: ComplexityProgression;
  recommendations: string[];
}

/** Insights plus the parts that need the generation service */
export interface SessionReport extends SessionInsights {
  interactionCount: number;
  sessionDurationSeconds: number;
  knowledgeGaps: string[];
  conversationSummary: string;
}

/**
 * Read-only export of a session for the analytics consumer
 */
export interface SessionSnapshot {
  sessionId: string;
  startedAt: string | null;
  interactions: {
    id: string;
    timestamp: string;
    query: string;
    entities: string[];
    response: string;
    complexity?: LearnerLevel;
  }[];
}

export interface GeneralStats {
  totalSessions: number;
  totalInteractions: number;
  averageInteractionsPerSession: number;
}
