/**
 * Session Registry - one analytics log and pipeline per tutoring session
 */
import { v4 as uuidv4 } from 'uuid';
import { KnowledgeGraph } from '../knowledge-graph';
import { EntityLinker } from '../entity-linker';
import { AssistantPipeline, AssistantPipelineOptions } from '../pipeline';
import { Collaborators } from '../collaborators/types';
import { GeneralStats } from '../types/interaction';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';
import { StudentAnalytics } from './index';

export interface TutorSession {
  sessionId: string;
  analytics: StudentAnalytics;
  pipeline: AssistantPipeline;
}

export interface SessionRegistryDeps {
  graph: KnowledgeGraph;
  collaborators: Collaborators;
  pipelineOptions: AssistantPipelineOptions;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, TutorSession>();
  private readonly linker: EntityLinker;

  constructor(private readonly deps: SessionRegistryDeps) {
    this.linker = new EntityLinker(deps.graph);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Return the session, creating it when the id is new or omitted */
  open(sessionId: string = uuidv4()): TutorSession {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const analytics = new StudentAnalytics(sessionId);
    const pipeline = new AssistantPipeline(
      {
        graph: this.deps.graph,
        linker: this.linker,
        collaborators: this.deps.collaborators,
        analytics,
      },
      this.deps.pipelineOptions,
    );

    const session: TutorSession = { sessionId, analytics, pipeline };
    this.sessions.set(sessionId, session);
    metrics.activeSessions.set(this.sessions.size);
    logger.info({ sessionId }, 'Session opened');
    return session;
  }

  get(sessionId: string): TutorSession | undefined {
    return this.sessions.get(sessionId);
  }

  sessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * Destroy a session and its history
   * @returns Whether the session existed
   */
  reset(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    session.analytics.reset();
    this.sessions.delete(sessionId);
    metrics.activeSessions.set(this.sessions.size);
    logger.info({ sessionId }, 'Session closed');
    return true;
  }

  generalStats(): GeneralStats {
    const totalSessions = this.sessions.size;
    let totalInteractions = 0;
    for (const session of this.sessions.values()) {
      totalInteractions += session.analytics.interactionCount;
    }

    return {
      totalSessions,
      totalInteractions,
      averageInteractionsPerSession: totalSessions > 0 ? totalInteractions / totalSessions : 0,
    };
  }
}
