/**
 * Student Analytics - the interaction log of one tutoring session
 */
import { v4 as uuidv4 } from 'uuid';
import { LearnerLevel } from '../config';
import {
  AnalyticsSummary,
  ComplexityProgression,
  ComplexityTrend,
  Interaction,
  Session,
  SessionInsights,
  SessionSnapshot,
} from '../types/interaction';
import { validateSessionSnapshotMessage } from '../utils/schema-validator';
import { tokenize } from '../utils/text';
import { logger } from '../utils/logger';

export const BREAK_AFTER_SECONDS = 60 * 60;
export const REPEATED_TOPIC_THRESHOLD = 3;

export const RISING_COMPLEXITY_RECOMMENDATION = "Great progress! You're tackling more complex topics.";
export const FALLING_COMPLEXITY_RECOMMENDATION =
  'Consider revisiting foundational concepts to strengthen your understanding.';

/**
 * Trend of estimated question levels: rising when the session went from a
 * beginner question to an advanced one, falling for the reverse
 */
export function complexityProgression(levels: readonly LearnerLevel[]): ComplexityProgression {
  if (levels.length < 2) return { trend: 'insufficient_data' };

  const first = levels[0];
  const last = levels[levels.length - 1];
  let trend: ComplexityTrend = 'stable';
  if (first === 'beginner' && last === 'advanced') trend = 'increasing';
  if (first === 'advanced' && last === 'beginner') trend = 'decreasing';

  // Most frequent level; ties go to the one asked first
  const counts = new Map<LearnerLevel, number>();
  for (const level of levels) counts.set(level, (counts.get(level) ?? 0) + 1);
  let mostCommon = first;
  for (const [level, count] of counts) {
    if (count > (counts.get(mostCommon) ?? 0)) mostCommon = level;
  }

  return { trend, levels: [...levels], mostCommon };
}

function secondsBetween(from: string, to: string): number {
  return Math.max(0, (Date.parse(to) - Date.parse(from)) / 1000);
}

export class StudentAnalytics {
  private session: Session;

  constructor(sessionId: string = uuidv4()) {
    this.session = { sessionId, startedAt: null, interactions: [] };
  }

  get sessionId(): string {
    return this.session.sessionId;
  }

  get startedAt(): string | null {
    return this.session.startedAt;
  }

  get interactionCount(): number {
    return this.session.interactions.length;
  }

  /**
   * Append an interaction. The same interaction may be recorded twice.
   * @throws Error when the interaction belongs to another session
   */
  record(interaction: Interaction): void {
    if (interaction.sessionId !== this.session.sessionId) {
      throw new Error(
        `Interaction ${interaction.id} belongs to session ${interaction.sessionId}, not ${this.session.sessionId}`,
      );
    }

    if (this.session.startedAt === null) {
      this.session.startedAt = interaction.timestamp;
    }
    this.session.interactions.push(interaction);

    logger.debug({
      sessionId: this.session.sessionId,
      interactionId: interaction.id,
      count: this.session.interactions.length,
    }, 'Interaction recorded');
  }

  /** Most recent interactions, oldest first */
  history(limit?: number): Interaction[] {
    const { interactions } = this.session;
    if (limit === undefined) return [...interactions];
    if (limit <= 0) return [];
    return interactions.slice(-limit);
  }

  summary(): AnalyticsSummary {
    const { interactions, startedAt } = this.session;

    const initial: { topicCounts: Record<string, number>; last: string | null } = { topicCounts: {}, last: startedAt };
    const folded = interactions.reduce((acc, interaction) => {
      for (const entity of interaction.matchedEntities) {
        acc.topicCounts[entity] = (acc.topicCounts[entity] ?? 0) + 1;
      }
      acc.last = interaction.timestamp;
      return acc;
    }, initial);

    return {
      topicCounts: folded.topicCounts,
      interactionCount: interactions.length,
      sessionDurationSeconds:
        startedAt !== null && folded.last !== null ? secondsBetween(startedAt, folded.last) : 0,
    };
  }

  snapshot(): SessionSnapshot {
    return validateSessionSnapshotMessage({
      sessionId: this.session.sessionId,
      startedAt: this.session.startedAt,
      interactions: this.session.interactions.map(interaction => ({
        id: interaction.id,
        timestamp: interaction.timestamp,
        query: interaction.queryText,
        entities: [...interaction.matchedEntities],
        response: interaction.responseText,
        ...(interaction.complexity ? { complexity: interaction.complexity } : {}),
      })),
    });
  }

  insights(): SessionInsights {
    const { topicCounts, sessionDurationSeconds } = this.summary();
    const topicsDiscussed: string[] = [];
    for (const interaction of this.session.interactions) {
      for (const entity of interaction.matchedEntities) {
        if (!topicsDiscussed.includes(entity)) topicsDiscussed.push(entity);
      }
    }

    const queries = this.session.interactions.filter(interaction => interaction.queryText !== '');
    const totalWords = queries.reduce((sum, interaction) => sum + tokenize(interaction.queryText).length, 0);
    const averageQueryLength = queries.length > 0 ? Math.round((totalWords / queries.length) * 10) / 10 : 0;

    const recommendations: string[] = [];
    if (sessionDurationSeconds > BREAK_AFTER_SECONDS) {
      recommendations.push('Consider taking a short break to maintain focus.');
    }

    const levels: LearnerLevel[] = [];
    for (const interaction of this.session.interactions) {
      if (interaction.complexity) levels.push(interaction.complexity);
    }
    const progression = complexityProgression(levels);
    if (progression.trend === 'increasing') recommendations.push(RISING_COMPLEXITY_RECOMMENDATION);
    if (progression.trend === 'decreasing') recommendations.push(FALLING_COMPLEXITY_RECOMMENDATION);

    const repeated = topicsDiscussed.filter(topic => topicCounts[topic] >= REPEATED_TOPIC_THRESHOLD);
    if (repeated.length > 0) {
      recommendations.push(`Try explaining these topics in your own words: ${repeated.slice(0, 3).join(', ')}`);
    }

    if (queries.length > 0 && topicsDiscussed.length === 0) {
      recommendations.push('Try naming a specific topic in your questions so answers can draw on the course material.');
    }

    return { topicsDiscussed, averageQueryLength, complexityProgression: progression, recommendations };
  }

  /** Drop every recorded interaction; the session id is kept */
  reset(): void {
    const dropped = this.session.interactions.length;
    this.session = { sessionId: this.session.sessionId, startedAt: null, interactions: [] };
    logger.info({ sessionId: this.session.sessionId, dropped }, 'Session reset');
  }
}
