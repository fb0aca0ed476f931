/**
 * Metrics module for the voice tutor using Prometheus client
 */
import client from 'prom-client';
import { logger } from '../utils/logger';

// Initialize Prometheus registry
const register = new client.Registry();

// Add default metrics (CPU, memory, event loop, etc.)
client.collectDefaultMetrics({ register });

// Application-specific metrics
export const metrics = {
  // Counter for completed turns, by how the answer was produced
  turnsTotal: new client.Counter({
    name: 'tutor_turns_total',
    help: 'Total number of completed turns',
    labelNames: ['outcome'] as const,
    registers: [register],
  }),

  // Counter for turns cancelled before an interaction was recorded
  turnsCancelled: new client.Counter({
    name: 'tutor_turns_cancelled_total',
    help: 'Turns cancelled by the user',
    registers: [register],
  }),

  // Histogram for end-to-end turn latency
  turnDuration: new client.Histogram({
    name: 'tutor_turn_duration_seconds',
    help: 'Time taken to answer one turn',
    buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
    registers: [register],
  }),

  // Counter for external collaborator failures
  collaboratorFailures: new client.Counter({
    name: 'tutor_collaborator_failures_total',
    help: 'Failed transcription, generation or synthesis calls',
    labelNames: ['step', 'kind'] as const,
    registers: [register],
  }),

  // Counter for utterances emitted by the turn recorder
  utterancesEmitted: new client.Counter({
    name: 'tutor_utterances_emitted_total',
    help: 'Utterances emitted by the turn recorder',
    labelNames: ['reason'] as const,
    registers: [register],
  }),

  // Counter for recordings discarded by abort()
  recordingsAborted: new client.Counter({
    name: 'tutor_recordings_aborted_total',
    help: 'Recordings discarded before emission',
    registers: [register],
  }),

  // Counter for entities linked in questions
  entityMatchesTotal: new client.Counter({
    name: 'tutor_entity_matches_total',
    help: 'Knowledge graph entities linked in student questions',
    registers: [register],
  }),

  // --- Knowledge Graph Metrics ---

  // Gauge for total number of nodes in the knowledge graph
  graphNodesTotal: new client.Gauge({
    name: 'tutor_graph_nodes_total',
    help: 'Total number of nodes in the knowledge graph',
    registers: [register],
  }),

  // Gauge for total number of edges in the knowledge graph
  graphEdgesTotal: new client.Gauge({
    name: 'tutor_graph_edges_total',
    help: 'Total number of edges in the knowledge graph',
    registers: [register],
  }),

  // Gauge for open sessions
  activeSessions: new client.Gauge({
    name: 'tutor_active_sessions',
    help: 'Sessions currently held in memory',
    registers: [register],
  }),
};

/**
 * Get all metrics for Prometheus scraping
 * @returns Promise resolving to metrics string
 */
export async function getMetrics(): Promise<string> {
  try {
    return await register.metrics();
  } catch (err) {
    logger.error({ error: err }, 'Error collecting metrics');
    throw err;
  }
}

export default {
  metrics,
  getMetrics,
  register,
};
