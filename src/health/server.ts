/**
 * Health check server
 *
 * Provides HTTP endpoints for monitoring the tutor, its knowledge graph,
 * open sessions and metrics
 */
import express from 'express';
import { Server } from 'http';
import { logger } from '../utils/logger';
import Config from '../config';
import MetricsService, { getMetrics } from '../metrics/metrics';
import { KnowledgeGraph } from '../knowledge-graph';
import { SessionRegistry } from '../analytics/registry';

export interface HealthDeps {
  graph: KnowledgeGraph;
  registry: SessionRegistry;
}

// Server instance
let server: Server | null = null;

/**
 * Build the express app without listening, so tests can drive it directly
 */
export function createHealthApp(deps: HealthDeps): express.Express {
  const app = express();

  // Log incoming requests
  app.use((req, res, next) => {
    logger.debug({
      method: req.method,
      url: req.url
    }, 'HTTP request received');
    next();
  });

  // Health check endpoint
  app.get('/healthz', (req, res) => {
    const memoryUsage = process.memoryUsage();

    const health = {
      status: 'ok',
      service: Config.service.name,
      version: Config.service.version,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      memory: {
        rss: Math.round(memoryUsage.rss / 1024 / 1024), // MB
        heapTotal: Math.round(memoryUsage.heapTotal / 1024 / 1024), // MB
        heapUsed: Math.round(memoryUsage.heapUsed / 1024 / 1024), // MB
      },
    };

    logger.debug({ health }, 'Health check');
    res.json(health);
  });

  // Knowledge graph status endpoint
  app.get('/graph', (req, res) => {
    const stats = deps.graph.stats();
    res.json({ ok: stats.totalEntities > 0, ...stats });
    logger.debug({ stats }, 'Graph status endpoint called');
  });

  // Session statistics endpoint
  app.get('/sessions', (req, res) => {
    res.json(deps.registry.generalStats());
  });

  // Snapshot of one session
  app.get('/sessions/:sessionId', (req, res) => {
    const session = deps.registry.get(req.params.sessionId);
    if (!session) {
      res.status(404).json({ status: 'error', message: 'Session not found' });
      return;
    }

    res.json({
      snapshot: session.analytics.snapshot(),
      summary: session.analytics.summary(),
      insights: session.analytics.insights(),
    });
  });

  // Session report; calls the generation service for gaps and a summary
  app.get('/sessions/:sessionId/report', async (req, res, next) => {
    const session = deps.registry.get(req.params.sessionId);
    if (!session) {
      res.status(404).json({ status: 'error', message: 'Session not found' });
      return;
    }

    try {
      res.json(await session.pipeline.sessionReport());
    } catch (error) {
      next(error);
    }
  });

  // Knowledge base search
  app.get('/search', (req, res) => {
    const { q, limit } = req.query;
    if (typeof q !== 'string' || !q.trim()) {
      res.status(400).json({ status: 'error', message: 'Query parameter q is required' });
      return;
    }

    let topK: number | undefined;
    if (limit !== undefined) {
      if (typeof limit !== 'string' || !/^[1-9]\d*$/.test(limit)) {
        res.status(400).json({ status: 'error', message: 'Query parameter limit must be a positive integer' });
        return;
      }
      topK = Number(limit);
    }

    const results = deps.graph.search(q, topK).map(node => ({
      id: node.id,
      entity: node.entity,
      type: node.type,
      summary: node.summary,
    }));
    res.json({ query: q, results });
  });

  // Prometheus metrics endpoint
  app.get('/metrics', async (req, res) => {
    try {
      const metrics = await getMetrics();

      res.set('Content-Type', MetricsService.register.contentType);
      res.end(metrics);

      logger.debug('Metrics endpoint called');
    } catch (error) {
      logger.error({ error }, 'Error serving metrics');
      res.status(500).json({ error: 'Failed to collect metrics' });
    }
  });

  // Catch-all for 404s
  app.use((req, res) => {
    logger.info({
      method: req.method,
      url: req.url
    }, 'Unknown route');

    res.status(404).json({
      status: 'error',
      message: 'Not found'
    });
  });

  // Error handler
  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({
      error: err,
      method: req.method,
      url: req.url
    }, 'Server error');

    res.status(500).json({
      status: 'error',
      message: 'Internal server error'
    });
  });

  return app;
}

/**
 * Start the health check HTTP server
 */
export function startHealthServer(deps: HealthDeps): void {
  const app = createHealthApp(deps);

  const port = Config.http.port;
  const host = Config.http.host;

  server = app.listen(port, host, () => {
    logger.info({ port, host }, 'Health check server started');
  });

  server.on('error', (error: Error) => {
    logger.error({ error }, 'Health check server error');
  });
}

/**
 * Stop the health check HTTP server
 */
export function stopHealthServer(): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server) {
      return resolve();
    }

    logger.info('Stopping health check server');

    server.close((err: Error | undefined) => {
      if (err) {
        logger.error({ error: err }, 'Error closing health check server');
        return reject(err);
      }

      logger.info('Health check server stopped');
      server = null;
      resolve();
    });
  });
}

export default { createHealthApp, startHealthServer, stopHealthServer };
