/**
 * Main entry point for the voice tutor service
 */
import { main } from './worker/tutor-worker';
import { logger } from './utils/logger';
import Config from './config';

// Log the startup
logger.info({
  name: Config.service.name,
  version: Config.service.version,
  environment: process.env.NODE_ENV || 'development',
  knowledgeBase: Config.knowledgeBase.path,
  learnerLevel: Config.pipeline.learnerLevel,
  vad: Config.audio.vad.backend,
}, 'Starting voice tutor');

// Start the worker
main().catch((error) => {
  logger.fatal({ error }, 'Fatal error in voice tutor');
  process.exit(1);
});
