/**
 * Tutor Worker - service entry point
 *
 * Loads the knowledge base, opens a tutoring session and answers questions
 * typed on stdin, one per line; lines starting with `/` are commands
 * (see ./commands). With `--audio <file>` it instead streams a
 * raw 16-bit little-endian mono PCM recording through turn-taking. Answers go
 * to stdout; synthesized speech is written to the speech output directory.
 */
import { createInterface, Interface } from 'readline';
import { createReadStream, promises as fs } from 'fs';
import { join } from 'path';
import { logger } from '../utils/logger';
import Config from '../config';
import { KnowledgeGraph, loadKnowledgeBase } from '../knowledge-graph';
import { createOpenAICollaborators } from '../collaborators/openai';
import { SessionRegistry, TutorSession } from '../analytics/registry';
import { pipelineOptionsFromConfig, TurnResult } from '../pipeline';
import { VoiceTurnDriver } from '../pipeline/voice-turns';
import { createVad } from '../voice/vad';
import { startHealthServer, stopHealthServer } from '../health/server';
import { metrics } from '../metrics/metrics';
import { parseCommand, runCommand } from './commands';

// Define async main function
export async function main(): Promise<void> {
  logger.info('Starting tutor worker...');

  let graph: KnowledgeGraph;
  try {
    graph = await loadKnowledgeBase(Config.knowledgeBase.path, { searchTopK: Config.knowledgeBase.searchTopK });
  } catch (error) {
    logger.fatal({ error, path: Config.knowledgeBase.path }, 'Failed to load knowledge base');
    process.exit(1);
  }

  const stats = graph.stats();
  metrics.graphNodesTotal.set(stats.totalEntities);
  metrics.graphEdgesTotal.set(stats.totalRelationships);

  const registry = new SessionRegistry({
    graph,
    collaborators: createOpenAICollaborators(Config),
    pipelineOptions: pipelineOptionsFromConfig(Config),
  });

  // Start HTTP health-check server
  startHealthServer({ graph, registry });

  const session = registry.open();
  logger.info({ sessionId: session.sessionId, level: session.pipeline.learnerLevel }, 'Tutor session ready');

  const audioPath = audioArgument(process.argv.slice(2));
  if (audioPath) {
    await answerRecording(session, audioPath);
    logger.info({ summary: session.analytics.summary() }, 'Recording finished, shutting down');
    await stopHealthServer();
    return;
  }

  const input = createInterface({ input: process.stdin, terminal: false });
  setupGracefulShutdown(input, session);

  for await (const line of input) {
    const command = parseCommand(line);
    if (!command) continue;

    try {
      if (command.kind === 'ask') {
        const result = await session.pipeline.handleText(command.question);
        process.stdout.write(`${result.interaction.responseText}\n`);
        await saveSpeech(result);
      } else {
        process.stdout.write(`${await runCommand(session, command)}\n`);
      }
    } catch (error) {
      logger.error({ error, sessionId: session.sessionId, command: command.kind }, 'Failed to handle input');
    }
  }

  logger.info({ summary: session.analytics.summary() }, 'Input closed, shutting down');
  await stopHealthServer();
}

function audioArgument(args: string[]): string | undefined {
  const index = args.indexOf('--audio');
  return index === -1 ? undefined : args[index + 1];
}

/**
 * Stream a raw PCM recording through the voice turn driver and answer every
 * utterance it contains
 */
async function answerRecording(session: TutorSession, path: string): Promise<void> {
  const { audio } = Config;
  const driver = new VoiceTurnDriver(session.pipeline, createVad(audio.vad), {
    sampleRate: audio.sampleRate,
    frameDurationMs: audio.frameDurationMs,
    silenceThresholdMs: audio.silenceThresholdMs,
    maxDurationMs: audio.maxDurationMs,
    onUtterance: utterance => logger.info(
      { utteranceId: utterance.id, durationMs: utterance.durationMs, reason: utterance.reason },
      'Utterance captured',
    ),
    onTurn: result => {
      process.stdout.write(`${result.interaction.responseText}\n`);
      void saveSpeech(result);
    },
  });

  let carry: Buffer = Buffer.alloc(0);
  for await (const chunk of createReadStream(path)) {
    const bytes = Buffer.concat([carry, Buffer.from(chunk)]);
    const sampleCount = Math.floor(bytes.length / 2);
    const pcm = new Int16Array(sampleCount);
    for (let i = 0; i < sampleCount; i++) {
      pcm[i] = bytes.readInt16LE(i * 2);
    }
    carry = bytes.subarray(sampleCount * 2);
    driver.pushAudio(pcm);
  }

  // Trailing silence closes an utterance still being recorded
  driver.pushAudio(new Int16Array(Math.ceil((audio.sampleRate * audio.silenceThresholdMs) / 1000) + audio.sampleRate));
  await driver.drain();
}

/**
 * Write a turn's synthesized answer to the speech output directory
 */
async function saveSpeech(result: TurnResult): Promise<void> {
  if (!result.speech) return;

  const dir = Config.pipeline.speechOutputDir;
  const file = join(dir, `${result.interaction.id}.mp3`);
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(file, result.speech);
    logger.info({ file, bytes: result.speech.length }, 'Speech written');
  } catch (error) {
    logger.warn({ error, file }, 'Could not write speech file');
  }
}

/**
 * Set up graceful shutdown handlers
 */
function setupGracefulShutdown(input: Interface, session: TutorSession): void {
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      input.close();
      logger.info({ summary: session.analytics.summary() }, 'Session summary');

      await stopHealthServer();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  // Listen for termination signals
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Handle uncaught exceptions and rejections
  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    void shutdown('unhandledRejection');
  });
}

// Start the worker if this is the main module
if (require.main === module) {
  main().catch((error) => {
    logger.fatal({ error }, 'Fatal error in tutor worker');
    process.exit(1);
  });
}
