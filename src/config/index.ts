/**
 * Configuration settings for the voice tutor service
 */
import { config } from 'dotenv';
import { join } from 'path';

// Load environment variables from .env file if present
config();

// Environment mapping for log levels
const LOG_LEVELS = {
  development: 'debug',
  test: 'debug',
  production: 'info',
} as const;

export type VadBackend = 'energy' | 'peak';
export type LearnerLevel = 'beginner' | 'intermediate' | 'advanced';
export type TtsVoice = 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';

const VAD_BACKENDS: readonly VadBackend[] = ['energy', 'peak'];
export const LEARNER_LEVELS: readonly LearnerLevel[] = ['beginner', 'intermediate', 'advanced'];
const TTS_VOICES: readonly TtsVoice[] = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'];

function pickOne<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const match = allowed.find(option => option === value);
  return match ?? fallback;
}

type NodeEnv = keyof typeof LOG_LEVELS;
const NODE_ENVS: readonly NodeEnv[] = ['development', 'test', 'production'];

// Get the current node environment or default to development
const nodeEnv = pickOne(process.env.NODE_ENV, NODE_ENVS, 'development');

/** `fallback` when the variable is unset or not a finite number */
export function parseFloatOr(value: string | undefined, fallback: number): number {
  const parsed = value === undefined ? NaN : parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Configuration object for the voice tutor service
 */
export const Config = {
  // Service info
  service: {
    name: 'voice-tutor',
    version: process.env.npm_package_version || '0.1.0',
  },

  // Logging configuration
  logging: {
    level: process.env.LOG_LEVEL || LOG_LEVELS[nodeEnv] || 'info',
    prettyPrint: nodeEnv !== 'production',
  },

  // Knowledge base
  knowledgeBase: {
    path: process.env.KNOWLEDGE_BASE_PATH || join(process.cwd(), 'data', 'knowledge_base.json'),
    searchTopK: parseIntOr(process.env.KNOWLEDGE_SEARCH_TOP_K, 5),
  },

  // Audio capture and turn-taking
  audio: {
    sampleRate: parseIntOr(process.env.AUDIO_SAMPLE_RATE, 16000),
    frameDurationMs: parseIntOr(process.env.AUDIO_FRAME_MS, 30),
    silenceThresholdMs: parseIntOr(process.env.AUDIO_SILENCE_THRESHOLD_MS, 1000),
    maxDurationMs: parseIntOr(process.env.AUDIO_MAX_DURATION_MS, 30000),
    vad: {
      backend: pickOne(process.env.VAD_BACKEND, VAD_BACKENDS, 'energy'),
      rmsThreshold: parseFloatOr(process.env.VAD_RMS_THRESHOLD, 500),
      peakThreshold: parseFloatOr(process.env.VAD_PEAK_THRESHOLD, 2000),
    },
  },

  // Answer pipeline
  pipeline: {
    contextMaxEntities: parseIntOr(process.env.CONTEXT_MAX_ENTITIES, 3),
    contextRelatedDepth: parseIntOr(process.env.CONTEXT_RELATED_DEPTH, 1),
    contextMaxRelated: parseIntOr(process.env.CONTEXT_MAX_RELATED, 3),
    contextMaxChars: parseIntOr(process.env.CONTEXT_MAX_CHARS, 2000),
    historyTurns: parseIntOr(process.env.HISTORY_TURNS, 5),
    minTranscriptionConfidence: parseFloatOr(process.env.MIN_TRANSCRIPTION_CONFIDENCE, 0.5),
    learnerLevel: pickOne(process.env.LEARNER_LEVEL, LEARNER_LEVELS, 'intermediate'),
    // Estimate each question's level and answer at that level
    adaptLevel: process.env.ADAPT_LEARNER_LEVEL === 'true',
    synthesize: process.env.SYNTHESIZE_SPEECH !== 'false',
    speechOutputDir: process.env.SPEECH_OUTPUT_DIR || join(process.cwd(), 'speech-out'),
  },

  // Per-call budgets for external collaborators (ms)
  timeouts: {
    transcription: parseIntOr(process.env.TRANSCRIPTION_TIMEOUT_MS, 15000),
    generation: parseIntOr(process.env.GENERATION_TIMEOUT_MS, 20000),
    synthesis: parseIntOr(process.env.SYNTHESIS_TIMEOUT_MS, 15000),
  },

  // OpenAI collaborators
  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
    chatModel: process.env.OPENAI_CHAT_MODEL || 'gpt-4o-mini',
    transcriptionModel: process.env.OPENAI_TRANSCRIPTION_MODEL || 'whisper-1',
    speechModel: process.env.OPENAI_SPEECH_MODEL || 'tts-1',
    voice: pickOne(process.env.OPENAI_VOICE, TTS_VOICES, 'alloy'),
  },

  // HTTP Server configuration (for healthcheck)
  http: {
    port: parseIntOr(process.env.HTTP_PORT, 3000),
    host: process.env.HTTP_HOST || '0.0.0.0',
  },
};

export type AppConfig = typeof Config;

// Export configuration as default
export default Config;
