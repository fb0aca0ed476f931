/**
 * Shared test builders
 */
import { readFileSync } from 'fs';
import { join } from 'path';
import { KnowledgeGraph } from '../src/knowledge-graph';
import { AudioFrame } from '../src/types/audio';
import {
  Collaborators,
  GenerationPrompt,
  Generator,
  Synthesizer,
  Transcriber,
  Transcription,
} from '../src/collaborators/types';

export const FIXTURES_DIR = join(__dirname, 'fixtures');

export function fixturePath(name: string): string {
  return join(FIXTURES_DIR, name);
}

/** Parsed fixture records; a fresh copy on every call */
export function readFixture(name: string): unknown {
  return JSON.parse(readFileSync(fixturePath(name), 'utf8'));
}

export function fixtureGraph(): KnowledgeGraph {
  return KnowledgeGraph.fromRecords(readFixture('knowledge_base.json'));
}

export const FRAME_MS = 30;

export function speech(durationMs = FRAME_MS): AudioFrame {
  return { samples: new Int16Array(4).fill(1000), durationMs, isSpeech: true };
}

export function silence(durationMs = FRAME_MS): AudioFrame {
  return { samples: new Int16Array(4), durationMs, isSpeech: false };
}

export function repeat(frame: () => AudioFrame, count: number): AudioFrame[] {
  return Array.from({ length: count }, frame);
}

/**
 * Collaborators backed by jest mocks. By default transcription returns
 * `transcript`, generation returns "Generated answer." and there is no
 * synthesizer.
 */
export function fakeCollaborators(transcript = 'What is photosynthesis?'): {
  collaborators: Collaborators;
  transcribe: jest.Mock<Promise<Transcription>, [unknown, { signal: AbortSignal }]>;
  generate: jest.Mock<Promise<string>, [GenerationPrompt, { signal: AbortSignal }]>;
} {
  const transcribe = jest.fn<Promise<Transcription>, [unknown, { signal: AbortSignal }]>()
    .mockResolvedValue({ text: transcript, confidence: 0.95 });
  const generate = jest.fn<Promise<string>, [GenerationPrompt, { signal: AbortSignal }]>()
    .mockResolvedValue('Generated answer.');

  const transcriber: Transcriber = { transcribe: (audio, options) => transcribe(audio, options) };
  const generator: Generator = { generate: (prompt, options) => generate(prompt, options) };

  return { collaborators: { transcriber, generator, synthesizer: null }, transcribe, generate };
}

export function fakeSynthesizer(): { synthesizer: Synthesizer; synthesize: jest.Mock<Promise<Buffer>, [string, { signal: AbortSignal }]> } {
  const synthesize = jest.fn<Promise<Buffer>, [string, { signal: AbortSignal }]>()
    .mockResolvedValue(Buffer.from('mp3-bytes'));
  return { synthesizer: { synthesize: (text, options) => synthesize(text, options) }, synthesize };
}

/** A promise that settles only when `signal` aborts, like a stalled HTTP call */
export function hangUntilAborted<T>(signal: AbortSignal): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}
