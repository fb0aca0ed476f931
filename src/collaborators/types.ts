/**
 * Narrow interfaces to the external speech and language services
 */
import { AudioPayload } from '../types/audio';

export interface CallOptions {
  /** Aborted on timeout or when the turn is cancelled */
  signal: AbortSignal;
}

export interface Transcription {
  text: string;
  /** 0..1 when the service reports one */
  confidence?: number;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface GenerationPrompt {
  messages: ChatMessage[];
}

export interface Transcriber {
  transcribe(audio: AudioPayload, options: CallOptions): Promise<Transcription>;
}

export interface Generator {
  generate(prompt: GenerationPrompt, options: CallOptions): Promise<string>;
}

export interface Synthesizer {
  synthesize(text: string, options: CallOptions): Promise<Buffer>;
}

export interface Collaborators {
  transcriber: Transcriber;
  generator: Generator;
  /** Null when speech output is disabled */
  synthesizer: Synthesizer | null;
}
