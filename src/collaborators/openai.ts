/**
 * OpenAI-backed collaborators: Whisper transcription, chat completion and
 * text-to-speech.
 *
 * Timeouts are owned by the pipeline, which aborts `options.signal`; the SDK's
 * own retries are disabled so an abort is never followed by a silent retry.
 */
import OpenAI, { toFile } from 'openai';
import { AppConfig, TtsVoice } from '../config';
import { AudioPayload } from '../types/audio';
import { GenerationError, SynthesisError, TranscriptionError } from '../errors';
import { encodeWav } from '../voice/frames';
import { logger } from '../utils/logger';
import {
  CallOptions,
  ChatMessage,
  Collaborators,
  GenerationPrompt,
  Generator,
  Synthesizer,
  Transcriber,
  Transcription,
} from './types';

export interface OpenAIClientOptions {
  apiKey: string;
  baseUrl?: string;
}

function createClient(options: OpenAIClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    maxRetries: 0,
  });
}

function toChatParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAITranscriber implements Transcriber {
  private readonly client: OpenAI;

  constructor(options: OpenAIClientOptions, private readonly model: string) {
    this.client = createClient(options);
  }

  async transcribe(audio: AudioPayload, options: CallOptions): Promise<Transcription> {
    const file = await toFile(encodeWav(audio.pcm, audio.sampleRate), 'utterance.wav', { type: 'audio/wav' });

    try {
      const result = await this.client.audio.transcriptions.create(
        { file, model: this.model },
        { signal: options.signal },
      );
      return { text: result.text };
    } catch (err) {
      if (options.signal.aborted) throw err;
      throw new TranscriptionError('Transcription request failed', { cause: err });
    }
  }
}

export class OpenAIGenerator implements Generator {
  private readonly client: OpenAI;

  constructor(options: OpenAIClientOptions, private readonly model: string) {
    this.client = createClient(options);
  }

  async generate(prompt: GenerationPrompt, options: CallOptions): Promise<string> {
    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        { model: this.model, messages: prompt.messages.map(toChatParam) },
        { signal: options.signal },
      );
    } catch (err) {
      if (options.signal.aborted) throw err;
      throw new GenerationError('Chat completion request failed', { cause: err });
    }

    const content = completion.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new GenerationError('Chat completion returned no content');
    }
    return content;
  }
}

export class OpenAISynthesizer implements Synthesizer {
  private readonly client: OpenAI;

  constructor(
    options: OpenAIClientOptions,
    private readonly model: string,
    private readonly voice: TtsVoice,
  ) {
    this.client = createClient(options);
  }

  async synthesize(text: string, options: CallOptions): Promise<Buffer> {
    try {
      const response = await this.client.audio.speech.create(
        { model: this.model, voice: this.voice, input: text, response_format: 'mp3' },
        { signal: options.signal },
      );
      return Buffer.from(await response.arrayBuffer());
    } catch (err) {
      if (options.signal.aborted) throw err;
      throw new SynthesisError('Speech synthesis request failed', { cause: err });
    }
  }
}

/**
 * Stand-ins used when no API key is configured. Every call fails, so turns
 * take the degraded path (knowledge base summary or apology, no audio).
 */
export class UnconfiguredTranscriber implements Transcriber {
  async transcribe(): Promise<Transcription> {
    throw new TranscriptionError('No transcription service configured');
  }
}

export class UnconfiguredGenerator implements Generator {
  async generate(): Promise<string> {
    throw new GenerationError('No generation service configured');
  }
}

export function createOpenAICollaborators(config: Pick<AppConfig, 'openai' | 'pipeline'>): Collaborators {
  const { openai } = config;

  if (!openai.apiKey) {
    logger.warn('OPENAI_API_KEY not set; answers will come from the knowledge base only');
    return {
      transcriber: new UnconfiguredTranscriber(),
      generator: new UnconfiguredGenerator(),
      synthesizer: null,
    };
  }

  const client: OpenAIClientOptions = { apiKey: openai.apiKey, baseUrl: openai.baseUrl };
  return {
    transcriber: new OpenAITranscriber(client, openai.transcriptionModel),
    generator: new OpenAIGenerator(client, openai.chatModel),
    synthesizer: config.pipeline.synthesize
      ? new OpenAISynthesizer(client, openai.speechModel, openai.voice)
      : null,
  };
}
