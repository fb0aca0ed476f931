/**
 * Voice turn driver - streams microphone PCM of one session through the
 * voice activity detector and the turn recorder, and hands each finished
 * utterance to the assistant pipeline.
 */
import { AudioFrame, Utterance } from '../types/audio';
import { CancelledError } from '../errors';
import { TurnRecorder, RecorderState } from '../voice/turn-recorder';
import { VoiceActivityDetector } from '../voice/vad';
import { labelFrame, sliceFrames, utteranceToPcm } from '../voice/frames';
import { logger } from '../utils/logger';
import { AssistantPipeline, TurnResult } from './index';

export interface VoiceTurnDriverOptions {
  sampleRate: number;
  frameDurationMs: number;
  silenceThresholdMs: number;
  maxDurationMs: number;
  onUtterance?: (utterance: Utterance) => void;
  onTurn?: (result: TurnResult) => void;
  /** Turn failures other than cancellation */
  onError?: (error: unknown, utterance: Utterance) => void;
  onTransition?: (from: RecorderState, to: RecorderState) => void;
}

export class VoiceTurnDriver {
  private readonly recorder: TurnRecorder;
  private readonly inFlight = new Map<string, { controller: AbortController; done: Promise<void> }>();
  private remainder: Int16Array = new Int16Array(0);

  constructor(
    private readonly pipeline: AssistantPipeline,
    private readonly vad: VoiceActivityDetector,
    private readonly options: VoiceTurnDriverOptions,
  ) {
    this.recorder = new TurnRecorder({
      silenceThresholdMs: options.silenceThresholdMs,
      maxDurationMs: options.maxDurationMs,
      onTransition: options.onTransition,
    });
  }

  get state(): RecorderState {
    return this.recorder.state;
  }

  get pendingTurns(): number {
    return this.inFlight.size;
  }

  /**
   * Feed a chunk of 16-bit mono PCM of any length
   * @returns Utterances completed by this chunk, already dispatched
   */
  pushAudio(pcm: Int16Array): Utterance[] {
    const joined = new Int16Array(this.remainder.length + pcm.length);
    joined.set(this.remainder, 0);
    joined.set(pcm, this.remainder.length);

    const { frames, remainder } = sliceFrames(joined, this.options.sampleRate, this.options.frameDurationMs);
    this.remainder = remainder;

    const emitted: Utterance[] = [];
    for (const samples of frames) {
      const utterance = this.pushFrame(labelFrame(this.vad, samples, this.options.frameDurationMs));
      if (utterance) emitted.push(utterance);
    }
    return emitted;
  }

  /** Feed one already classified frame */
  pushFrame(frame: AudioFrame): Utterance | null {
    const utterance = this.recorder.push(frame);
    if (utterance) {
      this.options.onUtterance?.(utterance);
      this.dispatch(utterance);
    }
    return utterance;
  }

  /**
   * Discard the recording in progress and cancel every turn not yet recorded
   */
  abort(): void {
    this.recorder.abort();
    this.remainder = new Int16Array(0);
    for (const { controller } of this.inFlight.values()) {
      controller.abort();
    }
  }

  /** Resolves once every dispatched turn has settled */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight.values()].map(turn => turn.done));
  }

  private dispatch(utterance: Utterance): void {
    const controller = new AbortController();
    const audio = { pcm: utteranceToPcm(utterance), sampleRate: this.options.sampleRate };

    const done = this.pipeline
      .handleTurn(audio, { signal: controller.signal })
      .then(
        result => {
          this.options.onTurn?.(result);
        },
        (err: unknown) => {
          if (err instanceof CancelledError) return;
          logger.error({ utteranceId: utterance.id, error: err }, 'Voice turn failed');
          this.options.onError?.(err, utterance);
        },
      )
      .finally(() => {
        this.inFlight.delete(utterance.id);
      });

    this.inFlight.set(utterance.id, { controller, done });
  }
}
