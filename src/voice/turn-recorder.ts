/**
 * Turn Recorder - segments a stream of classified audio frames into utterances
 *
 *   IDLE --speech--> RECORDING --silence--> TRAILING_SILENCE
 *   TRAILING_SILENCE --speech before threshold--> RECORDING
 *   TRAILING_SILENCE --silence >= threshold--> EMITTED (reason: silence) --> IDLE
 *   RECORDING | TRAILING_SILENCE --elapsed >= max--> EMITTED (reason: max_duration) --> IDLE
 *   any --abort()--> IDLE
 *
 * `push` never blocks and never does I/O: it runs once per frame on the
 * capture path.
 */
import { v4 as uuidv4 } from 'uuid';
import { AudioFrame, TerminationReason, Utterance } from '../types/audio';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';

export type RecorderState = 'IDLE' | 'RECORDING' | 'TRAILING_SILENCE' | 'EMITTED';

export interface TurnRecorderOptions {
  /** Silence that ends a turn */
  silenceThresholdMs: number;
  /** Hard cap on one recording, pauses included */
  maxDurationMs: number;
  /** Observes every transition, including the transient EMITTED state */
  onTransition?: (from: RecorderState, to: RecorderState) => void;
}

export class TurnRecorder {
  private current: RecorderState = 'IDLE';

  // Frames of the utterance so far, pauses that were followed by speech included
  private buffered: AudioFrame[] = [];

  // Silence frames since the last speech frame; not yet part of the utterance
  private trailing: AudioFrame[] = [];

  private elapsedMs = 0;
  private silenceMs = 0;

  private readonly silenceThresholdMs: number;
  private readonly maxDurationMs: number;
  private readonly onTransition?: (from: RecorderState, to: RecorderState) => void;

  constructor(options: TurnRecorderOptions) {
    const valid = (ms: number) => Number.isFinite(ms) && ms > 0;
    if (!valid(options.silenceThresholdMs) || !valid(options.maxDurationMs)) {
      throw new RangeError('silenceThresholdMs and maxDurationMs must be positive finite numbers');
    }
    this.silenceThresholdMs = options.silenceThresholdMs;
    this.maxDurationMs = options.maxDurationMs;
    this.onTransition = options.onTransition;
  }

  get state(): RecorderState {
    return this.current;
  }

  /** Frames held for the current recording, trailing silence included */
  get bufferedFrames(): number {
    return this.buffered.length + this.trailing.length;
  }

  /**
   * Feed one classified frame
   * @returns The finished utterance when this frame completes a turn, otherwise null
   */
  push(frame: AudioFrame): Utterance | null {
    switch (this.current) {
      case 'IDLE':
        if (!frame.isSpeech) return null; // nothing said yet: drop
        this.transition('RECORDING');
        this.buffered.push(frame);
        this.elapsedMs = frame.durationMs;
        return this.checkDurationCap();

      case 'RECORDING':
        this.elapsedMs += frame.durationMs;
        if (frame.isSpeech) {
          this.buffered.push(frame);
        } else {
          this.transition('TRAILING_SILENCE');
          this.trailing.push(frame);
          this.silenceMs = frame.durationMs;
          if (this.silenceMs >= this.silenceThresholdMs) {
            return this.emit('silence');
          }
        }
        return this.checkDurationCap();

      case 'TRAILING_SILENCE':
        this.elapsedMs += frame.durationMs;
        if (frame.isSpeech) {
          // A pause inside the utterance, not the end of the turn
          this.buffered.push(...this.trailing, frame);
          this.trailing = [];
          this.silenceMs = 0;
          this.transition('RECORDING');
        } else {
          this.trailing.push(frame);
          this.silenceMs += frame.durationMs;
          if (this.silenceMs >= this.silenceThresholdMs) {
            return this.emit('silence');
          }
        }
        return this.checkDurationCap();

      case 'EMITTED':
        // Emission resets to IDLE before push returns
        return null;
    }
  }

  /**
   * Discard the current recording without emitting anything
   * @returns Whether a recording was in progress
   */
  abort(): boolean {
    const wasRecording = this.current !== 'IDLE';
    const discarded = this.bufferedFrames;

    this.reset();
    if (wasRecording) {
      metrics.recordingsAborted.inc();
      logger.info({ discardedFrames: discarded }, 'Recording aborted');
    }
    return wasRecording;
  }

  private checkDurationCap(): Utterance | null {
    if (this.current !== 'IDLE' && this.elapsedMs >= this.maxDurationMs) {
      return this.emit('max_duration');
    }
    return null;
  }

  private emit(reason: TerminationReason): Utterance {
    const frames = Object.freeze([...this.buffered]);
    const utterance: Utterance = Object.freeze({
      id: uuidv4(),
      frames,
      durationMs: frames.reduce((sum, frame) => sum + frame.durationMs, 0),
      speechFrameCount: frames.filter(frame => frame.isSpeech).length,
      reason,
    });

    this.transition('EMITTED');
    metrics.utterancesEmitted.inc({ reason });

    if (reason === 'max_duration') {
      logger.warn({
        utteranceId: utterance.id,
        elapsedMs: this.elapsedMs,
        maxDurationMs: this.maxDurationMs,
        reason,
      }, 'Recording hit the duration cap, forcing cutoff');
    } else {
      logger.info({
        utteranceId: utterance.id,
        durationMs: utterance.durationMs,
        frames: frames.length,
        reason,
      }, 'Utterance finished');
    }

    this.reset();
    return utterance;
  }

  private reset(): void {
    this.buffered = [];
    this.trailing = [];
    this.elapsedMs = 0;
    this.silenceMs = 0;
    this.transition('IDLE');
  }

  private transition(to: RecorderState): void {
    const from = this.current;
    if (from === to) return;
    this.current = to;
    this.onTransition?.(from, to);
  }
}
