/**
 * Audio capture types
 */

/** A fixed-duration slice of 16-bit mono PCM, labelled by the voice activity detector. */
export interface AudioFrame {
  readonly samples: Int16Array;
  readonly durationMs: number;
  readonly isSpeech: boolean;
}

export type TerminationReason = 'silence' | 'max_duration';

export interface Utterance {
  readonly id: string;
  readonly frames: readonly AudioFrame[];
  readonly durationMs: number;
  readonly speechFrameCount: number;
  readonly reason: TerminationReason;
}

/** Raw audio handed to the transcription collaborator. */
export interface AudioPayload {
  readonly pcm: Int16Array;
  readonly sampleRate: number;
}
