/**
 * Voice activity detection backends.
 *
 * Every backend is a pure function of one frame: no smoothing state is kept
 * between calls, so the turn recorder owns all timing decisions.
 */
import { VadBackend } from '../config';

export interface VoiceActivityDetector {
  readonly backend: VadBackend;
  /** True when the frame contains speech. Must return within one frame period. */
  classify(frame: Int16Array): boolean;
}

export interface VadOptions {
  backend: VadBackend;
  /** Minimum RMS amplitude (0..32767) of a speech frame */
  rmsThreshold: number;
  /** Minimum absolute peak of a speech frame, `peak` backend only */
  peakThreshold: number;
}

export function frameRms(frame: Int16Array): number {
  if (frame.length === 0) return 0;

  let sumSquares = 0;
  for (let i = 0; i < frame.length; i++) {
    sumSquares += frame[i] * frame[i];
  }
  return Math.sqrt(sumSquares / frame.length);
}

export function framePeak(frame: Int16Array): number {
  let peak = 0;
  for (let i = 0; i < frame.length; i++) {
    const magnitude = Math.abs(frame[i]);
    if (magnitude > peak) peak = magnitude;
  }
  return peak;
}

/** RMS energy gate */
export class EnergyVad implements VoiceActivityDetector {
  readonly backend = 'energy';

  constructor(private readonly rmsThreshold: number) {}

  classify(frame: Int16Array): boolean {
    return frameRms(frame) >= this.rmsThreshold;
  }
}

/**
 * RMS gate plus a peak gate: steady background hum can clear the RMS level
 * without the transients speech has.
 */
export class PeakGateVad implements VoiceActivityDetector {
  readonly backend = 'peak';

  constructor(
    private readonly rmsThreshold: number,
    private readonly peakThreshold: number,
  ) {}

  classify(frame: Int16Array): boolean {
    return frameRms(frame) >= this.rmsThreshold && framePeak(frame) >= this.peakThreshold;
  }
}

export function createVad(options: VadOptions): VoiceActivityDetector {
  switch (options.backend) {
    case 'energy':
      return new EnergyVad(options.rmsThreshold);
    case 'peak':
      return new PeakGateVad(options.rmsThreshold, options.peakThreshold);
  }
}
