/**
 * PCM framing helpers
 */
import { AudioFrame, Utterance } from '../types/audio';
import { VoiceActivityDetector } from './vad';

const WAV_HEADER_BYTES = 44;

export function samplesPerFrame(sampleRate: number, frameDurationMs: number): number {
  return Math.round((sampleRate * frameDurationMs) / 1000);
}

/**
 * Split PCM into fixed-duration frames. A trailing partial frame is returned
 * separately so streaming callers can prepend it to the next chunk.
 */
export function sliceFrames(
  pcm: Int16Array,
  sampleRate: number,
  frameDurationMs: number,
): { frames: Int16Array[]; remainder: Int16Array } {
  const size = samplesPerFrame(sampleRate, frameDurationMs);
  if (size <= 0) {
    throw new RangeError(`Frame of ${frameDurationMs}ms at ${sampleRate}Hz has no samples`);
  }

  const frames: Int16Array[] = [];
  let start = 0;
  for (; start + size <= pcm.length; start += size) {
    frames.push(pcm.subarray(start, start + size));
  }

  return { frames, remainder: pcm.slice(start) };
}

export function labelFrame(vad: VoiceActivityDetector, samples: Int16Array, durationMs: number): AudioFrame {
  return { samples, durationMs, isSpeech: vad.classify(samples) };
}

/** Concatenate the frames of an utterance back into one PCM buffer */
export function utteranceToPcm(utterance: Utterance): Int16Array {
  const total = utterance.frames.reduce((sum, frame) => sum + frame.samples.length, 0);
  const pcm = new Int16Array(total);

  let at = 0;
  for (const frame of utterance.frames) {
    pcm.set(frame.samples, at);
    at += frame.samples.length;
  }
  return pcm;
}

/**
 * Wrap 16-bit mono PCM in a RIFF/WAVE container
 */
export function encodeWav(pcm: Int16Array, sampleRate: number): Buffer {
  const dataBytes = pcm.length * 2;
  const buffer = Buffer.alloc(WAV_HEADER_BYTES + dataBytes);

  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataBytes, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16); // fmt chunk size
  buffer.writeUInt16LE(1, 20); // PCM
  buffer.writeUInt16LE(1, 22); // mono
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * 2, 28); // byte rate
  buffer.writeUInt16LE(2, 32); // block align
  buffer.writeUInt16LE(16, 34); // bits per sample
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataBytes, 40);

  for (let i = 0; i < pcm.length; i++) {
    buffer.writeInt16LE(pcm[i], WAV_HEADER_BYTES + i * 2);
  }

  return buffer;
}
