/**
 * Tests for the turn recorder state machine
 */
import { RecorderState, TurnRecorder } from '../../src/voice/turn-recorder';
import { AudioFrame, Utterance } from '../../src/types/audio';
import { metrics } from '../../src/metrics/metrics';
import { FRAME_MS, repeat, silence, speech } from '../helpers';

function feed(recorder: TurnRecorder, frames: AudioFrame[]): Utterance[] {
  const emitted: Utterance[] = [];
  for (const frame of frames) {
    const utterance = recorder.push(frame);
    if (utterance) emitted.push(utterance);
  }
  return emitted;
}

describe('TurnRecorder', () => {
  it('should reject non-positive thresholds', () => {
    expect(() => new TurnRecorder({ silenceThresholdMs: 0, maxDurationMs: 1000 })).toThrow(RangeError);
    expect(() => new TurnRecorder({ silenceThresholdMs: 300, maxDurationMs: -1 })).toThrow(RangeError);
  });

  it('should reject thresholds that are not finite numbers', () => {
    expect(() => new TurnRecorder({ silenceThresholdMs: 300, maxDurationMs: NaN })).toThrow(RangeError);
    expect(() => new TurnRecorder({ silenceThresholdMs: NaN, maxDurationMs: 1000 })).toThrow(RangeError);
    expect(() => new TurnRecorder({ silenceThresholdMs: 300, maxDurationMs: Infinity })).toThrow(RangeError);
  });

  describe.each([90, 300, 1000])('with a %ims silence threshold', (silenceThresholdMs) => {
    const framesToEnd = Math.ceil(silenceThresholdMs / FRAME_MS);

    it('should emit the two speech frames and exclude trailing silence', () => {
      const recorder = new TurnRecorder({ silenceThresholdMs, maxDurationMs: 30000 });
      const first = speech();
      const second = speech();

      const emitted = feed(recorder, [silence(), first, second, ...repeat(silence, framesToEnd)]);

      expect(emitted).toHaveLength(1);
      expect(emitted[0].frames).toEqual([first, second]);
      expect(emitted[0].speechFrameCount).toBe(2);
      expect(emitted[0].durationMs).toBe(2 * FRAME_MS);
      expect(emitted[0].reason).toBe('silence');
      expect(recorder.state).toBe('IDLE');
    });

    it('should keep recording while silence is below the threshold', () => {
      const recorder = new TurnRecorder({ silenceThresholdMs, maxDurationMs: 30000 });

      const emitted = feed(recorder, [speech(), ...repeat(silence, framesToEnd - 1)]);

      expect(emitted).toEqual([]);
      expect(recorder.state).toBe('TRAILING_SILENCE');
      expect(recorder.bufferedFrames).toBe(framesToEnd);
    });

    it('should emit nothing when no frame contains speech', () => {
      const recorder = new TurnRecorder({ silenceThresholdMs, maxDurationMs: 30000 });

      expect(feed(recorder, repeat(silence, 200))).toEqual([]);
      expect(recorder.state).toBe('IDLE');
    });
  });

  it('should split a stream into fewer turns as the threshold grows', () => {
    const stream = [
      speech(), ...repeat(silence, 5),
      speech(), ...repeat(silence, 12),
      speech(), ...repeat(silence, 40),
    ];

    const counts = [90, 300, 1000, 2000].map(silenceThresholdMs =>
      feed(new TurnRecorder({ silenceThresholdMs, maxDurationMs: 30000 }), stream).length,
    );

    expect(counts).toEqual([3, 2, 1, 0]);
  });

  it('should keep pauses followed by speech inside the utterance', () => {
    const recorder = new TurnRecorder({ silenceThresholdMs: 300, maxDurationMs: 30000 });

    const [utterance] = feed(recorder, [speech(), ...repeat(silence, 5), speech(), ...repeat(silence, 10)]);

    expect(utterance.frames).toHaveLength(7);
    expect(utterance.speechFrameCount).toBe(2);
    expect(utterance.durationMs).toBe(7 * FRAME_MS);
  });

  it('should force a cutoff at the duration cap during continuous speech', () => {
    const transitions: [RecorderState, RecorderState][] = [];
    const recorder = new TurnRecorder({
      silenceThresholdMs: 1000,
      maxDurationMs: 300,
      onTransition: (from, to) => transitions.push([from, to]),
    });

    const results = repeat(speech, 10).map(frame => recorder.push(frame));

    expect(results.slice(0, 9).every(result => result === null)).toBe(true);
    expect(results[9]?.reason).toBe('max_duration');
    expect(results[9]?.frames).toHaveLength(10);
    expect(recorder.state).toBe('IDLE');
    expect(transitions).toEqual([
      ['IDLE', 'RECORDING'],
      ['RECORDING', 'EMITTED'],
      ['EMITTED', 'IDLE'],
    ]);
  });

  it('should apply the duration cap during trailing silence', () => {
    const recorder = new TurnRecorder({ silenceThresholdMs: 1000, maxDurationMs: 300 });

    const emitted = feed(recorder, [...repeat(speech, 5), ...repeat(silence, 5)]);

    expect(emitted).toHaveLength(1);
    expect(emitted[0].reason).toBe('max_duration');
    expect(emitted[0].frames).toHaveLength(5);
  });

  it('should start a fresh utterance after emitting', () => {
    const recorder = new TurnRecorder({ silenceThresholdMs: 60, maxDurationMs: 30000 });

    const emitted = feed(recorder, [speech(), silence(), silence(), speech(), speech(), silence(), silence()]);

    expect(emitted.map(utterance => utterance.frames.length)).toEqual([1, 2]);
    expect(emitted[0].id).not.toBe(emitted[1].id);
  });

  describe('abort', () => {
    it('should discard a recording in progress', async () => {
      const recorder = new TurnRecorder({ silenceThresholdMs: 300, maxDurationMs: 30000 });
      feed(recorder, repeat(speech, 3));

      expect(recorder.abort()).toBe(true);
      expect(recorder.state).toBe('IDLE');
      expect(recorder.bufferedFrames).toBe(0);
      expect(feed(recorder, repeat(silence, 20))).toEqual([]);

      const aborted = await metrics.recordingsAborted.get();
      expect(aborted.values[0]?.value).toBe(1);
    });

    it('should discard trailing silence too', () => {
      const recorder = new TurnRecorder({ silenceThresholdMs: 300, maxDurationMs: 30000 });
      feed(recorder, [speech(), silence()]);

      expect(recorder.abort()).toBe(true);
      expect(feed(recorder, repeat(silence, 20))).toEqual([]);
    });

    it('should report when nothing was recording', () => {
      const recorder = new TurnRecorder({ silenceThresholdMs: 300, maxDurationMs: 30000 });

      expect(recorder.abort()).toBe(false);
    });
  });
});
