import { describe, expect, it } from 'vitest';

import { ValidationError } from '@core/errors/validation.error.js';

import { SlideGesture } from '@services/surface/slide-gesture.js';

import { TEST_GEOMETRY } from '@test/utils/fakes.js';

describe('SlideGesture', () => {
  it('derives the travel and threshold from the track geometry', () => {
    const gesture = new SlideGesture(TEST_GEOMETRY);
    expect(gesture.maxSlide).toBe(144);
    expect(gesture.threshold).toBeCloseTo(50.4);
  });

  it('clamps drags to the track', () => {
    const gesture = new SlideGesture(TEST_GEOMETRY);
    expect(gesture.drag(500).offset).toBe(144);
    expect(gesture.drag(-500).offset).toBe(-144);
  });

  it('stays neutral close to the centre and tints beyond it', () => {
    const gesture = new SlideGesture(TEST_GEOMETRY);
    expect(gesture.drag(40).tint).toEqual({ direction: 'neutral', intensity: 0 });
    expect(gesture.drag(72).tint).toEqual({ direction: 'accept', intensity: 0.5 });
    expect(gesture.drag(-144).tint).toEqual({ direction: 'reject', intensity: 1 });
  });

  it('accepts past the right threshold and latches', () => {
    const gesture = new SlideGesture(TEST_GEOMETRY);
    gesture.drag(51);

    expect(gesture.release()).toEqual({ outcome: 'accepted', settleTo: 144 });
    expect(gesture.state).toEqual({ phase: 'committed', offset: 144, decision: 'accepted' });
    expect(gesture.drag(-100)).toEqual({ ignored: true, offset: 144, tint: { direction: 'accept', intensity: 1 } });
    expect(gesture.release()).toEqual({ outcome: 'ignored', settleTo: 144 });
  });

  it('rejects past the left threshold', () => {
    const gesture = new SlideGesture(TEST_GEOMETRY);
    gesture.drag(-60);
    expect(gesture.release()).toEqual({ outcome: 'rejected', settleTo: -144 });
  });

  it('springs back when released short of the threshold', () => {
    const gesture = new SlideGesture(TEST_GEOMETRY);
    gesture.drag(50);

    expect(gesture.release()).toEqual({ outcome: 'none', settleTo: 0 });
    expect(gesture.state).toEqual({ phase: 'idle', offset: 0, decision: null });
  });

  it('ignores non-finite offsets', () => {
    const gesture = new SlideGesture(TEST_GEOMETRY);
    expect(gesture.drag(Number.NaN).ignored).toBe(true);
    expect(gesture.state.offset).toBe(0);
  });

  it('refuses a track too narrow for the thumb', () => {
    expect(() => new SlideGesture({ ...TEST_GEOMETRY, trackWidth: 60 })).toThrow(ValidationError);
    expect(() => new SlideGesture({ ...TEST_GEOMETRY, thresholdRatio: 0 })).toThrow(ValidationError);
  });
});
