import { ValidationError } from '@core/errors/validation.error.js';
import type { Decision } from '@core/interfaces/index.js';

export interface SlideGeometry {
  trackWidth: number;
  thumbSize: number;
  padding: number;
  /** fraction of the maximum travel that commits a decision */
  thresholdRatio: number;
}

export type GesturePhase = 'idle' | 'dragging' | 'committed';

export interface Tint {
  direction: 'accept' | 'reject' | 'neutral';
  intensity: number;
}

export interface GestureState {
  phase: GesturePhase;
  offset: number;
  decision: Decision | null;
}

export interface DragResult {
  ignored: boolean;
  offset: number;
  tint: Tint;
}

export type ReleaseResult =
  | { outcome: Decision; settleTo: number }
  | { outcome: 'none'; settleTo: 0 }
  | { outcome: 'ignored'; settleTo: number };

// tint starts once the thumb is this far from the centre
const TINT_START = 0.3;

/**
 * Slide-to-decide control: a thumb centred on a track, right accepts, left
 * rejects. Pure geometry, fed with offsets relative to the track centre.
 */
export class SlideGesture {
  readonly maxSlide: number;
  readonly threshold: number;

  private phase: GesturePhase = 'idle';
  private offset = 0;
  private decision: Decision | null = null;

  constructor(geometry: SlideGeometry) {
    const maxSlide = (geometry.trackWidth - geometry.thumbSize - geometry.padding * 2) / 2;
    if (!(maxSlide > 0)) {
      throw new ValidationError('Slide track is too narrow for its thumb');
    }
    if (!(geometry.thresholdRatio > 0 && geometry.thresholdRatio <= 1)) {
      throw new ValidationError('Slide threshold ratio must be within (0, 1]');
    }
    this.maxSlide = maxSlide;
    this.threshold = maxSlide * geometry.thresholdRatio;
  }

  get state(): GestureState {
    return { phase: this.phase, offset: this.offset, decision: this.decision };
  }

  drag(offset: number): DragResult {
    if (this.phase === 'committed' || !Number.isFinite(offset)) {
      return { ignored: true, offset: this.offset, tint: this.tint() };
    }
    this.phase = 'dragging';
    this.offset = Math.min(this.maxSlide, Math.max(-this.maxSlide, offset));
    return { ignored: false, offset: this.offset, tint: this.tint() };
  }

  release(): ReleaseResult {
    if (this.phase === 'committed') {
      return { outcome: 'ignored', settleTo: this.offset };
    }
    if (this.offset >= this.threshold) {
      return this.commit('accepted', this.maxSlide);
    }
    if (this.offset <= -this.threshold) {
      return this.commit('rejected', -this.maxSlide);
    }
    this.phase = 'idle';
    this.offset = 0;
    return { outcome: 'none', settleTo: 0 };
  }

  private commit(decision: Decision, settleTo: number): ReleaseResult {
    this.phase = 'committed';
    this.decision = decision;
    this.offset = settleTo;
    return { outcome: decision, settleTo };
  }

  private tint(): Tint {
    const intensity = Math.min(1, Math.abs(this.offset) / this.maxSlide);
    if (this.offset > this.maxSlide * TINT_START) return { direction: 'accept', intensity };
    if (this.offset < -this.maxSlide * TINT_START) return { direction: 'reject', intensity };
    return { direction: 'neutral', intensity: 0 };
  }
}
