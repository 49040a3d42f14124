import { randomUUID } from 'crypto';

import type { Decision, OrderAlert } from '@core/interfaces/index.js';

import { logger } from '@utils/logger.js';

import {
  SlideGesture,
  type DragResult,
  type ReleaseResult,
  type SlideGeometry,
} from './slide-gesture.js';
import { buildSurfaceView, SLIDE_HINT, type SurfaceView, type ViewFormat } from './surface.view.js';

export type DecisionListener = (orderId: string, decision: Decision) => void;

export interface SurfaceOptions {
  geometry: SlideGeometry;
  format: ViewFormat;
}

interface Carried {
  id: string;
  gesture: SlideGesture;
  latched: boolean;
}

/**
 * Detail view of the active alert with its slide-to-decide control. Holds no
 * state worth keeping: it can be rebuilt from the alert at any time.
 */
export class PresentationSurface {
  readonly id: string;
  private readonly gesture: SlideGesture;
  private latched: boolean;
  private closed = false;

  constructor(
    readonly alert: OrderAlert,
    private readonly options: SurfaceOptions,
    private readonly onDecision: DecisionListener,
    carried?: Carried,
  ) {
    this.id = carried?.id ?? randomUUID();
    this.gesture = carried?.gesture ?? new SlideGesture(options.geometry);
    this.latched = carried?.latched ?? false;
  }

  get orderId(): string {
    return this.alert.orderId;
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  /** Same order, newer content: keeps the id, the thumb position and the latch. */
  withContent(alert: OrderAlert): PresentationSurface {
    if (alert.orderId !== this.orderId) {
      return new PresentationSurface(alert, this.options, this.onDecision);
    }
    this.closed = true;
    return new PresentationSurface(alert, this.options, this.onDecision, {
      id: this.id,
      gesture: this.gesture,
      latched: this.latched,
    });
  }

  view(): SurfaceView {
    return buildSurfaceView(
      this.id,
      this.alert,
      {
        ...this.gesture.state,
        hint: SLIDE_HINT,
        maxSlide: this.gesture.maxSlide,
        threshold: this.gesture.threshold,
      },
      this.options.format,
    );
  }

  drag(offset: number): DragResult {
    if (this.closed || this.latched) {
      return { ignored: true, offset: this.gesture.state.offset, tint: { direction: 'neutral', intensity: 0 } };
    }
    return this.gesture.drag(offset);
  }

  release(): ReleaseResult {
    if (this.closed || this.latched) {
      return { outcome: 'ignored', settleTo: this.gesture.state.offset };
    }
    const result = this.gesture.release();
    if (result.outcome === 'accepted' || result.outcome === 'rejected') {
      this.latched = true;
      logger.info('[surface] decision captured', { orderId: this.orderId, decision: result.outcome });
      this.onDecision(this.orderId, result.outcome);
    }
    return result;
  }

  close(): void {
    this.closed = true;
  }
}
