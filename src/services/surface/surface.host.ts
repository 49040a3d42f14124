import { ConflictError, NotFoundError } from '@core/errors/index.js';
import type { Decision, OrderAlert } from '@core/interfaces/index.js';

import type { MessageBus, Unsubscribe } from '@infra/bus/message-bus.js';

import { logger } from '@utils/logger.js';

import { PresentationSurface, type SurfaceOptions } from './presentation.surface.js';

/**
 * Keeps the one surface the operator sees in step with the bus signals and
 * forwards its decision back over the bus.
 */
export class SurfaceHost {
  private current: PresentationSurface | null = null;
  private subscriptions: Unsubscribe[] = [];

  constructor(
    private readonly bus: MessageBus,
    private readonly options: SurfaceOptions,
  ) {}

  listen(): void {
    if (this.subscriptions.length) return;
    this.subscriptions = [
      this.bus.subscribe('surface.present', ({ alert }) => {
        this.materialize(alert);
      }),
      this.bus.subscribe('surface.refresh', ({ alert }) => {
        this.refresh(alert);
      }),
      this.bus.subscribe('surface.close', ({ orderId }) => {
        this.close(orderId);
      }),
    ];
  }

  dispose(): void {
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
    this.close();
  }

  materialize(alert: OrderAlert): PresentationSurface {
    this.current?.close();
    const surface = new PresentationSurface(alert, this.options, (orderId, decision) =>
      this.report(surface.id, orderId, decision),
    );
    this.current = surface;
    logger.debug('[surface] materialized', { orderId: alert.orderId, surfaceId: surface.id });
    return surface;
  }

  refresh(alert: OrderAlert): PresentationSurface {
    if (!this.current || this.current.orderId !== alert.orderId) {
      return this.materialize(alert);
    }
    this.current = this.current.withContent(alert);
    return this.current;
  }

  /** Closes the current surface; with an order id, only if it shows that order. */
  close(orderId?: string): boolean {
    const surface = this.current;
    if (!surface) return false;
    if (orderId !== undefined && surface.orderId !== orderId) return false;
    surface.close();
    this.current = null;
    logger.debug('[surface] closed', { orderId: surface.orderId });
    return true;
  }

  currentSurface(): PresentationSurface | null {
    return this.current;
  }

  surfaceFor(surfaceId: string): PresentationSurface {
    const surface = this.current;
    if (!surface) throw new NotFoundError('No alert is being presented');
    if (surface.id !== surfaceId) {
      throw new ConflictError('Surface is no longer current', { surfaceId: surface.id });
    }
    return surface;
  }

  private report(surfaceId: string, orderId: string, decision: Decision): void {
    this.bus.publish('decision.captured', { orderId, decision, surfaceId }).catch((err: unknown) => {
      logger.error('[surface] failed to publish decision', { orderId, err });
    });
  }
}
