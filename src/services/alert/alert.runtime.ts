import type { DecisionConsumer, PendingDecision } from '@core/interfaces/index.js';

import type { MessageBus } from '@infra/bus/message-bus.js';

import { AlertingDriver } from '@services/feedback/alerting.driver.js';
import type { AlertingDriverOptions, AudioOutput, VibrationOutput } from '@services/feedback/feedback.types.js';
import { ActionRelay } from '@services/relay/action.relay.js';
import type { PendingDecisionStore } from '@services/relay/pending-decision.store.js';
import type { SurfaceOptions } from '@services/surface/presentation.surface.js';
import { SurfaceHost } from '@services/surface/surface.host.js';
import type { SurfaceView } from '@services/surface/surface.view.js';

import { AlertEffects } from './alert.effects.js';
import { AlertTransitions } from './alert.transitions.js';
import { DecisionHandler } from './decision.handler.js';
import { EventReceiver } from './event.receiver.js';
import { activeOrderId, AlertStateMachine } from './state-machine.js';
import { AlertStateStore } from './state.store.js';
import type { AlertStatus } from './state.types.js';

export interface AlertRuntimeOptions {
  bus: MessageBus;
  pendingStore: PendingDecisionStore;
  audio: AudioOutput;
  vibration: VibrationOutput;
  driver: AlertingDriverOptions;
  surface: SurfaceOptions;
  dedupWindowSec?: number;
  resolvedHistory?: number;
  store?: AlertStateStore;
}

export interface CurrentAlert {
  status: AlertStatus;
  orderId: string | null;
  version: number;
  surface: SurfaceView | null;
}

/** Wires the alert components around one state store and one bus. */
export class AlertRuntime {
  readonly store: AlertStateStore;
  readonly bus: MessageBus;
  readonly driver: AlertingDriver;
  readonly relay: ActionRelay;
  readonly surfaces: SurfaceHost;
  readonly receiver: EventReceiver;
  readonly decisions: DecisionHandler;

  constructor(options: AlertRuntimeOptions) {
    this.bus = options.bus;
    this.store = options.store ?? new AlertStateStore();
    this.driver = new AlertingDriver(options.audio, options.vibration, options.driver);
    this.relay = new ActionRelay(options.pendingStore);
    this.surfaces = new SurfaceHost(options.bus, options.surface);

    const machine = new AlertStateMachine(options.dedupWindowSec, options.resolvedHistory);
    const transitions = new AlertTransitions(this.store, machine);
    const effects = new AlertEffects(this.driver, options.bus, this.relay);
    this.receiver = new EventReceiver(transitions, effects);
    this.decisions = new DecisionHandler(transitions, effects);
  }

  start(): void {
    this.surfaces.listen();
    this.decisions.listen(this.bus);
  }

  current(): CurrentAlert {
    const { state, version } = this.store.getState();
    return {
      status: state.status,
      orderId: activeOrderId(state),
      version,
      surface: this.surfaces.currentSurface()?.view() ?? null,
    };
  }

  /** Quiets the ring without touching the alert itself. */
  async silence(): Promise<void> {
    await this.driver.stop();
  }

  attachConsumer(consumer: DecisionConsumer): Promise<PendingDecision | null> {
    return this.relay.attach(consumer);
  }

  async shutdown(): Promise<void> {
    this.decisions.dispose();
    this.surfaces.dispose();
    await this.driver.stop();
    await this.relay.settled();
  }
}
