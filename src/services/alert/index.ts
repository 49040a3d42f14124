export * from './alert.runtime.js';
export * from './event.receiver.js';
export * from './decision.handler.js';
export * from './state-machine.js';
export { AlertStateStore } from './state.store.js';
export type {
  AlertStatus,
  AlertState,
  AlertSnapshot,
  AlertEvent,
  Effect,
  ResolvedOrder,
  TransitionOutcome,
} from './state.types.js';
