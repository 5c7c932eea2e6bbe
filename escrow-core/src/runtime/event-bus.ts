import { EventEmitter } from 'events';
import { logger } from '../logger';
import { EscrowEventMap, EscrowEventName } from '../types/events';

/**
 * Telemetry for created, claimed, refunded, filled and cancelled objects.
 * Listeners observe transitions after they commit and cannot veto them.
 */
export class EscrowEventBus extends EventEmitter {
  /** Call every listener in turn; one failing does not stop the rest. */
  publish<K extends EscrowEventName>(name: K, payload: EscrowEventMap[K]): void {
    for (const listener of this.listeners(name)) {
      try {
        listener.call(this, payload);
      } catch (error) {
        logger.error(`Listener for ${name} failed on ${payload.id}`, error);
      }
    }
  }

  subscribe<K extends EscrowEventName>(
    name: K,
    listener: (payload: EscrowEventMap[K]) => void
  ): () => void {
    this.on(name, listener);
    return () => {
      this.off(name, listener);
    };
  }
}
