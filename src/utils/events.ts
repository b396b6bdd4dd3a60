import { EventEmitter } from 'events';
import { ScopedLogger } from './logger';
import { errorMessage } from '../types/errors';

/**
 * Event emitter with one typed payload per event.
 * A listener that throws is logged and does not affect the emitter or other listeners.
 */
export class TypedEmitter<Events extends object> {
  private readonly emitter = new EventEmitter();

  constructor(protected readonly log: ScopedLogger) {}

  /**
   * Subscribe to an event; returns an unsubscribe function
   */
  on<E extends keyof Events & string>(event: E, listener: (payload: Events[E]) => void): () => void {
    const guarded = (payload: Events[E]): void => {
      try {
        listener(payload);
      } catch (error) {
        this.log.error(`Listener for "${event}" failed: ${errorMessage(error)}`);
      }
    };

    this.emitter.on(event, guarded);
    return () => {
      this.emitter.off(event, guarded);
    };
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }

  protected emit<E extends keyof Events & string>(event: E, payload: Events[E]): void {
    this.emitter.emit(event, payload);
  }
}
