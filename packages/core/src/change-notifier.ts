import { EventEmitter } from 'events';

const CHANGED_EVENT = 'changed';

export type ChangeListener<TEvent> = (event: TEvent) => void;

/**
 * Synchronous fan-out of change events. Listeners run on the caller's stack,
 * in subscription order, during the call that raised the change.
 */
export class ChangeNotifier<TEvent> {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  /**
   * Subscribe to changes. Returns a function that removes the listener.
   */
  public subscribe(listener: ChangeListener<TEvent>): () => void {
    this.emitter.on(CHANGED_EVENT, listener);
    return () => {
      this.emitter.off(CHANGED_EVENT, listener);
    };
  }

  public emit(event: TEvent): void {
    this.emitter.emit(CHANGED_EVENT, event);
  }

  public clear(): void {
    this.emitter.removeAllListeners(CHANGED_EVENT);
  }
}
