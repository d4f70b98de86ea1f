import { EventEmitter } from 'eventemitter3';

/** Typed in-process event bus keyed by an event map. */
export class EventBus<Events extends Record<string, unknown>> {
  private emitter = new EventEmitter();

  on<K extends keyof Events & string>(event: K, listener: (data: Events[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof Events & string>(event: K, listener: (data: Events[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof Events & string>(event: K, listener: (data: Events[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof Events & string>(event: K, data: Events[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount(event: keyof Events & string): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
