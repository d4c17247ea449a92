import { EventEmitter } from "events";
import type { EventBus, EventMap, EventTopic, Subscription } from "../../domain/events/EventBus";
import type { LoggerPort } from "../../ports/sys/LoggerPort";

export class SimpleEventBus implements EventBus {
  private readonly emitter = new EventEmitter();

  constructor(private readonly logger?: LoggerPort) {}

  publish<K extends EventTopic>(topic: K, payload: EventMap[K]): void {
    this.emitter.emit(topic, payload);
  }

  subscribe<K extends EventTopic>(topic: K, handler: (payload: EventMap[K]) => void): Subscription {
    const guarded = (payload: EventMap[K]) => {
      try {
        handler(payload);
      } catch (err) {
        this.reportFailure(topic, err);
      }
    };
    this.emitter.on(topic, guarded);

    return {
      unsubscribe: () => {
        this.emitter.off(topic, guarded);
      },
    };
  }

  listenerCount(topic: EventTopic): number {
    return this.emitter.listenerCount(topic);
  }

  private reportFailure(topic: string, err: unknown) {
    const message = `Event handler for topic ${topic} failed`;
    const error = err instanceof Error ? err.message : String(err);
    if (this.logger) {
      this.logger.warn(message, { error });
    } else {
      console.warn(`${message}:`, err);
    }
  }
}
