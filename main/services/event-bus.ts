import { getLogger } from "./logger";

type EventName<EventMap> = Extract<keyof EventMap, string>;

export type EventHandler<Payload> = (payload: Payload) => void | Promise<void>;

const logger = getLogger("event-bus");

/**
 * Typed in-process pub/sub.
 *
 * Each handler runs isolated: a synchronous throw or a rejected promise is
 * logged and the remaining handlers still run.
 */
export class TypedEventBus<EventMap extends object> {
  private readonly listeners = new Map<string, Set<EventHandler<unknown>>>();

  constructor(private readonly name: string) {}

  on<K extends EventName<EventMap>>(eventName: K, handler: EventHandler<EventMap[K]>): () => void {
    const set = this.listeners.get(eventName) ?? new Set<EventHandler<unknown>>();
    set.add(handler as EventHandler<unknown>);
    this.listeners.set(eventName, set);

    return () => {
      this.off(eventName, handler);
    };
  }

  private off<K extends EventName<EventMap>>(eventName: K, handler: EventHandler<EventMap[K]>): void {
    const set = this.listeners.get(eventName);
    if (!set) {
      return;
    }
    set.delete(handler as EventHandler<unknown>);
    if (set.size === 0) {
      this.listeners.delete(eventName);
    }
  }

  emit<K extends EventName<EventMap>>(eventName: K, payload: EventMap[K]): void {
    const set = this.listeners.get(eventName);
    if (!set || set.size === 0) {
      return;
    }

    for (const handler of [...set]) {
      try {
        const result = handler(payload);
        void Promise.resolve(result).catch((error: unknown) => {
          logger.error(
            { error, eventName, bus: this.name },
            "Unhandled async error (Promise rejection) thrown by event handler"
          );
        });
      } catch (error) {
        logger.error({ error, eventName, bus: this.name }, "Unhandled error thrown by event handler");
      }
    }
  }
}
