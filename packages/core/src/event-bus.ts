import type { EventBus, EventMap, EventHandler, EventName, Logger } from "@conductor/sdk";
import { abortable } from "./abort";
import { createLogger, errorMessage } from "./logger";

type WildcardHandler = (event: EventName, payload: EventMap[EventName]) => void | Promise<void>;

type HandlerTable = {
  [K in EventName]?: Set<EventHandler<EventMap[K]>>;
};

const log = createLogger("event-bus");

/**
 * In-process observability sink. Handlers for one emit run in subscription
 * order; a throwing handler is logged and does not stop the others.
 */
export class TypedEventBus implements EventBus {
  private handlers: HandlerTable = {};
  private wildcardHandlers = new Set<WildcardHandler>();

  on<K extends EventName>(event: K, handler: EventHandler<EventMap[K]>): void {
    this.handlersFor(event).add(handler);
  }

  off<K extends EventName>(event: K, handler: EventHandler<EventMap[K]>): void {
    this.handlersFor(event).delete(handler);
  }

  async emit<K extends EventName>(event: K, payload: EventMap[K]): Promise<void> {
    for (const handler of [...this.handlersFor(event)]) {
      try {
        await handler(payload);
      } catch (err) {
        log.error(`Error in event handler for "${event}": ${errorMessage(err)}`);
      }
    }

    for (const handler of [...this.wildcardHandlers]) {
      try {
        await handler(event, payload);
      } catch (err) {
        log.error(`Error in wildcard handler for "${event}": ${errorMessage(err)}`);
      }
    }
  }

  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  listenerCount(event: EventName): number {
    return this.handlersFor(event).size + this.wildcardHandlers.size;
  }

  removeAll(): void {
    this.handlers = {};
    this.wildcardHandlers.clear();
  }

  private handlersFor<K extends EventName>(event: K): Set<EventHandler<EventMap[K]>> {
    const table: { [P in K]?: Set<EventHandler<EventMap[P]>> } = this.handlers;
    const existing: Set<EventHandler<EventMap[K]>> | undefined = table[event];
    if (existing) return existing;
    const created = new Set<EventHandler<EventMap[K]>>();
    table[event] = created;
    return created;
  }
}

/**
 * Emits on `events` and waits for the handlers only while `signal` is live.
 * Delivery always starts; once the signal aborts the caller moves on and the
 * handlers finish in the background. Sink failures are logged, never thrown.
 */
export async function publish<K extends EventName>(
  events: EventBus,
  event: K,
  payload: EventMap[K],
  signal: AbortSignal | undefined,
  logger: Logger,
): Promise<void> {
  let delivery: Promise<void>;
  try {
    delivery = events.emit(event, payload);
  } catch (err) {
    delivery = Promise.reject(err);
  }
  const settled = delivery.catch((err: unknown) => {
    logger.error(`Failed to emit "${event}": ${errorMessage(err)}`);
  });

  if (!signal) return settled;
  if (signal.aborted) return;
  try {
    await abortable(() => settled, signal);
  } catch (err) {
    logger.debug(`Stopped waiting for "${event}" handlers: ${errorMessage(err)}`);
  }
}
