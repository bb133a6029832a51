import {
  createEvent,
  type AssistantEvent,
  type EventPayloads,
  type EventType,
} from "./events.js";

/** Sink the router and agent report progress into. */
export interface Notifier {
  notify<K extends EventType>(type: K, data: EventPayloads[K]): void;
}

/** Handlers may be async; rejections are logged, never propagated. */
export type EventHandler<K extends EventType = EventType> = (
  event: AssistantEvent<K>,
) => unknown;

interface Subscription<K extends EventType> {
  handler: EventHandler<K>;
  once: boolean;
}

type SubscriptionTable = {
  [K in EventType]?: Array<Subscription<K>>;
};

const HISTORY_LIMIT = 100;

/** Notifier that drops everything. */
export const silentNotifier: Notifier = {
  notify() {},
};

/**
 * In-process publish/subscribe bus. Components get it injected; one
 * failing handler never stops the others.
 */
export class EventBus implements Notifier {
  private handlers: SubscriptionTable = {};
  private wildcard: EventHandler[] = [];
  private recent: AssistantEvent[] = [];

  /** Subscribe to an event type. Returns an unsubscribe function. */
  on<K extends EventType>(type: K, handler: EventHandler<K>): () => void {
    this.add(type, { handler, once: false });
    return () => this.off(type, handler);
  }

  /** Subscribe for the next event of a type only. */
  once<K extends EventType>(type: K, handler: EventHandler<K>): void {
    this.add(type, { handler, once: true });
  }

  off<K extends EventType>(type: K, handler: EventHandler<K>): void {
    const table: { [P in K]?: Array<Subscription<P>> } = this.handlers;
    const subs: Array<Subscription<K>> = table[type] ?? [];
    table[type] = subs.filter((s) => s.handler !== handler);
  }

  /** Subscribe to every event. Returns an unsubscribe function. */
  onAny(handler: EventHandler): () => void {
    this.wildcard.push(handler);
    return () => {
      this.wildcard = this.wildcard.filter((h) => h !== handler);
    };
  }

  notify<K extends EventType>(type: K, data: EventPayloads[K], source = "system"): void {
    const event = createEvent(type, data, source);
    this.recent.push(event);
    if (this.recent.length > HISTORY_LIMIT) {
      this.recent.splice(0, this.recent.length - HISTORY_LIMIT);
    }

    const table: { [P in K]?: Array<Subscription<P>> } = this.handlers;
    const subs: Array<Subscription<K>> = table[type] ?? [];
    if (subs.some((s) => s.once)) {
      table[type] = subs.filter((s) => !s.once);
    }

    for (const sub of subs) {
      this.invoke(type, () => sub.handler(event));
    }
    for (const handler of this.wildcard) {
      this.invoke(type, () => handler(event));
    }
  }

  /** Most recent events, oldest first, optionally filtered by type. */
  history(type?: EventType, limit = 20): AssistantEvent[] {
    const events = type ? this.recent.filter((e) => e.type === type) : this.recent;
    return events.slice(-limit);
  }

  listenerCount(type: EventType): number {
    return (this.handlers[type]?.length ?? 0) + this.wildcard.length;
  }

  clear(): void {
    this.handlers = {};
    this.wildcard = [];
    this.recent = [];
  }

  private add<K extends EventType>(type: K, sub: Subscription<K>): void {
    const table: { [P in K]?: Array<Subscription<P>> } = this.handlers;
    const subs: Array<Subscription<K>> = table[type] ?? [];
    table[type] = [...subs, sub];
  }

  private invoke(type: EventType, call: () => unknown): void {
    try {
      const result = call();
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          console.error(`[bus] async handler for ${type} failed:`, err);
        });
      }
    } catch (err) {
      console.error(`[bus] handler for ${type} failed:`, err);
    }
  }
}
