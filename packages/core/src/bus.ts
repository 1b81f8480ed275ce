import { v7 as uuidv7 } from "uuid";
import type {
  EventBus,
  AgentEvent,
  AgentId,
  EventFilter,
  EventHandler,
  Subscription,
  EventTopic,
  TraceContext,
  EventId,
  SpanId,
  TraceId,
} from "@salvage/types";
import { createLogger, type Logger } from "./logger.js";

interface Subscriber {
  filter: EventFilter;
  handler: EventHandler<unknown>;
  id: string;
}

/**
 * In-memory event bus.
 * `publish` resolves once every matching handler has settled.
 */
export class InMemoryEventBus implements EventBus {
  private subscribers = new Set<Subscriber>();
  private readonly log: Logger;

  constructor(log: Logger = createLogger("bus")) {
    this.log = log;
  }

  async publish<T>(event: AgentEvent<T>): Promise<void> {
    const promises: Promise<void>[] = [];

    for (const sub of this.subscribers) {
      if (this.matches(event, sub.filter)) {
        try {
          const result = sub.handler(event);
          if (result instanceof Promise) {
            promises.push(result);
          }
        } catch (err) {
          this.reportHandlerError(event, sub, err);
        }
      }
    }

    const settled = await Promise.allSettled(promises);
    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        this.log.error("Event handler rejected", {
          topic: event.topic,
          eventId: event.id,
          error: String(outcome.reason),
        });
      }
    }
  }

  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription {
    const id = uuidv7();
    // Handlers declare the payload type they expect for the topics they filter on.
    const sub: Subscriber = { filter, handler: handler as EventHandler<unknown>, id };
    this.subscribers.add(sub);

    return {
      id,
      unsubscribe: () => {
        this.subscribers.delete(sub);
      },
    };
  }

  request<TReq, TRes>(
    event: AgentEvent<TReq>,
    replyFilter: EventFilter,
    timeoutMs: number
  ): Promise<AgentEvent<TRes>> {
    return new Promise((resolve, reject) => {
      let sub: Subscription | undefined;
      const timeout = setTimeout(() => {
        sub?.unsubscribe();
        reject(new Error(`Timeout waiting for response to event ${event.id}`));
      }, timeoutMs);

      const handler: EventHandler<TRes> = (replyEvent) => {
        clearTimeout(timeout);
        sub?.unsubscribe();
        resolve(replyEvent);
      };

      sub = this.subscribe(replyFilter, handler);
      this.publish(event).catch((err: unknown) => {
        clearTimeout(timeout);
        sub?.unsubscribe();
        reject(err);
      });
    });
  }

  /** Number of live subscriptions. */
  get size(): number {
    return this.subscribers.size;
  }

  private reportHandlerError(event: AgentEvent, sub: Subscriber, err: unknown): void {
    this.log.error("Event handler threw", {
      topic: event.topic,
      eventId: event.id,
      subscriptionId: sub.id,
      error: err instanceof Error ? err.message : String(err),
    });
  }

  private matches(event: AgentEvent, filter: EventFilter): boolean {
    if (filter.topics && filter.topics.length > 0 && !filter.topics.includes(event.topic)) {
      return false;
    }
    if (filter.sourceAgentId && event.sourceAgentId !== filter.sourceAgentId) {
      return false;
    }
    if (filter.targetAgentId && event.targetAgentId !== filter.targetAgentId) {
      return false;
    }
    if (filter.predicate && !filter.predicate(event)) {
      return false;
    }
    return true;
  }
}

/**
 * Helper to create a new event with a fresh ID and timestamp.
 */
export function createEvent<T>(
  topic: EventTopic,
  payload: T,
  traceCtx: TraceContext,
  sourceAgentId?: AgentId,
  targetAgentId?: AgentId
): AgentEvent<T> {
  return {
    id: uuidv7() as EventId,
    topic,
    payload,
    traceCtx,
    timestamp: new Date().toISOString(),
    sourceAgentId,
    targetAgentId,
  };
}

/**
 * Helper to create a trace context: a root one, or a child span of `parent`.
 */
export function createTraceContext(parent?: TraceContext): TraceContext {
  if (parent) {
    return {
      traceId: parent.traceId,
      spanId: uuidv7() as SpanId,
      parentSpanId: parent.spanId,
    };
  }
  return {
    traceId: uuidv7() as TraceId,
    spanId: uuidv7() as SpanId,
  };
}
