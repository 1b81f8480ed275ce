import type { AgentId, EventId, Timestamp } from "./foundational.js";
import type { TraceContext } from "./observability.js";

/**
 * Every message flowing between the agent and its callers is an `AgentEvent`.
 *
 * @typeParam T - The topic-specific payload type.
 */
export interface AgentEvent<T = unknown> {
  readonly id: EventId;
  readonly topic: EventTopic;
  readonly payload: T;
  readonly traceCtx: TraceContext;
  readonly timestamp: Timestamp;
  /** Source agent. Absent for external events. */
  readonly sourceAgentId?: AgentId;
  /** Target agent. Absent for broadcast events. */
  readonly targetAgentId?: AgentId;
}

/**
 * Enumerated event topics.
 * Using a string union rather than a numeric enum for debuggability.
 */
export type EventTopic =
  // Lifecycle
  | "agent.turn"
  | "agent.complete"
  | "agent.error"
  // Tool calls
  | "tool.request"
  | "tool.result";

/** Payload of `agent.turn`. */
export interface TurnPayload {
  readonly message: string;
}

/** Payload of `tool.request`. */
export interface ToolRequestPayload {
  readonly callId: string;
  readonly toolName: string;
  readonly argumentsPayload: string;
}

/** Payload of `agent.error`. */
export interface AgentErrorPayload {
  readonly code: string;
  readonly error: string;
}

/**
 * Predicate for filtering which events a subscriber receives.
 */
export interface EventFilter {
  /** Match specific topics. If empty, matches all topics. */
  readonly topics?: EventTopic[];
  /** Only events originating from this agent. */
  readonly sourceAgentId?: AgentId;
  /** Only events targeted at this agent. */
  readonly targetAgentId?: AgentId;
  /** Custom predicate for advanced filtering. */
  readonly predicate?: (event: AgentEvent) => boolean;
}

/** Callback signature for event subscribers. */
export type EventHandler<T = unknown> = (event: AgentEvent<T>) => void | Promise<void>;

/** Returned when subscribing; used to unsubscribe. */
export interface Subscription {
  readonly id: string;
  unsubscribe(): void;
}

export interface EventBus {
  /** Publish an event to all matching subscribers. */
  publish<T>(event: AgentEvent<T>): Promise<void>;

  /**
   * Subscribe to events matching the filter.
   * The payload type is the subscriber's claim; the bus does not check it.
   */
  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription;

  /** Publish and wait for a single response event matching the reply filter. */
  request<TReq, TRes>(
    event: AgentEvent<TReq>,
    replyFilter: EventFilter,
    timeoutMs: number,
  ): Promise<AgentEvent<TRes>>;
}
