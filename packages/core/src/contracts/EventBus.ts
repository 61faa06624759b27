/**
 * @fileoverview EventBus Contract
 *
 * Internal event flow of the preprocess pipeline. Subscribers observe
 * progress without the pipeline knowing about them.
 *
 * Design decisions:
 * - Synchronous dispatch
 * - In-memory implementation (no external queue dependency)
 * - Ordering is preserved within a single event type
 *
 * @module @textmill/core/contracts/EventBus
 */

/**
 * Event payload base interface.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Run ID for correlation */
    readonly runId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Pipeline lifecycle event types.
 */
export type PipelineEventType =
    | "pipeline:started"
    | "pipeline:finished"
    | "step:started"
    | "step:finished";

/**
 * Per-document event types.
 */
export type DocumentEventType =
    | "document:preprocessed"
    | "document:skipped"
    | "document:failed";

/**
 * All known event types.
 */
export type EventType = PipelineEventType | DocumentEventType;

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("document:failed", (event) => {
 *     console.log("Rejected:", event.data);
 * });
 *
 * bus.emit(createEvent("document:failed", { documentId: "doc-1", step: "tagging" }));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type ("*" for all events).
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe to the next event of a type only.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for an event type (everything when omitted or "*").
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Build an event payload stamped with the current time.
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    runId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        runId,
        data,
    };
}
