/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * @module @textmill/core/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import { consoleLogger, type Logger } from "../contracts/Logger.js";

/**
 * Synchronous in-memory EventBus.
 *
 * Handlers for "*" receive every event after the specific handlers. A
 * throwing handler is reported to the logger and does not stop the
 * others.
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();

    constructor(private readonly logger: Logger = consoleLogger) {}

    emit(event: EventPayload): void {
        this.dispatch(event, this.handlers.get(event.type));
        this.dispatch(event, this.handlers.get("*"));
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            handler(event);
        });
        return subscription;
    }

    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers for an event type. Useful for testing.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(event: EventPayload, handlers: Set<EventHandler> | undefined): void {
        if (!handlers) {
            return;
        }

        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                this.logger.error("EventBus handler error", {
                    eventType: event.type,
                    error    : error instanceof Error ? error.message : String(error),
                });
            }
        }
    }
}
