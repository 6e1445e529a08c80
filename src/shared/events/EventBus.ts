import type { DiscoveryAttempt, TrainingRecord } from '../../../types/index.js';

/**
 * Events published during discovery, keyed by name
 */
export interface DiscoveryEvents {
    'training-record': TrainingRecord;
    'attempt-finished': DiscoveryAttempt;
}

type EventHandler<T> = (data: T) => void | Promise<void>;

type HandlerMap = { [E in keyof DiscoveryEvents]: Array<EventHandler<DiscoveryEvents[E]>> };

/**
 * EventBus enables decoupled communication between the engine and its sinks.
 * One bus per run; attempts only publish.
 */
export class EventBus {
    private handlers: HandlerMap = {
        'training-record': [],
        'attempt-finished': [],
    };

    subscribe<E extends keyof DiscoveryEvents>(event: E, handler: EventHandler<DiscoveryEvents[E]>): void {
        this.handlers[event].push(handler);
    }

    /**
     * Publish an event. A failing handler is logged and does not affect the others.
     */
    async publish<E extends keyof DiscoveryEvents>(event: E, data: DiscoveryEvents[E]): Promise<void> {
        const eventHandlers = [...this.handlers[event]];

        await Promise.all(eventHandlers.map(async handler => {
            try {
                await handler(data);
            } catch (e) {
                console.error(`[EventBus] Error in handler for event ${event}:`, e);
            }
        }));
    }

    unsubscribe<E extends keyof DiscoveryEvents>(event: E, handler: EventHandler<DiscoveryEvents[E]>): void {
        const eventHandlers = this.handlers[event];
        const index = eventHandlers.indexOf(handler);
        if (index !== -1) {
            eventHandlers.splice(index, 1);
        }
    }

    clear(): void {
        this.handlers['training-record'] = [];
        this.handlers['attempt-finished'] = [];
    }
}
