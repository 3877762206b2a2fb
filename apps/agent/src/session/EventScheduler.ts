// Event Scheduler
// Single decision loop. Producers enqueue events; the loop hands them to the
// dispatcher one at a time, never re-entering it.

import type { SessionEvent } from '@glimpse/contracts';
import { logError } from '../utils/errors.js';

export type EventDispatcher = (event: SessionEvent) => void;

/** Events that jump ahead of everything queued but not yet dispatched. */
const PRIORITY_EVENTS: ReadonlySet<SessionEvent['type']> = new Set(['user_interrupt']);

export class EventScheduler {
    private readonly priority: SessionEvent[] = [];
    private readonly queue: SessionEvent[] = [];
    private draining = false;
    private scheduled = false;
    private closed = false;
    private dispatched = 0;
    private idleWaiters: Array<() => void> = [];

    constructor(private readonly dispatcher: EventDispatcher) {}

    enqueue(event: SessionEvent): void {
        if (this.closed) {
            console.log(`[scheduler] Closed, dropping ${event.type}`);
            return;
        }

        if (PRIORITY_EVENTS.has(event.type)) {
            this.priority.push(event);
        } else {
            this.queue.push(event);
        }
        this.schedule();
    }

    /** Resolves once every queued event has been dispatched. */
    idle(): Promise<void> {
        if (this.isIdle()) {
            return Promise.resolve();
        }
        return new Promise(resolve => this.idleWaiters.push(resolve));
    }

    pending(): number {
        return this.priority.length + this.queue.length;
    }

    getDispatchedCount(): number {
        return this.dispatched;
    }

    /** Stop accepting events and drop what is queued. */
    close(): void {
        this.closed = true;
        this.priority.length = 0;
        this.queue.length = 0;
        this.notifyIdle();
    }

    private isIdle(): boolean {
        return !this.draining && !this.scheduled && this.pending() === 0;
    }

    private schedule(): void {
        // An enqueue from inside the dispatcher is picked up by the running drain
        if (this.scheduled || this.draining) {
            return;
        }
        this.scheduled = true;
        setImmediate(() => this.drain());
    }

    private drain(): void {
        this.scheduled = false;
        this.draining = true;
        try {
            let event = this.next();
            while (event) {
                this.dispatched++;
                try {
                    this.dispatcher(event);
                } catch (error) {
                    logError(error, `scheduler:${event.type}`);
                }
                event = this.next();
            }
        } finally {
            this.draining = false;
        }
        this.notifyIdle();
    }

    private next(): SessionEvent | undefined {
        return this.priority.shift() ?? this.queue.shift();
    }

    private notifyIdle(): void {
        if (!this.isIdle()) {
            return;
        }
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) {
            resolve();
        }
    }
}
