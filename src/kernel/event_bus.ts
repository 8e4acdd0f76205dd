import type { RobotEvent } from './types';

// ── Typed events ──────────────────────────────────────────────────────────────
//
// Every event name and its payload type is declared once here, so a misspelled
// event or a wrong payload shape is a compile error rather than a silent no-op.

export interface TeleopEvents {
    /** KeyboardController → Orchestrator: the control session is over. */
    'SESSION_TERMINATE': { reason: 'quit_chord' | 'input_closed' | 'controller_failed' | 'stop_requested' };
    /** EventRouter → listeners: an armor hit forced the chassis to zero. */
    'SAFETY_STOP'      : { event: RobotEvent; at: number };
    /** Worker base → Orchestrator/listeners: a worker loop ended by throwing. */
    'WORKER_FAILED'    : { worker: string; error: unknown };
}

export type EventCallback<T> = (data: T) => void;

/**
 * Isolating typed event bus. One instance per orchestrator, handed to every
 * worker through WorkerContext.
 */
export class EventBus<M extends object = TeleopEvents> {
    private readonly listeners: Map<keyof M, Set<EventCallback<never>>> = new Map();

    /** Returns the matching unsubscribe function. */
    public subscribe<K extends keyof M>(event: K, callback: EventCallback<M[K]>): () => void {
        let set = this.listeners.get(event);
        if (!set) {
            set = new Set();
            this.listeners.set(event, set);
        }
        set.add(callback);
        return () => this.unsubscribe(event, callback);
    }

    public unsubscribe<K extends keyof M>(event: K, callback: EventCallback<M[K]>): void {
        this.listeners.get(event)?.delete(callback);
    }

    /** Returns false when nobody was listening. */
    public publish<K extends keyof M>(event: K, data: M[K]): boolean {
        const set = this.listeners.get(event);
        if (!set || set.size === 0) return false;
        for (const cb of Array.from(set) as EventCallback<M[K]>[]) cb(data);
        return true;
    }

    public listenerCount<K extends keyof M>(event: K): number {
        return this.listeners.get(event)?.size ?? 0;
    }
}
