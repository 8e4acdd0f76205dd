import type { EventBus } from './event_bus';
import type { TeleopConfig } from './config';

export interface WorkerContext {
    eventBus: EventBus;
    config: TeleopConfig;
}

export type WorkerOutcome =
    | { worker: string; status: 'completed' }
    | { worker: string; status: 'failed'; error: unknown };

export interface Worker {
    readonly name: string;
    readonly version: string;

    // Lifecycle methods
    init(context: WorkerContext): Promise<void> | void;
    start(): Promise<void> | void;
    /** Request the loop to end. Does not wait; see join(). */
    stop(): Promise<void> | void;
    /** Settles once the loop has ended. Never rejects: a crash is a 'failed' outcome. */
    join(): Promise<WorkerOutcome>;
    destroy(): Promise<void> | void;
}

/**
 * Base for long-lived consumer/producer loops. Subclasses implement run() and
 * poll `signal` between bounded waits; stop() aborts the signal. A throw out
 * of run() ends only this worker: it is logged, published as WORKER_FAILED and
 * reported by join().
 */
export abstract class LoopWorker implements Worker {
    public abstract readonly name: string;
    public readonly version: string = '1.0.0';

    private context: WorkerContext | null = null;
    private controller: AbortController | null = null;
    private done: Promise<WorkerOutcome> | null = null;
    private finished = false;

    protected abstract run(signal: AbortSignal): Promise<void>;

    public init(context: WorkerContext): void {
        this.context = context;
    }

    public start(): void {
        if (this.done) {
            throw new Error(`[${this.name}] already started; workers are not restarted.`);
        }
        const controller = new AbortController();
        const signal = controller.signal;
        this.controller = controller;
        this.done = Promise.resolve()
            .then(() => this.run(signal))
            .then(
                (): WorkerOutcome => {
                    this.finished = true;
                    console.log(`[${this.name}] Loop finished`);
                    return { worker: this.name, status: 'completed' };
                },
                (error: unknown): WorkerOutcome => {
                    this.finished = true;
                    console.error(`[${this.name}] Loop crashed:`, error);
                    this.context?.eventBus.publish('WORKER_FAILED', { worker: this.name, error });
                    return { worker: this.name, status: 'failed', error };
                }
            );
    }

    public stop(): void {
        this.controller?.abort();
    }

    public join(): Promise<WorkerOutcome> {
        return this.done ?? Promise.resolve({ worker: this.name, status: 'completed' });
    }

    public destroy(): void {
        this.stop();
        this.context = null;
    }

    public isRunning(): boolean {
        return this.controller !== null && !this.finished && !this.controller.signal.aborted;
    }

    protected getContext(): WorkerContext {
        if (!this.context) {
            throw new Error(`[${this.name}] used before init(); register it with an Orchestrator first.`);
        }
        return this.context;
    }
}
