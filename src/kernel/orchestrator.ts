import { EventBus, type TeleopEvents } from './event_bus';
import { DEFAULT_CONFIG, type TeleopConfig } from './config';
import type { Worker, WorkerContext, WorkerOutcome } from './worker';

// ── Lifecycle FSM ──────────────────────────────────────────────────────────────
//
// Valid transitions:
//   CREATED     → initAll()    → INITIALIZED
//   INITIALIZED → startAll()   → RUNNING
//   RUNNING     → stopAll()    → STOPPED      (stop requested, every worker joined)
//   STOPPED     → destroyAll() → DESTROYED
//   any state   → destroyAll() → DESTROYED    (emergency teardown always works)
//   DESTROYED   → (terminal)
//
// Workers are never restarted: a worker that crashed stays down until the
// session ends. Restart policy belongs to whatever supervises the process.

export type OrchestratorState = 'CREATED' | 'INITIALIZED' | 'RUNNING' | 'STOPPED' | 'DESTROYED';

export type TerminateReason = TeleopEvents['SESSION_TERMINATE']['reason'];

export interface SessionReport {
    reason: TerminateReason;
    outcomes: WorkerOutcome[];
}

/** Thrown when an Orchestrator lifecycle method is called in the wrong state. */
export class LifecycleGateError extends Error {
    constructor(method: string, current: OrchestratorState, allowed: OrchestratorState[]) {
        super(
            `[Orchestrator] LIFECYCLE GATE: ${method}() requires state ${allowed.join(' or ')},` +
            ` but orchestrator is in state ${current}.\n` +
            `  Correct call order: registerWorker() → initAll() → startAll() → stopAll() → destroyAll().`
        );
        this.name = 'LifecycleGateError';
    }
}

export class Orchestrator {
    private readonly workers: Map<string, Worker> = new Map();
    private readonly context: WorkerContext;
    private state: OrchestratorState = 'CREATED';
    private outcomes: WorkerOutcome[] = [];

    constructor(config: TeleopConfig = DEFAULT_CONFIG, eventBus?: EventBus) {
        this.context = {
            eventBus: eventBus ?? new EventBus(),
            config,
        };
    }

    public getEventBus(): EventBus {
        return this.context.eventBus;
    }

    public getState(): OrchestratorState {
        return this.state;
    }

    public getWorkerNames(): string[] {
        return Array.from(this.workers.keys());
    }

    /** Outcomes collected by the last stopAll(). */
    public getOutcomes(): WorkerOutcome[] {
        return [...this.outcomes];
    }

    public registerWorker(worker: Worker): void {
        if (this.state !== 'CREATED') {
            throw new LifecycleGateError(`registerWorker('${worker.name}')`, this.state, ['CREATED']);
        }
        if (this.workers.has(worker.name)) {
            throw new Error(`[Orchestrator] DUPLICATE WORKER: '${worker.name}' is already registered.`);
        }
        this.workers.set(worker.name, worker);
        console.log(`[Orchestrator] Registered worker: ${worker.name} v${worker.version}`);
    }

    public async initAll(): Promise<void> {
        if (this.state !== 'CREATED') {
            throw new LifecycleGateError('initAll', this.state, ['CREATED']);
        }
        for (const worker of this.workers.values()) {
            try {
                await worker.init(this.context);
            } catch (error) {
                console.error(`[Orchestrator] Failed to initialize worker: ${worker.name}`, error);
                throw error;
            }
        }
        this.state = 'INITIALIZED';
    }

    public async startAll(): Promise<void> {
        if (this.state !== 'INITIALIZED') {
            throw new LifecycleGateError('startAll', this.state, ['INITIALIZED']);
        }
        console.log(`[Orchestrator] Starting ${this.workers.size} workers...`);
        for (const worker of this.workers.values()) {
            await worker.start();
            console.log(`[Orchestrator] Started: ${worker.name}`);
        }
        this.state = 'RUNNING';
    }

    /** Ask every worker to stop (reverse registration order), then join them all. */
    public async stopAll(): Promise<WorkerOutcome[]> {
        if (this.state !== 'RUNNING') {
            throw new LifecycleGateError('stopAll', this.state, ['RUNNING']);
        }
        const ordered = Array.from(this.workers.values());
        for (const worker of [...ordered].reverse()) {
            try {
                await worker.stop();
            } catch (error) {
                // Non-fatal: keep stopping the rest
                console.error(`[Orchestrator] Failed to stop worker: ${worker.name}`, error);
            }
        }
        this.outcomes = await Promise.all(
            ordered.map((worker) =>
                worker.join().catch((error: unknown): WorkerOutcome => ({ worker: worker.name, status: 'failed', error }))
            )
        );
        for (const outcome of this.outcomes) {
            if (outcome.status === 'failed') {
                console.error(`[Orchestrator] Joined ${outcome.worker}: failed`, outcome.error);
            } else {
                console.log(`[Orchestrator] Joined ${outcome.worker}: completed`);
            }
        }
        this.state = 'STOPPED';
        return this.getOutcomes();
    }

    public async destroyAll(): Promise<void> {
        if (this.state === 'DESTROYED') {
            console.warn('[Orchestrator] destroyAll() called on an already-DESTROYED orchestrator; no-op.');
            return;
        }
        for (const worker of Array.from(this.workers.values()).reverse()) {
            try {
                await worker.destroy();
            } catch (error) {
                console.error(`[Orchestrator] Failed to destroy worker: ${worker.name}`, error);
            }
        }
        this.workers.clear();
        this.state = 'DESTROYED';
    }

    /** Ends a running session from outside (signal handler, test). */
    public requestStop(reason: TerminateReason = 'stop_requested'): void {
        this.context.eventBus.publish('SESSION_TERMINATE', { reason });
    }

    /**
     * Start every worker, block until SESSION_TERMINATE, then stop and join.
     * Leaves the orchestrator STOPPED; destroyAll() is the caller's call.
     */
    public async run(): Promise<SessionReport> {
        let unsubscribe: () => void = () => undefined;
        const terminated = new Promise<TerminateReason>((resolve) => {
            unsubscribe = this.context.eventBus.subscribe('SESSION_TERMINATE', ({ reason }) => resolve(reason));
        });
        try {
            if (this.state === 'CREATED') await this.initAll();
            await this.startAll();
            const reason = await terminated;
            console.log(`[Orchestrator] Terminating session: ${reason}`);
            const outcomes = await this.stopAll();
            return { reason, outcomes };
        } finally {
            unsubscribe();
        }
    }
}
