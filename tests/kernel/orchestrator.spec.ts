import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { EventBus } from '../../src/kernel/event_bus';
import { LifecycleGateError, Orchestrator } from '../../src/kernel/orchestrator';
import { LoopWorker, type Worker, type WorkerContext, type WorkerOutcome } from '../../src/kernel/worker';
import { sleep } from '../../src/kernel/timing';
import { FAST_CONFIG, delay, waitFor } from '../helpers/fakes';

// ─── Helpers ─────────────────────────────────────────────────────────────────

class MockWorker implements Worker {
    version = '1.0.0';
    receivedContext: WorkerContext | null = null;
    calls: string[] = [];
    shouldThrowOnInit = false;
    shouldThrowOnStop = false;

    constructor(public readonly name: string, private readonly journal: string[] = []) {}

    init(context: WorkerContext): void {
        this.calls.push('init');
        this.receivedContext = context;
        if (this.shouldThrowOnInit) throw new Error(`Init error in ${this.name}`);
    }

    start(): void {
        this.calls.push('start');
    }

    stop(): void {
        this.calls.push('stop');
        this.journal.push(`stop:${this.name}`);
        if (this.shouldThrowOnStop) throw new Error(`Stop error in ${this.name}`);
    }

    join(): Promise<WorkerOutcome> {
        this.calls.push('join');
        return Promise.resolve({ worker: this.name, status: 'completed' });
    }

    destroy(): void {
        this.calls.push('destroy');
    }
}

/** Idles until stopped. */
class IdleLoop extends LoopWorker {
    cycles = 0;

    constructor(public readonly name: string) {
        super();
    }

    protected async run(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            this.cycles++;
            await sleep(5, signal);
        }
    }
}

/** Throws after a few cycles. */
class CrashingLoop extends LoopWorker {
    public readonly name = 'crasher';

    protected async run(): Promise<void> {
        await delay(5);
        throw new Error('transport gone');
    }
}

// ─── Lifecycle ───────────────────────────────────────────────────────────────

describe('Orchestrator — lifecycle gates', () => {

    let orch: Orchestrator;
    beforeEach(() => { orch = new Orchestrator(FAST_CONFIG); });

    it('Given a new orchestrator, Then state is CREATED and it owns an EventBus', () => {
        expect(orch.getState()).toBe('CREATED');
        expect(orch.getEventBus()).toBeInstanceOf(EventBus);
    });

    it('Given an injected EventBus, Then getEventBus() returns that exact instance', () => {
        const bus = new EventBus();
        expect(new Orchestrator(FAST_CONFIG, bus).getEventBus()).toBe(bus);
    });

    it('Given a worker registered twice by name, Then throws DUPLICATE WORKER', () => {
        orch.registerWorker(new MockWorker('A'));
        expect(() => orch.registerWorker(new MockWorker('A'))).toThrow('DUPLICATE WORKER');
    });

    it('Given initAll ran, When registerWorker, Then throws LifecycleGateError', async () => {
        orch.registerWorker(new MockWorker('A'));
        await orch.initAll();
        expect(() => orch.registerWorker(new MockWorker('B'))).toThrow(LifecycleGateError);
    });

    it('Given state=CREATED, When startAll, Then rejects with a message naming both states', async () => {
        await expect(orch.startAll()).rejects.toThrow(/requires state INITIALIZED.*CREATED/);
    });

    it('Given state=INITIALIZED, When stopAll, Then rejects with LifecycleGateError', async () => {
        await orch.initAll();
        await expect(orch.stopAll()).rejects.toBeInstanceOf(LifecycleGateError);
    });

    it('init → start → stop → destroy walks every state and calls each worker in order', async () => {
        const w = new MockWorker('A');
        orch.registerWorker(w);
        await orch.initAll();
        expect(orch.getState()).toBe('INITIALIZED');
        await orch.startAll();
        expect(orch.getState()).toBe('RUNNING');
        await orch.stopAll();
        expect(orch.getState()).toBe('STOPPED');
        await orch.destroyAll();
        expect(orch.getState()).toBe('DESTROYED');
        expect(w.calls).toEqual(['init', 'start', 'stop', 'join', 'destroy']);
        expect(orch.getWorkerNames()).toEqual([]);
    });

    it('Given a worker, When initAll, Then it receives the shared bus and config', async () => {
        const w = new MockWorker('A');
        orch.registerWorker(w);
        await orch.initAll();
        expect(w.receivedContext?.eventBus).toBe(orch.getEventBus());
        expect(w.receivedContext?.config).toBe(FAST_CONFIG);
    });

    it('Given a worker whose init throws, Then initAll rejects and state stays CREATED', async () => {
        const w = new MockWorker('A');
        w.shouldThrowOnInit = true;
        orch.registerWorker(w);
        await expect(orch.initAll()).rejects.toThrow('Init error in A');
        expect(orch.getState()).toBe('CREATED');
    });

    it('stopAll stops workers in reverse registration order', async () => {
        const journal: string[] = [];
        orch.registerWorker(new MockWorker('A', journal));
        orch.registerWorker(new MockWorker('B', journal));
        orch.registerWorker(new MockWorker('C', journal));
        await orch.initAll();
        await orch.startAll();
        await orch.stopAll();
        expect(journal).toEqual(['stop:C', 'stop:B', 'stop:A']);
    });

    it('Given a worker whose stop throws, Then the rest are still stopped and joined', async () => {
        const a = new MockWorker('A');
        const b = new MockWorker('B');
        b.shouldThrowOnStop = true;
        orch.registerWorker(a);
        orch.registerWorker(b);
        await orch.initAll();
        await orch.startAll();
        const outcomes = await orch.stopAll();
        expect(a.calls).toContain('stop');
        expect(outcomes.map((o) => o.status)).toEqual(['completed', 'completed']);
    });

    it('destroyAll on a DESTROYED orchestrator is a no-op', async () => {
        await orch.destroyAll();
        await expect(orch.destroyAll()).resolves.toBeUndefined();
    });

});

// ─── Running a session ───────────────────────────────────────────────────────

describe('Orchestrator — run()', () => {

    it('Given running loops, When SESSION_TERMINATE is published, Then run stops and joins all and reports the reason', async () => {
        const orch = new Orchestrator(FAST_CONFIG);
        const a = new IdleLoop('a');
        const b = new IdleLoop('b');
        orch.registerWorker(a);
        orch.registerWorker(b);

        const running = orch.run();
        await waitFor(() => a.cycles > 0 && b.cycles > 0);
        orch.getEventBus().publish('SESSION_TERMINATE', { reason: 'quit_chord' });
        const report = await running;

        expect(report.reason).toBe('quit_chord');
        expect(report.outcomes).toEqual([
            { worker: 'a', status: 'completed' },
            { worker: 'b', status: 'completed' },
        ]);
        expect(a.isRunning()).toBe(false);
        expect(orch.getState()).toBe('STOPPED');
    });

    it('Given requestStop(), Then run resolves with reason stop_requested', async () => {
        const orch = new Orchestrator(FAST_CONFIG);
        orch.registerWorker(new IdleLoop('a'));
        const running = orch.run();
        await delay(10);
        orch.requestStop();
        await expect(running).resolves.toMatchObject({ reason: 'stop_requested' });
    });

    it('Given requestStop(reason), Then run reports that reason', async () => {
        const orch = new Orchestrator(FAST_CONFIG);
        orch.registerWorker(new IdleLoop('a'));
        const running = orch.run();
        await delay(10);
        orch.requestStop('input_closed');
        await expect(running).resolves.toMatchObject({ reason: 'input_closed' });
    });

    it('Given one worker crashes, Then the others keep running and the crash surfaces at join', async () => {
        const orch = new Orchestrator(FAST_CONFIG);
        const idle = new IdleLoop('idle');
        const failures: string[] = [];
        orch.getEventBus().subscribe('WORKER_FAILED', ({ worker }) => failures.push(worker));
        orch.registerWorker(new CrashingLoop());
        orch.registerWorker(idle);
        const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

        const running = orch.run();
        await waitFor(() => failures.length === 1);
        const cyclesAtCrash = idle.cycles;
        await delay(30);
        expect(idle.cycles).toBeGreaterThan(cyclesAtCrash);
        expect(idle.isRunning()).toBe(true);

        orch.requestStop();
        const report = await running;
        errorSpy.mockRestore();

        expect(failures).toEqual(['crasher']);
        expect(report.outcomes[0]).toMatchObject({ worker: 'crasher', status: 'failed' });
        const crash = report.outcomes[0];
        expect(crash.status === 'failed' ? String(crash.error) : '').toBe('Error: transport gone');
        expect(report.outcomes[1]).toEqual({ worker: 'idle', status: 'completed' });
    });

});

describe('LoopWorker', () => {

    it('Given a worker started twice, Then the second start throws (no restarts)', () => {
        const w = new IdleLoop('w');
        w.init({ eventBus: new EventBus(), config: FAST_CONFIG });
        w.start();
        expect(() => w.start()).toThrow(/already started/);
        w.stop();
    });

    it('Given a worker never started, Then join resolves completed immediately', async () => {
        await expect(new IdleLoop('w').join()).resolves.toEqual({ worker: 'w', status: 'completed' });
    });

});
