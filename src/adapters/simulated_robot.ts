import { BoundedChannel } from '../kernel/bounded_channel';
import type { ArmorEventKind, RobotCommander, RobotMode, SoundEventKind } from '../kernel/commander';
import { CommandTransportError } from '../kernel/errors';
import { sleep } from '../kernel/timing';
import type { RobotEvent, RobotLink, TelemetryMessage, VideoFrame } from '../kernel/types';

export interface CommandRecord {
    command: string;
    args: unknown[];
}

export interface SimulatedRobotOptions {
    ip?: string;
    /** Telemetry is idle until chassisPushOn(); this is the idle re-check period. */
    idlePollMs?: number;
}

/**
 * In-process stand-in for the robot: accepts every command, records it, and
 * plays back chassis/gimbal state as telemetry. strike() raises an armor hit.
 */
export class SimulatedRobot implements RobotCommander, RobotLink {
    private readonly ip: string;
    private readonly idlePollMs: number;
    private readonly records: CommandRecord[] = [];
    private readonly eventQueue = new BoundedChannel<RobotEvent>(10);
    private readonly shutdownController = new AbortController();
    private readonly failures: Set<string> = new Set();

    private chassis: [number, number, number] = [0, 0, 0];
    private gimbal: [number, number] = [0, 0];
    private mode: RobotMode = 'free';
    private pushHz = 0;

    constructor(options: SimulatedRobotOptions = {}) {
        this.ip = options.ip ?? '127.0.0.1';
        this.idlePollMs = options.idlePollMs ?? 100;
    }

    // ── Inspection ────────────────────────────────────────────────────────────

    public getRecords(): CommandRecord[] {
        return this.records.map((r) => ({ command: r.command, args: [...r.args] }));
    }

    public getChassisSpeed(): readonly [number, number, number] {
        return this.chassis;
    }

    public getGimbalSpeed(): readonly [number, number] {
        return this.gimbal;
    }

    public getMode(): RobotMode {
        return this.mode;
    }

    /** Every later call of `command` rejects with CommandTransportError. */
    public failCommand(command: string): void {
        this.failures.add(command);
    }

    public strike(armorId = 0): boolean {
        return this.eventQueue.trySend({ kind: 'armor_hit', armorId, hitType: 'water' });
    }

    public applause(): boolean {
        return this.eventQueue.trySend({ kind: 'sound', soundKind: 'applause' });
    }

    /** Ends every stream handed out by telemetry()/events()/video(). */
    public shutdown(): void {
        this.shutdownController.abort();
        this.eventQueue.close();
    }

    // ── RobotCommander ────────────────────────────────────────────────────────

    public async getIp(): Promise<string> {
        this.record('getIp', []);
        return this.ip;
    }

    public async robotMode(mode: RobotMode): Promise<void> {
        this.record('robotMode', [mode]);
        this.mode = mode;
    }

    public async gimbalRecenter(): Promise<void> {
        this.record('gimbalRecenter', []);
        this.gimbal = [0, 0];
    }

    public async stream(enabled: boolean): Promise<void> {
        this.record('stream', [enabled]);
    }

    public async chassisPushOn(positionHz: number, attitudeHz: number, statusHz: number): Promise<void> {
        this.record('chassisPushOn', [positionHz, attitudeHz, statusHz]);
        this.pushHz = positionHz;
    }

    public async gimbalPushOn(attitudeHz: number): Promise<void> {
        this.record('gimbalPushOn', [attitudeHz]);
    }

    public async armorSensitivity(level: number): Promise<void> {
        this.record('armorSensitivity', [level]);
    }

    public async armorEvent(kind: ArmorEventKind, enabled: boolean): Promise<void> {
        this.record('armorEvent', [kind, enabled]);
    }

    public async soundEvent(kind: SoundEventKind, enabled: boolean): Promise<void> {
        this.record('soundEvent', [kind, enabled]);
    }

    public async chassisSpeed(vx: number, vy: number, vz: number): Promise<void> {
        this.record('chassisSpeed', [vx, vy, vz]);
        this.chassis = [vx, vy, vz];
    }

    public async gimbalSpeed(pitch: number, yaw: number): Promise<void> {
        this.record('gimbalSpeed', [pitch, yaw]);
        this.gimbal = [pitch, yaw];
    }

    public async fireWeapon(): Promise<void> {
        this.record('fireWeapon', []);
    }

    public async setChassisZero(): Promise<void> {
        this.record('setChassisZero', []);
        this.chassis = [0, 0, 0];
    }

    // ── RobotLink ─────────────────────────────────────────────────────────────

    public async *telemetry(): AsyncGenerator<TelemetryMessage> {
        const signal = this.shutdownController.signal;
        while (!signal.aborted) {
            const interval = this.pushHz > 0 ? 1000 / this.pushHz : this.idlePollMs;
            await sleep(interval, signal);
            if (signal.aborted || this.pushHz === 0) continue;
            const [vx, vy, vz] = this.chassis;
            const [pitch, yaw] = this.gimbal;
            yield { topic: 'chassis', payload: { vx, vy, vz }, receivedAt: Date.now() };
            yield { topic: 'gimbal', payload: { pitch, yaw }, receivedAt: Date.now() };
        }
    }

    public async *events(): AsyncGenerator<RobotEvent> {
        while (true) {
            const result = await this.eventQueue.receive(this.idlePollMs);
            if (result.status === 'closed') return;
            if (result.status === 'message') yield result.value;
        }
    }

    /** No camera in simulation: the stream stays open and silent. */
    public async *video(): AsyncGenerator<VideoFrame> {
        const signal = this.shutdownController.signal;
        while (!signal.aborted) {
            await sleep(this.idlePollMs, signal);
        }
    }

    private record(command: string, args: unknown[]): void {
        if (this.failures.has(command)) {
            throw new CommandTransportError(command, new Error('simulated link down'));
        }
        this.records.push({ command, args });
    }
}
