/**
 * commander.ts — outbound command capability
 *
 * The wire protocol lives behind these interfaces. Every call is
 * fire-and-forget from the robot's point of view but returns a promise so a
 * transport failure (CommandTransportError) propagates into the calling loop.
 */

import { CommandTransportError } from './errors';
import { Mutex } from './mutex';

export interface Commander {
    chassisSpeed(vx: number, vy: number, vz: number): Promise<void>;
    gimbalSpeed(pitch: number, yaw: number): Promise<void>;
    fireWeapon(): Promise<void>;
    setChassisZero(): Promise<void>;
}

export type RobotMode = 'chassis_lead' | 'gimbal_lead' | 'free';
export type ArmorEventKind = 'hit';
export type SoundEventKind = 'applause';

/** Session setup calls used once before the workers start. */
export interface RobotCommander extends Commander {
    getIp(): Promise<string>;
    robotMode(mode: RobotMode): Promise<void>;
    gimbalRecenter(): Promise<void>;
    stream(enabled: boolean): Promise<void>;
    chassisPushOn(positionHz: number, attitudeHz: number, statusHz: number): Promise<void>;
    gimbalPushOn(attitudeHz: number): Promise<void>;
    armorSensitivity(level: number): Promise<void>;
    armorEvent(kind: ArmorEventKind, enabled: boolean): Promise<void>;
    soundEvent(kind: SoundEventKind, enabled: boolean): Promise<void>;
}

export interface SerializedCommanderOptions {
    /** A call with no reply after this long fails with CommandTransportError and frees the lock. */
    timeoutMs?: number;
}

function withDeadline(command: string, pending: Promise<void>, timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        let expired = false;
        const timer = setTimeout(() => {
            expired = true;
            reject(new CommandTransportError(command, `no reply within ${timeoutMs}ms`));
        }, timeoutMs);
        pending.then(
            () => {
                clearTimeout(timer);
                resolve();
            },
            (error: unknown) => {
                clearTimeout(timer);
                if (expired) {
                    console.error(`[Commander] ${command} failed after its deadline:`, error);
                    return;
                }
                reject(error);
            }
        );
    });
}

/**
 * Serializes every call into the wrapped commander. The keyboard controller
 * and the event router both command the chassis; the underlying link is not
 * assumed to tolerate interleaved requests.
 */
export class SerializedCommander implements Commander {
    private readonly mutex = new Mutex();
    private readonly timeoutMs: number | undefined;

    constructor(private readonly inner: Commander, options: SerializedCommanderOptions = {}) {
        this.timeoutMs = options.timeoutMs;
    }

    public chassisSpeed(vx: number, vy: number, vz: number): Promise<void> {
        return this.exclusive('chassisSpeed', () => this.inner.chassisSpeed(vx, vy, vz));
    }

    public gimbalSpeed(pitch: number, yaw: number): Promise<void> {
        return this.exclusive('gimbalSpeed', () => this.inner.gimbalSpeed(pitch, yaw));
    }

    public fireWeapon(): Promise<void> {
        return this.exclusive('fireWeapon', () => this.inner.fireWeapon());
    }

    public setChassisZero(): Promise<void> {
        return this.exclusive('setChassisZero', () => this.inner.setChassisZero());
    }

    private exclusive(command: string, call: () => Promise<void>): Promise<void> {
        return this.mutex.runExclusive(() => {
            const timeoutMs = this.timeoutMs;
            return timeoutMs === undefined ? call() : withDeadline(command, call(), timeoutMs);
        });
    }
}
