/**
 * velocity_state.ts
 *
 * The only mutable control state in the session. Fields are private; the
 * sole entry points are applyKeyDown()/applyKeyUp(), each of which holds the
 * internal lock for the whole edge: mutation first, then the derived send.
 *
 * Change detection in sendCommand() is the anti-spam mechanism: at most one
 * command per axis group per actual value change, however many key repeats
 * arrive.
 *
 * The armor-hit safety stop talks to the commander directly and does NOT pass
 * through here, so previousChassis can disagree with what the robot is doing
 * after a hit. That gap is kept on purpose and pinned by tests.
 */

import type { Commander } from '../kernel/commander';
import { Mutex } from '../kernel/mutex';
import { ZERO, vectorsEqual, type Gear, type TeleopKey, type Vector2 } from '../kernel/types';
import { KEY_EFFECTS, type AxisGroup } from './key_map';

export type KeyOutcome = 'continue' | 'terminate';

export interface VelocityOptions {
    /** Chassis speed per gear step. */
    unitSpeed: number;
    /** Gimbal speed per gear step. */
    unitDegree: number;
    gear?: Gear;
}

export interface VelocitySnapshot {
    gear: Gear;
    unitSpeed: number;
    unitDegree: number;
    chassis: Vector2;
    previousChassis: Vector2;
    gimbal: Vector2;
    previousGimbal: Vector2;
    modifierHeld: boolean;
}

function withAxis(vector: Vector2, axis: 0 | 1, value: number): Vector2 {
    return axis === 0 ? [value, vector[1]] : [vector[0], value];
}

export class VelocityState {
    private readonly mutex = new Mutex();
    private readonly unitSpeed: number;
    private readonly unitDegree: number;

    private gear: Gear;
    private chassis: Vector2 = ZERO;
    private previousChassis: Vector2 = ZERO;
    private gimbal: Vector2 = ZERO;
    private previousGimbal: Vector2 = ZERO;
    private modifierHeld = false;

    constructor(private readonly commander: Commander, options: VelocityOptions) {
        this.unitSpeed = options.unitSpeed;
        this.unitDegree = options.unitDegree;
        this.gear = options.gear ?? 1;
    }

    public applyKeyDown(key: TeleopKey): Promise<KeyOutcome> {
        return this.mutex.runExclusive(async (): Promise<KeyOutcome> => {
            console.debug(`[VelocityState] pressed: ${key}`);
            const effect = KEY_EFFECTS[key];

            switch (effect.kind) {
                case 'modifier':
                    this.modifierHeld = true;
                    return 'continue';
                case 'fire':
                    await this.commander.fireWeapon();
                    return 'continue';
                case 'quit':
                    if (this.modifierHeld) {
                        this.chassis = ZERO;
                        this.gimbal = ZERO;
                        await this.sendCommand();
                        return 'terminate';
                    }
                    break;
                case 'axis':
                    this.setAxis(effect.group, effect.axis, effect.sign * this.step(effect.group));
                    break;
                case 'gear':
                    break;
            }
            await this.sendCommand();
            return 'continue';
        });
    }

    public applyKeyUp(key: TeleopKey): Promise<KeyOutcome> {
        return this.mutex.runExclusive(async (): Promise<KeyOutcome> => {
            console.debug(`[VelocityState] released: ${key}`);
            const effect = KEY_EFFECTS[key];

            switch (effect.kind) {
                case 'modifier':
                    this.modifierHeld = false;
                    return 'continue';
                case 'gear':
                    // Later presses only; in-flight velocity keeps its old magnitude
                    this.gear = effect.gear;
                    return 'continue';
                case 'axis':
                    this.setAxis(effect.group, effect.axis, 0);
                    break;
                case 'fire':
                case 'quit':
                    break;
            }
            await this.sendCommand();
            return 'continue';
        });
    }

    /** Copy of the current fields, for logging and tests. */
    public snapshot(): VelocitySnapshot {
        return {
            gear: this.gear,
            unitSpeed: this.unitSpeed,
            unitDegree: this.unitDegree,
            chassis: this.chassis,
            previousChassis: this.previousChassis,
            gimbal: this.gimbal,
            previousGimbal: this.previousGimbal,
            modifierHeld: this.modifierHeld,
        };
    }

    public isLocked(): boolean {
        return this.mutex.isLocked();
    }

    private step(group: AxisGroup): number {
        return this.gear * (group === 'chassis' ? this.unitSpeed : this.unitDegree);
    }

    private setAxis(group: AxisGroup, axis: 0 | 1, value: number): void {
        if (group === 'chassis') {
            this.chassis = withAxis(this.chassis, axis, value);
        } else {
            this.gimbal = withAxis(this.gimbal, axis, value);
        }
    }

    // previous* is updated before the call, so a failed command is not retried
    // by the next edge.
    private async sendCommand(): Promise<void> {
        if (!vectorsEqual(this.chassis, this.previousChassis)) {
            this.previousChassis = this.chassis;
            const [vx, vy] = this.chassis;
            console.debug(`[VelocityState] chassis speed: x=${vx} y=${vy}`);
            await this.commander.chassisSpeed(vx, vy, 0);
        }
        if (!vectorsEqual(this.gimbal, this.previousGimbal)) {
            this.previousGimbal = this.gimbal;
            const [pitch, yaw] = this.gimbal;
            console.debug(`[VelocityState] gimbal speed: pitch=${pitch} yaw=${yaw}`);
            await this.commander.gimbalSpeed(pitch, yaw);
        }
    }
}
