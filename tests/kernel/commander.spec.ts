import { describe, it, expect } from '@jest/globals';
import { SerializedCommander, type Commander } from '../../src/kernel/commander';
import { CommandTransportError } from '../../src/kernel/errors';
import { RecordingCommander, delay } from '../helpers/fakes';

/** Commander whose chassisSpeed takes a while, logging entry and exit. */
class SlowCommander implements Commander {
    public readonly log: string[] = [];

    public async chassisSpeed(vx: number): Promise<void> {
        this.log.push(`chassis:${vx}:enter`);
        await delay(15);
        this.log.push(`chassis:${vx}:exit`);
    }

    public async gimbalSpeed(pitch: number): Promise<void> {
        this.log.push(`gimbal:${pitch}`);
    }

    public async fireWeapon(): Promise<void> {
        this.log.push('fire');
    }

    public async setChassisZero(): Promise<void> {
        this.log.push('zero');
    }
}

describe('SerializedCommander', () => {

    it('Given two concurrent callers, Then the second call starts only after the first returns', async () => {
        const inner = new SlowCommander();
        const cmd = new SerializedCommander(inner);
        await Promise.all([cmd.chassisSpeed(1, 0, 0), cmd.gimbalSpeed(5, 0), cmd.chassisSpeed(0, 0, 0)]);
        expect(inner.log).toEqual(['chassis:1:enter', 'chassis:1:exit', 'gimbal:5', 'chassis:0:enter', 'chassis:0:exit']);
    });

    it('forwards every operation with its arguments', async () => {
        const inner = new RecordingCommander();
        const cmd = new SerializedCommander(inner);
        await cmd.chassisSpeed(0.2, -0.2, 0);
        await cmd.gimbalSpeed(20, -20);
        await cmd.fireWeapon();
        await cmd.setChassisZero();
        expect(inner.calls).toEqual([
            { op: 'chassisSpeed', args: [0.2, -0.2, 0] },
            { op: 'gimbalSpeed', args: [20, -20] },
            { op: 'fireWeapon', args: [] },
            { op: 'setChassisZero', args: [] },
        ]);
    });

    it('Given a transport failure, Then it propagates to the caller and later calls still go through', async () => {
        const inner = new RecordingCommander();
        inner.failOn('fireWeapon');
        const cmd = new SerializedCommander(inner);
        await expect(cmd.fireWeapon()).rejects.toBeInstanceOf(CommandTransportError);
        await cmd.setChassisZero();
        expect(inner.ops()).toEqual(['setChassisZero']);
    });

    it('Given a call with no reply before the deadline, Then it fails and the next caller gets the lock', async () => {
        const inner = new RecordingCommander();
        inner.chassisSpeed = () => new Promise<void>(() => undefined);
        const cmd = new SerializedCommander(inner, { timeoutMs: 20 });

        await expect(cmd.chassisSpeed(0.2, 0, 0)).rejects.toThrow('[Commander] chassisSpeed failed: no reply within 20ms');
        await cmd.gimbalSpeed(20, 0);
        expect(inner.gimbalCalls()).toEqual([[20, 0]]);
    });

    it('Given a deadline, Then a prompt reply is unaffected', async () => {
        const inner = new SlowCommander();
        const cmd = new SerializedCommander(inner, { timeoutMs: 200 });
        await cmd.chassisSpeed(1, 0, 0);
        expect(inner.log).toEqual(['chassis:1:enter', 'chassis:1:exit']);
    });

});

describe('CommandTransportError', () => {

    it('names the command and keeps the cause', () => {
        const cause = new Error('socket closed');
        const err = new CommandTransportError('chassisSpeed', cause);
        expect(err.name).toBe('CommandTransportError');
        expect(err.command).toBe('chassisSpeed');
        expect(err.message).toBe('[Commander] chassisSpeed failed: socket closed');
        expect(err.cause).toBe(cause);
    });

});
