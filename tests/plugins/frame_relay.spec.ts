import { describe, it, expect } from '@jest/globals';
import type { VideoFrame } from '../../src/kernel/types';
import { FrameRelay } from '../../src/plugins/frame_relay';
import { FAST_CONFIG, delay, fromArray, makeContext } from '../helpers/fakes';

function frame(sequence: number): VideoFrame {
    return { data: new Uint8Array(4), width: 2, height: 2, sequence };
}

describe('FrameRelay', () => {

    it('hands every frame to the sink in order', async () => {
        const seen: number[] = [];
        const relay = new FrameRelay(() => fromArray([frame(0), frame(1), frame(2)]), (f) => seen.push(f.sequence));
        relay.init(makeContext(FAST_CONFIG));
        relay.start();

        await expect(relay.join()).resolves.toEqual({ worker: 'vision', status: 'completed' });
        expect(seen).toEqual([0, 1, 2]);
        expect(relay.getDeliveredCount()).toBe(3);
    });

    it('Given an idle stream, When stopped, Then it ends without delivering anything', async () => {
        async function* idle(): AsyncGenerator<VideoFrame> {
            await new Promise<void>(() => undefined);
        }
        const relay = new FrameRelay(idle, () => undefined);
        relay.init(makeContext(FAST_CONFIG));
        relay.start();
        await delay(10);
        relay.stop();

        await expect(relay.join()).resolves.toEqual({ worker: 'vision', status: 'completed' });
        expect(relay.getDeliveredCount()).toBe(0);
    });

});
