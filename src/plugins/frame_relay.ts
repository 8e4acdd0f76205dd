import { LoopWorker } from '../kernel/worker';
import { ABORTED, untilAborted } from '../kernel/timing';
import type { FrameSink, VideoFrame } from '../kernel/types';

/** Hands every decoded frame to the display sink, in order. */
export class FrameRelay extends LoopWorker {
    public readonly name = 'vision';
    private delivered = 0;

    constructor(
        private readonly frames: () => AsyncIterable<VideoFrame>,
        private readonly sink: FrameSink
    ) {
        super();
    }

    public getDeliveredCount(): number {
        return this.delivered;
    }

    protected async run(signal: AbortSignal): Promise<void> {
        const iterator = this.frames()[Symbol.asyncIterator]();
        while (!signal.aborted) {
            const next = await untilAborted(iterator.next(), signal, (error) =>
                console.error(`[${this.name}] Frame source failed after stop:`, error)
            );
            if (next === ABORTED || next.done) break;
            this.sink(next.value);
            this.delivered++;
        }
    }
}
