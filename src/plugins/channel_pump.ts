import type { ZodType } from 'zod';
import { LoopWorker } from '../kernel/worker';
import type { BoundedChannel } from '../kernel/bounded_channel';
import { queueTimeoutMs } from '../kernel/config';
import { ABORTED, untilAborted } from '../kernel/timing';

export interface ChannelPumpOptions<T> {
    /** Items failing this schema are dropped before they reach the channel. */
    schema?: ZodType<T>;
}

export interface PumpStats {
    forwarded: number;
    dropped: number;
    rejected: number;
}

/**
 * Producer side of a channel: moves items from a link stream into a bounded
 * channel. A full channel gets the producer's time slice (queueTimeoutMs);
 * an item that still does not fit is dropped.
 */
export class ChannelPump<T> extends LoopWorker {
    private readonly schema: ZodType<T> | undefined;
    private readonly stats: PumpStats = { forwarded: 0, dropped: 0, rejected: 0 };

    constructor(
        public readonly name: string,
        private readonly source: () => AsyncIterable<T>,
        private readonly channel: BoundedChannel<T>,
        options: ChannelPumpOptions<T> = {}
    ) {
        super();
        this.schema = options.schema;
    }

    public getStats(): PumpStats {
        return { ...this.stats };
    }

    protected async run(signal: AbortSignal): Promise<void> {
        const timeout = queueTimeoutMs(this.getContext().config);
        const iterator = this.source()[Symbol.asyncIterator]();
        try {
            while (!signal.aborted) {
                const next = await untilAborted(iterator.next(), signal, (error) =>
                    console.error(`[${this.name}] Source failed after stop:`, error)
                );
                if (next === ABORTED || next.done) break;

                const item = this.accept(next.value);
                if (item === undefined) continue;

                if (await this.channel.send(item.value, timeout)) {
                    this.stats.forwarded++;
                } else {
                    this.stats.dropped++;
                    console.warn(`[${this.name}] channel full, dropped item`);
                }
            }
        } finally {
            // Not awaited: a generator parked in a pending next() only returns once that settles
            const closing = iterator.return?.();
            if (closing) {
                void closing.catch((error: unknown) => console.error(`[${this.name}] Source failed to close:`, error));
            }
        }
    }

    private accept(value: T): { value: T } | undefined {
        if (!this.schema) return { value };
        const parsed = this.schema.safeParse(value);
        if (!parsed.success) {
            this.stats.rejected++;
            console.warn(`[${this.name}] rejected malformed item:`, parsed.error.issues.map((i) => i.message).join('; '));
            return undefined;
        }
        return { value: parsed.data };
    }
}
