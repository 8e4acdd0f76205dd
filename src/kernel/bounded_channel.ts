/**
 * bounded_channel.ts
 *
 * Fixed-capacity FIFO shared by any number of producers and consumers on the
 * event loop. Every wait is bounded: `receive(timeoutMs)` yields a message or
 * reports `empty`, `send(value, timeoutMs)` enqueues or reports that the
 * item did not fit. "Empty" is the common case for a polling consumer, so it
 * is a result value and never an exception.
 */

import { ChannelClosedError } from './errors';

export const DEFAULT_CHANNEL_CAPACITY = 10;

export type ReceiveResult<T> =
    | { status: 'message'; value: T }
    | { status: 'empty' }
    | { status: 'closed' };

interface PendingReceive<T> {
    resolve: (result: ReceiveResult<T>) => void;
    timer: NodeJS.Timeout;
}

interface PendingSend<T> {
    value: T;
    resolve: (accepted: boolean) => void;
    timer: NodeJS.Timeout;
}

function checkTimeout(timeoutMs: number): number {
    if (!Number.isFinite(timeoutMs)) {
        throw new RangeError(`[BoundedChannel] timeout must be finite, got ${timeoutMs}`);
    }
    return Math.max(0, timeoutMs);
}

export class BoundedChannel<T> {
    public readonly capacity: number;

    private readonly buffer: T[] = [];
    private readonly receivers: PendingReceive<T>[] = [];
    private readonly senders: PendingSend<T>[] = [];
    private isClosed = false;

    constructor(capacity: number = DEFAULT_CHANNEL_CAPACITY) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`[BoundedChannel] capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
    }

    /** Number of buffered messages. */
    public get size(): number {
        return this.buffer.length;
    }

    public get closed(): boolean {
        return this.isClosed;
    }

    /** Enqueue without waiting. Returns false when the channel is full. */
    public trySend(value: T): boolean {
        if (this.isClosed) throw new ChannelClosedError();

        const receiver = this.receivers.shift();
        if (receiver) {
            clearTimeout(receiver.timer);
            receiver.resolve({ status: 'message', value });
            return true;
        }
        if (this.buffer.length < this.capacity) {
            this.buffer.push(value);
            return true;
        }
        return false;
    }

    /**
     * Enqueue, waiting up to `timeoutMs` for space.
     * Resolves false if no space frees up in time or the channel closes meanwhile.
     */
    public send(value: T, timeoutMs: number): Promise<boolean> {
        const wait = checkTimeout(timeoutMs);
        if (this.trySend(value)) return Promise.resolve(true);
        if (wait === 0) return Promise.resolve(false);

        return new Promise<boolean>((resolve) => {
            const pending: PendingSend<T> = {
                value,
                resolve,
                timer: setTimeout(() => {
                    this.remove(this.senders, pending);
                    resolve(false);
                }, wait),
            };
            this.senders.push(pending);
        });
    }

    public tryReceive(): ReceiveResult<T> {
        if (this.buffer.length > 0) {
            const [value] = this.buffer.splice(0, 1);
            this.admitWaitingSender();
            return { status: 'message', value };
        }
        return this.isClosed ? { status: 'closed' } : { status: 'empty' };
    }

    /** Wait up to `timeoutMs` for a message. Never waits past the timeout. */
    public receive(timeoutMs: number): Promise<ReceiveResult<T>> {
        const wait = checkTimeout(timeoutMs);
        const immediate = this.tryReceive();
        if (immediate.status !== 'empty' || wait === 0) return Promise.resolve(immediate);

        return new Promise<ReceiveResult<T>>((resolve) => {
            const pending: PendingReceive<T> = {
                resolve,
                timer: setTimeout(() => {
                    this.remove(this.receivers, pending);
                    resolve({ status: 'empty' });
                }, wait),
            };
            this.receivers.push(pending);
        });
    }

    /**
     * Refuse further sends. Buffered messages stay receivable; waiting
     * receivers see `closed`, waiting senders resolve false.
     */
    public close(): void {
        if (this.isClosed) return;
        this.isClosed = true;

        for (const receiver of this.receivers.splice(0)) {
            clearTimeout(receiver.timer);
            receiver.resolve({ status: 'closed' });
        }
        for (const sender of this.senders.splice(0)) {
            clearTimeout(sender.timer);
            sender.resolve(false);
        }
    }

    private admitWaitingSender(): void {
        const sender = this.senders.shift();
        if (!sender) return;
        clearTimeout(sender.timer);
        this.buffer.push(sender.value);
        sender.resolve(true);
    }

    private remove<W>(list: W[], item: W): void {
        const idx = list.indexOf(item);
        if (idx !== -1) list.splice(idx, 1);
    }
}
