/**
 * terminal_key_source.ts
 *
 * Keyboard device backed by a TTY. Terminals deliver keypresses only, with
 * auto-repeat while a key is held, so edges are reconstructed:
 *
 *   first keypress of a name     → down, wait up to repeatDelayMs
 *   repeat within the window     → no event, wait up to releaseMs
 *   window expires               → up
 *
 * The first window is longer: terminals pause before auto-repeat starts.
 *
 * Ctrl+<key> arrives as one keypress and is split into `ctrl` down followed by
 * `<key>` down, which is what the quit chord (ctrl then c) expects.
 */

import * as readline from 'readline';
import { BoundedChannel } from '../kernel/bounded_channel';
import type { KeySource, RawKeyEvent } from '../kernel/types';

/** Shape of the `key` argument of a readline 'keypress' event. */
export interface Keypress {
    name?: string;
    sequence?: string;
    ctrl?: boolean;
    meta?: boolean;
    shift?: boolean;
}

type KeypressListener = (str: string | undefined, key: Keypress | undefined) => void;

export interface KeypressEmitter {
    on(event: 'keypress', listener: KeypressListener): unknown;
    off(event: 'keypress', listener: KeypressListener): unknown;
}

export interface TerminalKeySourceOptions {
    /** Silence after a repeat before the key counts as released. */
    releaseMs: number;
    /** Silence after the first keypress before the key counts as released. Defaults to releaseMs. */
    repeatDelayMs?: number;
    /** Buffered edges not yet consumed; further edges are dropped. */
    bufferSize?: number;
    onClose?: () => void;
}

const MODIFIER = 'ctrl';
const IDLE_POLL_MS = 1000;

export class TerminalKeySource implements KeySource {
    private readonly queue: BoundedChannel<RawKeyEvent>;
    private readonly held: Map<string, NodeJS.Timeout> = new Map();
    private readonly releaseMs: number;
    private readonly repeatDelayMs: number;
    private readonly onClose: (() => void) | undefined;
    private readonly boundOnKeypress: KeypressListener;
    private isClosed = false;

    constructor(private readonly input: KeypressEmitter, options: TerminalKeySourceOptions) {
        this.releaseMs = options.releaseMs;
        this.repeatDelayMs = options.repeatDelayMs ?? options.releaseMs;
        this.onClose = options.onClose;
        this.queue = new BoundedChannel<RawKeyEvent>(options.bufferSize ?? 64);
        this.boundOnKeypress = this.onKeypress.bind(this);
        this.input.on('keypress', this.boundOnKeypress);
    }

    /** Puts stdin in raw mode and listens for keypresses until close() or EOF. */
    public static fromStdin(
        timing: Pick<TerminalKeySourceOptions, 'releaseMs' | 'repeatDelayMs'>,
        stdin: NodeJS.ReadStream = process.stdin
    ): TerminalKeySource {
        readline.emitKeypressEvents(stdin);
        const raw = stdin.isTTY === true;
        if (raw) stdin.setRawMode(true);
        stdin.resume();

        const source = new TerminalKeySource(stdin, {
            ...timing,
            onClose: () => {
                stdin.off('end', onEnd);
                if (raw) stdin.setRawMode(false);
                stdin.pause();
            },
        });
        const onEnd = () => source.close();
        stdin.once('end', onEnd);
        return source;
    }

    public close(): void {
        if (this.isClosed) return;
        this.isClosed = true;
        this.input.off('keypress', this.boundOnKeypress);
        for (const timer of this.held.values()) clearTimeout(timer);
        this.held.clear();
        this.queue.close();
        this.onClose?.();
    }

    public async *[Symbol.asyncIterator](): AsyncIterator<RawKeyEvent> {
        while (true) {
            const result = await this.queue.receive(IDLE_POLL_MS);
            if (result.status === 'closed') return;
            if (result.status === 'message') yield result.value;
        }
    }

    private onKeypress(_str: string | undefined, key: Keypress | undefined): void {
        if (this.isClosed || !key?.name) return;
        if (key.ctrl && key.name !== MODIFIER) this.press(MODIFIER);
        this.press(key.name);
    }

    private press(name: string): void {
        const existing = this.held.get(name);
        if (existing) {
            // Auto-repeat: the key is still down
            clearTimeout(existing);
            this.held.set(name, setTimeout(() => this.release(name), this.releaseMs));
            return;
        }
        this.emit({ type: 'down', name });
        this.held.set(name, setTimeout(() => this.release(name), this.repeatDelayMs));
    }

    private release(name: string): void {
        this.held.delete(name);
        if (!this.isClosed) this.emit({ type: 'up', name });
    }

    private emit(event: RawKeyEvent): void {
        if (!this.queue.trySend(event)) {
            console.warn(`[TerminalKeySource] buffer full, dropped ${event.type} ${event.name}`);
        }
    }
}
