import { LoopWorker } from '../kernel/worker';
import type { Commander } from '../kernel/commander';
import type { TerminateReason } from '../kernel/orchestrator';
import { ABORTED, untilAborted } from '../kernel/timing';
import type { KeyEvent, KeySource, RawKeyEvent } from '../kernel/types';
import { DEFAULT_KEY_BINDINGS, resolveKey, type KeyBindings } from './key_map';
import { VelocityState, type KeyOutcome } from './velocity_state';

export interface KeyboardControllerOptions {
    bindings?: KeyBindings;
}

/**
 * Consumes the keyboard device in arrival order and drives VelocityState.
 * The session ends with this loop: however it ends (quit chord, device
 * closed, crash), SESSION_TERMINATE is published on the way out.
 */
export class KeyboardController extends LoopWorker {
    public readonly name = 'keyboard';

    private readonly bindings: KeyBindings;
    private velocity: VelocityState | null = null;

    constructor(
        private readonly source: KeySource,
        private readonly commander: Commander,
        options: KeyboardControllerOptions = {}
    ) {
        super();
        this.bindings = options.bindings ?? DEFAULT_KEY_BINDINGS;
    }

    /** The session's velocity state; created when the loop starts. */
    public getVelocityState(): VelocityState | null {
        return this.velocity;
    }

    /** Map a device event; undefined for keys with no binding. */
    public translate(raw: RawKeyEvent): KeyEvent | undefined {
        const key = resolveKey(raw.name, this.bindings);
        return key === undefined ? undefined : { type: raw.type, key };
    }

    protected async run(signal: AbortSignal): Promise<void> {
        const { config, eventBus } = this.getContext();
        const velocity = new VelocityState(this.commander, {
            unitSpeed: config.unitSpeed,
            unitDegree: config.unitDegree,
        });
        this.velocity = velocity;

        let reason: TerminateReason = 'input_closed';
        const iterator = this.source[Symbol.asyncIterator]();
        try {
            while (!signal.aborted) {
                const next = await untilAborted(iterator.next(), signal, (error) =>
                    console.error(`[${this.name}] Key source failed after stop:`, error)
                );
                if (next === ABORTED || next.done) break;

                const event = this.translate(next.value);
                if (!event) {
                    console.debug(`[keyboard] ignoring unbound key: ${next.value.name}`);
                    continue;
                }
                const outcome: KeyOutcome = event.type === 'down'
                    ? await velocity.applyKeyDown(event.key)
                    : await velocity.applyKeyUp(event.key);
                if (outcome === 'terminate') {
                    console.log(`[${this.name}] Quit chord received`);
                    reason = 'quit_chord';
                    break;
                }
            }
        } catch (error) {
            reason = 'controller_failed';
            throw error;
        } finally {
            this.source.close();
            // A stop from the orchestrator is already a termination in progress
            if (!signal.aborted) {
                eventBus.publish('SESSION_TERMINATE', { reason });
            }
        }
    }
}
