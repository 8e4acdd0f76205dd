import { LoopWorker } from '../kernel/worker';
import type { BoundedChannel } from '../kernel/bounded_channel';
import type { Commander } from '../kernel/commander';
import { queueTimeoutMs } from '../kernel/config';
import { sleep } from '../kernel/timing';
import type { RobotEvent, TelemetryMessage } from '../kernel/types';

export interface PollResult {
    telemetry: TelemetryMessage | null;
    event: RobotEvent | null;
    safetyStop: boolean;
}

/**
 * Drains the telemetry and robot-event channels on a fixed cadence.
 *
 * Safety first: an armor hit zeroes the chassis straight through the
 * commander. VelocityState is bypassed and its previousChassis is left as it
 * was, so the next keyboard edge may be suppressed as "unchanged" while the
 * robot is standing still.
 */
export class EventRouter extends LoopWorker {
    public readonly name = 'event-router';

    constructor(
        private readonly telemetry: BoundedChannel<TelemetryMessage>,
        private readonly events: BoundedChannel<RobotEvent>,
        private readonly commander: Commander
    ) {
        super();
    }

    /** One cycle: a bounded receive from each channel. */
    public async pollOnce(): Promise<PollResult> {
        const { config, eventBus } = this.getContext();
        const timeout = queueTimeoutMs(config);
        const result: PollResult = { telemetry: null, event: null, safetyStop: false };

        const push = await this.telemetry.receive(timeout);
        if (push.status === 'message') {
            result.telemetry = push.value;
            console.log(`[${this.name}] push:`, push.value);
        }

        const received = await this.events.receive(timeout);
        if (received.status === 'message') {
            const event = received.value;
            result.event = event;
            if (event.kind === 'armor_hit') {
                await this.commander.chassisSpeed(0, 0, 0);
                result.safetyStop = true;
                eventBus.publish('SAFETY_STOP', { event, at: Date.now() });
            }
            console.log(`[${this.name}] event:`, event);
        }
        return result;
    }

    protected async run(signal: AbortSignal): Promise<void> {
        const cadence = queueTimeoutMs(this.getContext().config);
        while (!signal.aborted) {
            const startedAt = Date.now();
            await this.pollOnce();
            await sleep(cadence - (Date.now() - startedAt), signal);
        }
    }
}
