/**
 * session.ts — one teleoperation session, start to finish.
 *
 *   vision  ─ frames ──────────────────────────────► FrameSink
 *   push    ─ telemetry ─► [BoundedChannel N] ─┐
 *   event   ─ robot events ► [BoundedChannel N] ┴──► EventRouter ─► commander (safety stop)
 *   keyboard device ─────────────────────────────► KeyboardController ─► VelocityState ─► commander
 *
 * The keyboard controller ends the session; everything else is stopped and
 * joined after it.
 */

import { BoundedChannel } from './kernel/bounded_channel';
import { SerializedCommander, type RobotCommander } from './kernel/commander';
import { DEFAULT_CONFIG, type TeleopConfig } from './kernel/config';
import { Orchestrator, type SessionReport } from './kernel/orchestrator';
import { RobotEventSchema, TelemetryMessageSchema } from './kernel/schemas';
import type { FrameSink, KeySource, RobotEvent, RobotLink, TelemetryMessage } from './kernel/types';
import { ChannelPump } from './plugins/channel_pump';
import { EventRouter } from './plugins/event_router';
import { FrameRelay } from './plugins/frame_relay';
import { KeyboardController } from './plugins/keyboard_controller';
import type { KeyBindings } from './plugins/key_map';

export interface SessionDeps {
    commander: RobotCommander;
    link: RobotLink;
    keys: KeySource;
    /** Omit to run without video; the stream is then left off. */
    sink?: FrameSink;
    config?: TeleopConfig;
    bindings?: KeyBindings;
}

export interface SessionParts {
    orchestrator: Orchestrator;
    telemetry: BoundedChannel<TelemetryMessage>;
    events: BoundedChannel<RobotEvent>;
    keyboard: KeyboardController;
    router: EventRouter;
}

/** Put the robot in teleop mode and turn on the pushes and events the router consumes. */
export async function prepareRobot(commander: RobotCommander, config: TeleopConfig, video: boolean): Promise<string> {
    const ip = await commander.getIp();
    console.log(`[Session] Robot at ${ip || '(discovered)'}`);

    await commander.robotMode('gimbal_lead');
    await commander.gimbalRecenter();
    await commander.stream(video);

    const hz = config.pushFrequency;
    await commander.chassisPushOn(hz, hz, hz);
    await commander.gimbalPushOn(hz);
    await commander.armorSensitivity(config.armorSensitivity);
    await commander.armorEvent('hit', true);
    await commander.soundEvent('applause', true);
    return ip;
}

/** Wire channels and workers; nothing runs until orchestrator.run(). */
export function buildSession(deps: SessionDeps): SessionParts {
    const config = deps.config ?? DEFAULT_CONFIG;
    const commander = new SerializedCommander(deps.commander, { timeoutMs: config.commandTimeoutMs });
    const telemetry = new BoundedChannel<TelemetryMessage>(config.queueSize);
    const events = new BoundedChannel<RobotEvent>(config.queueSize);

    const orchestrator = new Orchestrator(config);
    if (deps.sink) {
        orchestrator.registerWorker(new FrameRelay(() => deps.link.video(), deps.sink));
    }
    orchestrator.registerWorker(
        new ChannelPump('push', () => deps.link.telemetry(), telemetry, { schema: TelemetryMessageSchema })
    );
    orchestrator.registerWorker(
        new ChannelPump('event', () => deps.link.events(), events, { schema: RobotEventSchema })
    );
    const router = new EventRouter(telemetry, events, commander);
    orchestrator.registerWorker(router);
    const keyboard = new KeyboardController(deps.keys, commander, { bindings: deps.bindings });
    orchestrator.registerWorker(keyboard);

    return { orchestrator, telemetry, events, keyboard, router };
}

/**
 * Prepare the robot, run until the keyboard session ends, then stop every
 * worker and bring the chassis to rest.
 */
export async function runSession(deps: SessionDeps): Promise<SessionReport> {
    const config = deps.config ?? DEFAULT_CONFIG;
    await prepareRobot(deps.commander, config, deps.sink !== undefined);

    const { orchestrator, telemetry, events } = buildSession({ ...deps, config });
    let report: SessionReport;
    try {
        report = await orchestrator.run();
    } finally {
        await orchestrator.destroyAll();
        telemetry.close();
        events.close();
    }

    await deps.commander.setChassisZero();
    const failed = report.outcomes.filter((o) => o.status === 'failed').map((o) => o.worker);
    console.log(
        `[Session] Ended (${report.reason})` + (failed.length > 0 ? `; failed workers: ${failed.join(', ')}` : '')
    );
    return report;
}
