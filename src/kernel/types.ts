import type { RobotEvent, TelemetryMessage } from './schemas';

// ── Vectors ───────────────────────────────────────────────────────────────────

/** (vx, vy) for the chassis, (pitch, yaw) for the gimbal. */
export type Vector2 = readonly [number, number];

export const ZERO: Vector2 = [0, 0];

export function vectorsEqual(a: Vector2, b: Vector2): boolean {
    return a[0] === b[0] && a[1] === b[1];
}

// ── Keyboard ──────────────────────────────────────────────────────────────────

export const GEARS = [1, 2, 3, 4, 5] as const;
export type Gear = (typeof GEARS)[number];

export type TeleopKey =
    | 'forward' | 'back' | 'left' | 'right'
    | 'gimbalUp' | 'gimbalDown' | 'gimbalLeft' | 'gimbalRight'
    | 'modifier' | 'fire'
    | 'gear1' | 'gear2' | 'gear3' | 'gear4' | 'gear5'
    | 'quit';

export type KeyEdge = 'down' | 'up';

export interface KeyEvent {
    type: KeyEdge;
    key: TeleopKey;
}

/** Device-level key event before it is mapped onto a TeleopKey. */
export interface RawKeyEvent {
    type: KeyEdge;
    name: string;
}

/** A keyboard device. Iteration ends when the device closes. */
export interface KeySource extends AsyncIterable<RawKeyEvent> {
    close(): void;
}

// ── Robot link ────────────────────────────────────────────────────────────────

export type { RobotEvent, TelemetryMessage };

export interface VideoFrame {
    data: Uint8Array;
    width: number;
    height: number;
    sequence: number;
}

/** Invoked once per decoded frame; the core never inspects the frame. */
export type FrameSink = (frame: VideoFrame) => void;

/**
 * Decoded streams coming off the robot. Reconnects and decoding live in the
 * implementation; the core only iterates.
 */
export interface RobotLink {
    telemetry(): AsyncIterable<TelemetryMessage>;
    events(): AsyncIterable<RobotEvent>;
    video(): AsyncIterable<VideoFrame>;
}
