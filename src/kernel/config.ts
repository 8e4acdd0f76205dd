import { z } from 'zod';
import { ConfigError } from './errors';

export const TeleopConfigSchema = z.object({
    /** Capacity of the telemetry and event channels. */
    queueSize:        z.coerce.number().int().positive().default(10),
    /** Chassis/gimbal push frequency requested from the robot, in Hz. */
    pushFrequency:    z.coerce.number().int().positive().default(1),
    timeoutUnitMs:    z.coerce.number().positive().default(100),
    /** Chassis speed per gear step, m/s. */
    unitSpeed:        z.coerce.number().positive().default(0.2),
    /** Gimbal speed per gear step, deg/s. */
    unitDegree:       z.coerce.number().positive().default(20),
    armorSensitivity: z.coerce.number().int().min(1).max(10).default(10),
    /** Terminals report no key-up; one is synthesized after this much silence. */
    keyReleaseMs:     z.coerce.number().int().positive().default(150),
    /** Key-up synthesis delay after the first keypress; terminals pause before auto-repeat starts. */
    keyRepeatDelayMs: z.coerce.number().int().positive().default(660),
    robotIp:          z.string().default(''),
    commandTimeoutMs: z.coerce.number().int().positive().default(10_000),
});

export type TeleopConfig = z.infer<typeof TeleopConfigSchema>;

const ENV_KEYS: Record<keyof TeleopConfig, string> = {
    queueSize:        'TELEOP_QUEUE_SIZE',
    pushFrequency:    'TELEOP_PUSH_FREQUENCY',
    timeoutUnitMs:    'TELEOP_TIMEOUT_UNIT_MS',
    unitSpeed:        'TELEOP_UNIT_SPEED',
    unitDegree:       'TELEOP_UNIT_DEGREE',
    armorSensitivity: 'TELEOP_ARMOR_SENSITIVITY',
    keyReleaseMs:     'TELEOP_KEY_RELEASE_MS',
    keyRepeatDelayMs: 'TELEOP_KEY_REPEAT_DELAY_MS',
    robotIp:          'TELEOP_ROBOT_IP',
    commandTimeoutMs: 'TELEOP_COMMAND_TIMEOUT_MS',
};

export function parseConfig(raw: unknown): TeleopConfig {
    const result = TeleopConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return result.data;
}

/** Reads TELEOP_* variables; unset or blank variables fall back to defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TeleopConfig {
    const raw: Record<string, string> = {};
    for (const [field, name] of Object.entries(ENV_KEYS)) {
        const value = env[name];
        if (value !== undefined && value.trim() !== '') raw[field] = value.trim();
    }
    return parseConfig(raw);
}

/** Receive timeout and poll cadence for the telemetry/event consumers. */
export function queueTimeoutMs(config: TeleopConfig): number {
    return config.timeoutUnitMs / config.pushFrequency;
}

export const DEFAULT_CONFIG: TeleopConfig = parseConfig({});
