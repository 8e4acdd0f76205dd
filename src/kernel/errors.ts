/** Raised by a Commander when a command cannot reach the robot. */
export class CommandTransportError extends Error {
    public readonly command: string;

    constructor(command: string, cause?: unknown) {
        const detail = cause instanceof Error ? cause.message : cause === undefined ? 'transport failure' : String(cause);
        super(`[Commander] ${command} failed: ${detail}`, { cause });
        this.name = 'CommandTransportError';
        this.command = command;
    }
}

/** Thrown by send/trySend once the channel has been closed. */
export class ChannelClosedError extends Error {
    constructor() {
        super('[BoundedChannel] send on a closed channel');
        this.name = 'ChannelClosedError';
    }
}

/** Thrown when configuration fails validation; lists every bad field. */
export class ConfigError extends Error {
    public readonly issues: string[];

    constructor(issues: string[]) {
        super(`[Config] invalid configuration:\n  ${issues.join('\n  ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}
