/**
 * demo.ts — drive the simulated robot from this terminal.
 *
 *   w/s/a/d   chassis          arrows  gimbal
 *   1..5      gear (on release) space  fire
 *   ctrl+c    quit
 *
 * Settings come from TELEOP_* environment variables (see kernel/config.ts).
 */

import { loadConfig } from './kernel/config';
import { SimulatedRobot } from './adapters/simulated_robot';
import { TerminalKeySource } from './adapters/terminal_key_source';
import { runSession } from './session';

export async function main(): Promise<number> {
    const config = loadConfig();
    const robot = new SimulatedRobot({ ip: config.robotIp || undefined });
    const keys = TerminalKeySource.fromStdin({
        releaseMs: config.keyReleaseMs,
        repeatDelayMs: config.keyRepeatDelayMs,
    });

    try {
        const report = await runSession({ commander: robot, link: robot, keys, config });
        return report.outcomes.some((o) => o.status === 'failed') ? 1 : 0;
    } finally {
        keys.close();
        robot.shutdown();
    }
}

if (require.main === module) {
    main().then(
        (code) => {
            process.exitCode = code;
        },
        (error: unknown) => {
            console.error('[demo] Session failed:', error);
            process.exitCode = 1;
        }
    );
}
