import { z } from 'zod';

// Ingress validation for what the robot link hands the core. Anything that
// fails here is dropped by the pump before it reaches a channel.

export const TelemetryMessageSchema = z.object({
    topic: z.string().min(1),
    payload: z.unknown(),
    receivedAt: z.number().nonnegative(),
});

export const RobotEventSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('armor_hit'),
        armorId: z.number().int().nonnegative().optional(),
        hitType: z.string().optional(),
    }),
    z.object({ kind: z.literal('sound'), soundKind: z.string() }),
    z.object({ kind: z.literal('other'), raw: z.string() }),
]);

export type TelemetryMessage = z.infer<typeof TelemetryMessageSchema>;
export type RobotEvent = z.infer<typeof RobotEventSchema>;
