import { z } from 'zod';

export const FlagValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type FlagValue = z.infer<typeof FlagValueSchema>;

/**
 * Plain JSON form of the player state. Used to rehydrate a game and to report
 * state over MCP; nothing is written to disk.
 */
export const PlayerStateSnapshotSchema = z.object({
    currentRoomId: z.string().min(1, 'Current room id cannot be empty'),
    heldItemIds: z.array(z.string()).default([]),
    completedDoorIds: z.array(z.string()).default([]),
    flags: z.record(FlagValueSchema).default({}),
    storyNodeCursor: z.record(z.string()).default({})
});

export type PlayerStateSnapshot = z.infer<typeof PlayerStateSnapshotSchema>;
