import { z } from 'zod';

export const ROOM_TYPES = ['hub', 'story'] as const;
export type RoomKind = typeof ROOM_TYPES[number];

/**
 * An exit is either a bare destination room id or a door record.
 */
export const ExitDefinitionSchema = z.union([
    z.string().min(1, 'Exit destination cannot be empty'),
    z.object({
        destination: z.string().min(1, 'Exit destination cannot be empty'),
        locked: z.boolean().default(false),
        requiredItemId: z.string().optional(),
        lockedMessage: z.string().optional(),
        unlockMessage: z.string().optional(),
        completionFlag: z.string().optional()
            .describe('Once this flag is true the exit can never be used again')
    })
]);

export type ExitDefinition = z.infer<typeof ExitDefinitionSchema>;

export const ChoiceDefinitionSchema = z.object({
    text: z.string().min(1, 'Choice text cannot be empty'),
    nextNode: z.string().optional(),
    outcomeText: z.string().optional(),
    reward: z.string().optional(),
    flag: z.string().optional()
});

export type ChoiceDefinition = z.infer<typeof ChoiceDefinitionSchema>;

// Choices stay unknown here so one bad choice can be dropped without losing the node.
export const StoryNodeDefinitionSchema = z.object({
    prompt: z.string().default(''),
    choices: z.array(z.unknown()).default([]),
    // Leaf shorthand: a node with an outcome and no choices becomes a single leaf choice
    outcomeText: z.string().optional(),
    choiceText: z.string().optional(),
    reward: z.string().optional(),
    flag: z.string().optional()
});

export type StoryNodeDefinition = z.infer<typeof StoryNodeDefinitionSchema>;

const RoomBaseShape = {
    name: z.string().default('Unnamed Room'),
    description: z.string().default(''),
    items: z.array(z.string()).default([]),
    exits: z.record(z.unknown()).default({})
};

export const HubRoomDefinitionSchema = z.object({
    type: z.literal('hub'),
    ...RoomBaseShape,
    scenery: z.array(z.string()).default([])
});

export const StoryRoomDefinitionSchema = z.object({
    type: z.literal('story'),
    ...RoomBaseShape,
    entryNode: z.string().optional(),
    completionFlag: z.string().optional(),
    storyNodes: z.record(z.unknown()).default({})
});

export const RoomDefinitionSchema = z.discriminatedUnion('type', [
    HubRoomDefinitionSchema,
    StoryRoomDefinitionSchema
]);

export type RoomDefinition = z.infer<typeof RoomDefinitionSchema>;

// Runtime shapes, built from the definitions above by the world loader.

export interface ExitSpec {
    readonly destination: string;
    readonly locked: boolean;
    readonly requiredItemId?: string;
    readonly lockedMessage?: string;
    readonly unlockMessage?: string;
    readonly completionFlag?: string;
}

export interface BranchChoice {
    readonly kind: 'branch';
    readonly text: string;
    readonly nextNode: string;
}

export interface LeafChoice {
    readonly kind: 'leaf';
    readonly text: string;
    readonly outcomeText: string;
    readonly reward?: string;
    readonly flag?: string;
}

export type Choice = BranchChoice | LeafChoice;

export interface StoryNode {
    readonly id: string;
    readonly prompt: string;
    readonly choices: readonly Choice[];
}
