import { z } from 'zod';

export const FilePathsSchema = z.object({
    itemsData: z.string().min(1).default('items.json'),
    roomsDir: z.string().min(1).default('rooms')
});

export const TextFormattingSchema = z.object({
    lineWidth: z.number().int().min(40).max(120).default(80),
    paragraphSpacing: z.number().int().min(0).max(5).default(1),
    promptSymbol: z.string().default('> '),
    choicePrefix: z.string().default('  '),
    separatorChar: z.string().min(1).default('-'),
    separatorLength: z.number().int().min(10).max(80).default(40)
});

export const GameplaySchema = z.object({
    maxInventoryItems: z.number().int().min(1).max(100).default(10),
    startingRoom: z.string().min(1).default('hub')
});

export const DisplaySchema = z.object({
    showRoomNameOnLook: z.boolean().default(true),
    showExitList: z.boolean().default(true),
    showItemCountInInventory: z.boolean().default(true)
});

export const DebugSchema = z.object({
    enabled: z.boolean().default(false),
    logCommands: z.boolean().default(false),
    logStateChanges: z.boolean().default(false)
});

export const GameConfigSchema = z.object({
    filePaths: FilePathsSchema.default({}),
    textFormatting: TextFormattingSchema.default({}),
    gameplay: GameplaySchema.default({}),
    display: DisplaySchema.default({}),
    debug: DebugSchema.default({}),
    version: z.string().default('1.0.0')
});

export type GameConfig = z.infer<typeof GameConfigSchema>;
export type TextFormatting = z.infer<typeof TextFormattingSchema>;

export const DEFAULT_CONFIG: GameConfig = GameConfigSchema.parse({});
