import { z } from 'zod';

/**
 * Raw item entry as authored in items.json. Missing text fields fall back to
 * defaults; a field of the wrong type makes the whole entry malformed.
 */
export const ItemDefinitionSchema = z.object({
    name: z.string().default('Unknown Item'),
    description: z.string().default(''),
    flavorText: z.string().default('')
});

export type ItemDefinition = z.infer<typeof ItemDefinitionSchema>;

export interface Item {
    readonly id: string;
    readonly name: string;
    readonly description: string;
    readonly flavorText: string;
}
