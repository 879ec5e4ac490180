import { CommandName, resolveCommandName } from './commands.js';

export interface ParsedCommand {
    /** Canonical command, or null when the input was empty or the verb unknown. */
    verb: CommandName | null;
    args: string[];
}

/**
 * Splits a raw input line into a canonical verb and its arguments.
 * Input is lowercased and split on whitespace; the verb goes through the alias table.
 */
export function parseCommand(input: string): ParsedCommand {
    const words = input.toLowerCase().trim().split(/\s+/).filter(word => word.length > 0);
    if (words.length === 0) {
        return { verb: null, args: [] };
    }

    const [verb, ...args] = words;
    return { verb: resolveCommandName(verb), args };
}
