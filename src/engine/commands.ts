export const COMMAND_NAMES = [
    'help',
    'quit',
    'look',
    'go',
    'inventory',
    'take',
    'choose',
    'talk',
    'use'
] as const;

export type CommandName = typeof COMMAND_NAMES[number];

export interface CommandInfo {
    aliases: readonly string[];
    usage: string;
    description: string;
    /** Recognized commands that are not wired up yet answer with a placeholder. */
    implemented: boolean;
}

export const COMMANDS: Record<CommandName, CommandInfo> = {
    help: {
        aliases: ['h', '?', 'commands'],
        usage: 'help [command]',
        description: 'Shows this list, or details for one command.',
        implemented: true
    },
    quit: {
        aliases: ['exit', 'q'],
        usage: 'quit',
        description: 'Exits the game.',
        implemented: true
    },
    look: {
        aliases: ['l', 'examine', 'inspect', 'x'],
        usage: 'look [target]',
        description: 'Examines the current room, or an item you name.',
        implemented: true
    },
    go: {
        aliases: ['g', 'move', 'travel', 'walk'],
        usage: 'go <direction>',
        description: 'Moves through an exit in the given direction.',
        implemented: true
    },
    inventory: {
        aliases: ['inv', 'i', 'items'],
        usage: 'inventory',
        description: 'Checks your inventory.',
        implemented: true
    },
    take: {
        aliases: ['get', 'grab', 'pick'],
        usage: 'take <item>',
        description: 'Picks up an item in the current room.',
        implemented: true
    },
    choose: {
        aliases: ['c', 'select', 'option'],
        usage: 'choose <number>',
        description: 'Picks a numbered option when the story offers choices.',
        implemented: true
    },
    talk: {
        aliases: ['t', 'speak', 'chat'],
        usage: 'talk',
        description: 'Talks to whoever is nearby.',
        implemented: false
    },
    use: {
        aliases: ['u', 'utilize', 'apply'],
        usage: 'use <item>',
        description: 'Uses an item you are carrying.',
        implemented: false
    }
};

const ALIAS_MAP: ReadonlyMap<string, CommandName> = (() => {
    const map = new Map<string, CommandName>();
    for (const name of COMMAND_NAMES) {
        map.set(name, name);
        for (const alias of COMMANDS[name].aliases) {
            map.set(alias, name);
        }
    }
    return map;
})();

export function resolveCommandName(word: string): CommandName | null {
    return ALIAS_MAP.get(word.trim().toLowerCase()) ?? null;
}

export function renderHelp(topic?: string): string {
    if (topic === undefined) {
        const lines = ['Available commands:'];
        for (const name of COMMAND_NAMES) {
            const info = COMMANDS[name];
            if (!info.implemented) continue;
            lines.push(`  ${info.usage.padEnd(16)} ${info.description}`);
        }
        return lines.join('\n');
    }

    const name = resolveCommandName(topic);
    if (name === null) {
        return `'${topic}' is not a recognized command. Type 'help' for a list of commands.`;
    }

    const info = COMMANDS[name];
    return [
        `Usage: ${info.usage}`,
        `Aliases: ${info.aliases.join(', ')}`,
        `Description: ${info.description}`
    ].join('\n');
}
