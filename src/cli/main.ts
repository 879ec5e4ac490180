import { basename, extname } from 'path';
import { Game } from '../engine/game.js';
import { World } from '../engine/world.js';
import { startServer } from '../server/index.js';
import { GameConfig } from '../schema/config.js';
import { gameOptionsFromConfig, getConfigPath, loadConfig } from '../storage/config.js';
import { ConfigurationError, StartupError } from '../storage/errors.js';
import { convertMarkdownFile } from '../storage/markdown-room.js';
import { WorldSource, buildWorld, readWorldSource } from '../storage/world-loader.js';
import { runRepl } from './repl.js';

const USAGE = `Usage:
  threshold [--config <path>]           play in the terminal
  threshold --mcp [--config <path>]     serve the game over MCP (stdio)
  threshold --check [--config <path>]   validate configuration and data, then exit
  threshold convert <story.md> <rooms.json> [--name <room name>]`;

interface Prepared {
    config: GameConfig;
    source: WorldSource;
    world: World;
}

function prepare(argv: string[], strict: boolean): Prepared | number {
    try {
        const loaded = loadConfig(getConfigPath(argv), { strict });
        const source = readWorldSource(loaded);
        const world = buildWorld(source, { startingRoomId: loaded.config.gameplay.startingRoom });
        return { config: loaded.config, source, world };
    } catch (e) {
        if (e instanceof ConfigurationError) {
            console.error(`[CLI] ${e.message}`);
            e.issues.forEach(issue => console.error(`[CLI]   ${issue.path}: ${issue.message}`));
            return 1;
        }
        if (e instanceof StartupError) {
            console.error(`[CLI] ${e.message}`);
            return 1;
        }
        throw e;
    }
}

function runConvert(args: string[]): number {
    const paths: string[] = [];
    let name: string | undefined;
    for (let i = 0; i < args.length; i++) {
        if (args[i] === '--name') {
            name = args[++i];
        } else {
            paths.push(args[i]);
        }
    }
    const [input, output] = paths;

    if (!input || !output) {
        console.error(USAGE);
        return 1;
    }

    try {
        const roomId = convertMarkdownFile(input, output, { name: name ?? basename(input, extname(input)) });
        console.error(`[CLI] Converted ${input} to ${output} (room '${roomId}')`);
        return 0;
    } catch (e) {
        console.error(`[CLI] Conversion failed: ${(e as Error).message}`);
        return 1;
    }
}

/**
 * Returns the process exit code. In MCP mode the returned promise settles once
 * the server is connected; the transport keeps the process alive.
 */
export async function main(argv: string[]): Promise<number> {
    if (argv.includes('--help')) {
        console.error(USAGE);
        return 0;
    }
    if (argv[0] === 'convert') {
        return runConvert(argv.slice(1));
    }

    const strict = argv.includes('--check');
    const prepared = prepare(argv, strict);
    if (typeof prepared === 'number') {
        return prepared;
    }

    const { config, source, world } = prepared;
    if (strict) {
        console.error(`[CLI] OK: ${world.rooms.size} rooms, ${world.catalog.size} items`);
        return 0;
    }

    const options = gameOptionsFromConfig(config);
    if (argv.includes('--mcp')) {
        const createWorld = () => buildWorld(source, { startingRoomId: config.gameplay.startingRoom });
        await startServer({ createWorld, options }, config.version);
        return 0;
    }

    await runRepl(new Game(world, options), config.textFormatting);
    return 0;
}
