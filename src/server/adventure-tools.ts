import { z } from 'zod';
import { Game, GameOptions } from '../engine/game.js';
import { parseCommand } from '../engine/parser.js';
import { PlayerState } from '../engine/player-state.js';
import { World } from '../engine/world.js';
import { PlayerStateSnapshotSchema } from '../schema/state.js';
import { getSessionManager } from './state/session-manager.js';
import { SessionContext, textResponse } from './types.js';

export interface AdventureSetup {
    /** Builds a fresh world; called once per started game. */
    createWorld: () => World;
    options: Omit<GameOptions, 'state'>;
}

let setup: AdventureSetup | null = null;

export function setAdventureSetup(value: AdventureSetup | null): void {
    setup = value;
}

function requireSetup(): AdventureSetup {
    if (!setup) {
        throw new Error('Adventure world has not been loaded');
    }
    return setup;
}

function requireGame(ctx: SessionContext): Game {
    const game = getSessionManager().get(ctx.sessionId);
    if (!game) {
        throw new Error(`No game running for session ${ctx.sessionId}. Call start_game first.`);
    }
    return game;
}

export const AdventureTools = {
    START_GAME: {
        name: 'start_game',
        description: 'Start a new adventure for this session, replacing any game in progress, and describe the opening room. Optionally resume from a player state snapshot.',
        inputSchema: z.object({
            state: PlayerStateSnapshotSchema.optional()
                .describe('Snapshot previously returned by get_player_state')
        })
    },
    SEND_COMMAND: {
        name: 'send_command',
        description: 'Send one line of player input (e.g. "go north", "take key", "choose 2") and get the narration back.',
        inputSchema: z.object({
            command: z.string().min(1, 'Command cannot be empty')
        })
    },
    GET_PLAYER_STATE: {
        name: 'get_player_state',
        description: 'Get the current player state: room, held items, completed doors, flags and story cursors.',
        inputSchema: z.object({})
    },
    END_GAME: {
        name: 'end_game',
        description: 'End the adventure running in this session.',
        inputSchema: z.object({})
    }
} as const;

export async function handleStartGame(args: unknown, ctx: SessionContext) {
    const parsed = AdventureTools.START_GAME.inputSchema.parse(args);
    const { createWorld, options } = requireSetup();

    const state = parsed.state ? PlayerState.fromSnapshot(parsed.state) : undefined;
    const game = new Game(createWorld(), { ...options, state });
    getSessionManager().set(ctx.sessionId, game);

    return textResponse(game.intro().paragraphs.join('\n\n'));
}

export async function handleSendCommand(args: unknown, ctx: SessionContext) {
    const parsed = AdventureTools.SEND_COMMAND.inputSchema.parse(args);
    const game = requireGame(ctx);

    const response = game.execute(parseCommand(parsed.command));
    if (response.ended) {
        getSessionManager().delete(ctx.sessionId);
    }

    return textResponse(response.paragraphs.join('\n\n'));
}

export async function handleGetPlayerState(args: unknown, ctx: SessionContext) {
    AdventureTools.GET_PLAYER_STATE.inputSchema.parse(args);
    const game = requireGame(ctx);

    return textResponse(JSON.stringify({
        ...game.state.toSnapshot(),
        inventory: game.inventory.list().map(item => ({ id: item.id, name: item.name }))
    }, null, 2));
}

export async function handleEndGame(args: unknown, ctx: SessionContext) {
    AdventureTools.END_GAME.inputSchema.parse(args);
    const ended = getSessionManager().delete(ctx.sessionId);

    return textResponse(ended ? 'Game ended.' : `No game running for session ${ctx.sessionId}.`);
}
