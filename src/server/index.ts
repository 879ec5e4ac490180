import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import {
    AdventureSetup,
    AdventureTools,
    handleEndGame,
    handleGetPlayerState,
    handleSendCommand,
    handleStartGame,
    setAdventureSetup
} from './adventure-tools.js';
import { getSessionManager } from './state/session-manager.js';
import { withSession } from './types.js';

/**
 * Setup shutdown handlers so running sessions are dropped and the process
 * exits cleanly.
 */
function setupShutdownHandlers(): void {
    let isShuttingDown = false;

    const shutdown = (signal: string, code = 0) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        console.error(`[Server] Received ${signal}, shutting down...`);
        getSessionManager().clear();
        process.exit(code);
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGHUP', () => shutdown('SIGHUP'));

    process.on('uncaughtException', (error) => {
        console.error('[Server] Uncaught exception:', error);
        shutdown('uncaughtException', 1);
    });

    process.on('unhandledRejection', (reason) => {
        console.error('[Server] Unhandled rejection:', reason);
        shutdown('unhandledRejection', 1);
    });
}

export function createServer(setup: AdventureSetup, version: string): McpServer {
    setAdventureSetup(setup);

    const server = new McpServer({
        name: 'threshold',
        version
    });

    const sessionShape = { sessionId: z.string().optional() };

    server.tool(
        AdventureTools.START_GAME.name,
        AdventureTools.START_GAME.description,
        AdventureTools.START_GAME.inputSchema.extend(sessionShape).shape,
        withSession(handleStartGame)
    );

    server.tool(
        AdventureTools.SEND_COMMAND.name,
        AdventureTools.SEND_COMMAND.description,
        AdventureTools.SEND_COMMAND.inputSchema.extend(sessionShape).shape,
        withSession(handleSendCommand)
    );

    server.tool(
        AdventureTools.GET_PLAYER_STATE.name,
        AdventureTools.GET_PLAYER_STATE.description,
        AdventureTools.GET_PLAYER_STATE.inputSchema.extend(sessionShape).shape,
        withSession(handleGetPlayerState)
    );

    server.tool(
        AdventureTools.END_GAME.name,
        AdventureTools.END_GAME.description,
        AdventureTools.END_GAME.inputSchema.extend(sessionShape).shape,
        withSession(handleEndGame)
    );

    return server;
}

export async function startServer(setup: AdventureSetup, version: string): Promise<void> {
    setupShutdownHandlers();

    const server = createServer(setup, version);
    const transport = new StdioServerTransport();
    await server.connect(transport);

    console.error('[Server] Threshold MCP server running on stdio');
}
