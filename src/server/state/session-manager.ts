import { Game } from '../../engine/game.js';

/**
 * One running game per MCP session.
 */
export class SessionManager {
    private games: Map<string, Game> = new Map();

    set(sessionId: string, game: Game): void {
        this.games.set(sessionId, game);
    }

    get(sessionId: string): Game | null {
        return this.games.get(sessionId) || null;
    }

    delete(sessionId: string): boolean {
        return this.games.delete(sessionId);
    }

    list(): string[] {
        return Array.from(this.games.keys());
    }

    clear(): void {
        this.games.clear();
    }
}

// Singleton for server lifetime
let instance: SessionManager | null = null;
export function getSessionManager(): SessionManager {
    if (!instance) instance = new SessionManager();
    return instance;
}
