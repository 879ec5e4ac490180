/**
 * Raised when the game cannot start at all: no rooms, no readable item
 * catalog, or a starting room that was never loaded.
 */
export class StartupError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'StartupError';
    }
}

export interface ConfigIssue {
    path: string;
    message: string;
}

/**
 * Raised only when configuration is loaded strictly (`--check`).
 */
export class ConfigurationError extends Error {
    constructor(message: string, readonly issues: ConfigIssue[] = []) {
        super(message);
        this.name = 'ConfigurationError';
    }
}
