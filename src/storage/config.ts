import { existsSync, readFileSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { DEFAULT_CONFIG, GameConfig, GameConfigSchema } from '../schema/config.js';
import { isRecord } from '../schema/format.js';
import { GameOptions } from '../engine/game.js';
import { ConfigIssue, ConfigurationError } from './errors.js';

export const DEFAULT_CONFIG_PATH = join('data', 'config.json');

export interface LoadedConfig {
    config: GameConfig;
    /** Directory relative data paths are resolved against. */
    baseDir: string;
}

export interface LoadConfigOptions {
    /** Throw instead of warning and falling back to defaults. */
    strict?: boolean;
}

/**
 * Get the config file path.
 *
 * Priority:
 * 1. THRESHOLD_CONFIG environment variable
 * 2. --config CLI argument
 * 3. data/config.json under the working directory
 */
export function getConfigPath(argv: string[] = process.argv): string {
    if (process.env.THRESHOLD_CONFIG) {
        return process.env.THRESHOLD_CONFIG;
    }

    const index = argv.indexOf('--config');
    if (index !== -1 && argv[index + 1]) {
        return argv[index + 1];
    }

    return DEFAULT_CONFIG_PATH;
}

export function loadConfig(path: string, options: LoadConfigOptions = {}): LoadedConfig {
    const configPath = isAbsolute(path) ? path : resolve(process.cwd(), path);
    const baseDir = dirname(configPath);

    if (!existsSync(configPath)) {
        console.warn(`[Config] Config file not found at ${configPath}. Using defaults.`);
        return { config: DEFAULT_CONFIG, baseDir };
    }

    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (e) {
        const message = `Could not load config file ${configPath}: ${(e as Error).message}`;
        if (options.strict) {
            throw new ConfigurationError(message);
        }
        console.warn(`[Config] Warning: ${message}. Using defaults.`);
        return { config: DEFAULT_CONFIG, baseDir };
    }

    return { config: parseConfig(raw, options), baseDir };
}

/**
 * Merges user values over the defaults. Each invalid value is reported and
 * replaced by its default.
 */
export function parseConfig(raw: unknown, options: LoadConfigOptions = {}): GameConfig {
    if (!isRecord(raw)) {
        if (options.strict) {
            throw new ConfigurationError('Config file must contain a JSON object');
        }
        console.warn('[Config] Warning: config file must contain a JSON object. Using defaults.');
        return DEFAULT_CONFIG;
    }

    const merged = deepMerge(toRecord(DEFAULT_CONFIG), raw);
    const result = GameConfigSchema.safeParse(merged);
    if (result.success) {
        return result.data;
    }

    const issues: ConfigIssue[] = result.error.errors.map(e => ({
        path: e.path.join('.'),
        message: e.message
    }));

    if (options.strict) {
        throw new ConfigurationError('Invalid configuration values', issues);
    }

    const defaults = toRecord(DEFAULT_CONFIG);
    for (const issue of result.error.errors) {
        console.warn(`[Config] Warning: ${issue.path.join('.')}: ${issue.message}. Using default.`);
        restoreDefault(merged, defaults, issue.path.map(String));
    }

    return GameConfigSchema.parse(merged);
}

export function resolveDataPath(loaded: LoadedConfig, path: string): string {
    return isAbsolute(path) ? path : join(loaded.baseDir, path);
}

function toRecord(config: GameConfig): Record<string, unknown> {
    return JSON.parse(JSON.stringify(config));
}

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(override)) {
        const current = result[key];
        result[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
    }
    return result;
}

function restoreDefault(target: Record<string, unknown>, defaults: Record<string, unknown>, path: string[]): void {
    if (path.length === 0) return;

    const [key, ...rest] = path;
    const fallback = defaults[key];

    if (rest.length === 0 || !isRecord(fallback)) {
        if (fallback === undefined) {
            delete target[key];
        } else {
            target[key] = fallback;
        }
        return;
    }

    const child = target[key];
    if (isRecord(child)) {
        restoreDefault(child, fallback, rest);
    } else {
        target[key] = fallback;
    }
}

export function gameOptionsFromConfig(config: GameConfig): Omit<GameOptions, 'state'> {
    return {
        capacity: config.gameplay.maxInventoryItems,
        render: {
            showRoomName: config.display.showRoomNameOnLook,
            showExits: config.display.showExitList,
            choicePrefix: config.textFormatting.choicePrefix
        },
        showItemCount: config.display.showItemCountInInventory,
        logCommands: config.debug.enabled && config.debug.logCommands,
        logStateChanges: config.debug.enabled && config.debug.logStateChanges
    };
}
