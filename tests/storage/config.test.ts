import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_CONFIG } from '../../src/schema/config.js';
import {
    DEFAULT_CONFIG_PATH,
    gameOptionsFromConfig,
    getConfigPath,
    loadConfig,
    parseConfig,
    resolveDataPath
} from '../../src/storage/config.js';
import { ConfigurationError } from '../../src/storage/errors.js';

describe('Config', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'threshold-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    describe('getConfigPath', () => {
        it('should prefer the environment variable', () => {
            vi.stubEnv('THRESHOLD_CONFIG', '/srv/game/config.json');
            expect(getConfigPath(['--config', 'other.json'])).toBe('/srv/game/config.json');
        });

        it('should read --config and fall back to the default', () => {
            vi.stubEnv('THRESHOLD_CONFIG', '');
            expect(getConfigPath(['--config', 'other.json'])).toBe('other.json');
            expect(getConfigPath(['--config'])).toBe(DEFAULT_CONFIG_PATH);
            expect(getConfigPath([])).toBe(join('data', 'config.json'));
        });
    });

    describe('parseConfig', () => {
        it('should fill every section with defaults', () => {
            expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
            expect(DEFAULT_CONFIG.textFormatting.lineWidth).toBe(80);
            expect(DEFAULT_CONFIG.gameplay).toEqual({ maxInventoryItems: 10, startingRoom: 'hub' });
            expect(DEFAULT_CONFIG.filePaths).toEqual({ itemsData: 'items.json', roomsDir: 'rooms' });
        });

        it('should keep valid overrides next to defaults', () => {
            const config = parseConfig({ textFormatting: { promptSymbol: '$ ' }, gameplay: { startingRoom: 'atrium' } });

            expect(config.textFormatting.promptSymbol).toBe('$ ');
            expect(config.textFormatting.lineWidth).toBe(80);
            expect(config.gameplay).toEqual({ maxInventoryItems: 10, startingRoom: 'atrium' });
        });

        it('should replace an out-of-range value with its default and warn', () => {
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => { });

            const config = parseConfig({ textFormatting: { lineWidth: 200, promptSymbol: '$ ' } });

            expect(config.textFormatting.lineWidth).toBe(80);
            expect(config.textFormatting.promptSymbol).toBe('$ ');
            expect(warn).toHaveBeenCalledTimes(1);
            expect(warn.mock.calls[0][0]).toMatch(/^\[Config\] Warning: textFormatting\.lineWidth: .+\. Using default\.$/);
        });

        it('should replace a whole section of the wrong type', () => {
            vi.spyOn(console, 'warn').mockImplementation(() => { });

            const config = parseConfig({ display: 'yes', gameplay: { maxInventoryItems: 3 } });

            expect(config.display).toEqual(DEFAULT_CONFIG.display);
            expect(config.gameplay.maxInventoryItems).toBe(3);
        });

        it('should throw every issue in strict mode', () => {
            let error: unknown;
            try {
                parseConfig({ gameplay: { maxInventoryItems: 0 }, textFormatting: { separatorLength: 'long' } }, { strict: true });
            } catch (e) {
                error = e;
            }

            expect(error).toBeInstanceOf(ConfigurationError);
            if (error instanceof ConfigurationError) {
                expect(error.issues.map(issue => issue.path).sort()).toEqual([
                    'gameplay.maxInventoryItems',
                    'textFormatting.separatorLength'
                ]);
            }
        });

        it('should use defaults when the file is not an object', () => {
            vi.spyOn(console, 'warn').mockImplementation(() => { });
            expect(parseConfig([1, 2])).toEqual(DEFAULT_CONFIG);
            expect(() => parseConfig('text', { strict: true })).toThrow(ConfigurationError);
        });

        it('should ignore unknown keys', () => {
            expect(parseConfig({ colours: { enabled: true } })).toEqual(DEFAULT_CONFIG);
        });
    });

    describe('loadConfig', () => {
        it('should load a file and resolve data paths next to it', () => {
            const path = join(dir, 'config.json');
            writeFileSync(path, JSON.stringify({ filePaths: { itemsData: 'things.json' } }));

            const loaded = loadConfig(path);

            expect(loaded.baseDir).toBe(dir);
            expect(loaded.config.filePaths.itemsData).toBe('things.json');
            expect(resolveDataPath(loaded, 'things.json')).toBe(join(dir, 'things.json'));
            expect(resolveDataPath(loaded, '/abs/rooms')).toBe('/abs/rooms');
        });

        it('should use defaults when the file is missing', () => {
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => { });

            const loaded = loadConfig(join(dir, 'missing.json'));

            expect(loaded.config).toEqual(DEFAULT_CONFIG);
            expect(warn.mock.calls[0][0]).toContain('[Config] Config file not found');
        });

        it('should use defaults for invalid JSON unless strict', () => {
            vi.spyOn(console, 'warn').mockImplementation(() => { });
            const path = join(dir, 'config.json');
            writeFileSync(path, '{ not json');

            expect(loadConfig(path).config).toEqual(DEFAULT_CONFIG);
            expect(() => loadConfig(path, { strict: true })).toThrow(ConfigurationError);
        });
    });

    describe('gameOptionsFromConfig', () => {
        it('should map display and gameplay settings', () => {
            expect(gameOptionsFromConfig(DEFAULT_CONFIG)).toEqual({
                capacity: 10,
                render: { showRoomName: true, showExits: true, choicePrefix: '  ' },
                showItemCount: true,
                logCommands: false,
                logStateChanges: false
            });
        });

        it('should only enable logging when debug is enabled', () => {
            const quiet = parseConfig({ debug: { logCommands: true } });
            const loud = parseConfig({ debug: { enabled: true, logCommands: true } });

            expect(gameOptionsFromConfig(quiet).logCommands).toBe(false);
            expect(gameOptionsFromConfig(loud).logCommands).toBe(true);
        });
    });
});
