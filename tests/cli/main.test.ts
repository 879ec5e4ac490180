import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { main } from '../../src/cli/main.js';

describe('main', () => {
    let dir: string;
    let errors: string[];

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'threshold-main-'));
        errors = [];
        vi.stubEnv('THRESHOLD_CONFIG', '');
        vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
            errors.push(String(message));
        });
        vi.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should validate the bundled data', async () => {
        expect(await main(['--check', '--config', 'data/config.json'])).toBe(0);
        expect(errors).toEqual(['[CLI] OK: 4 rooms, 5 items']);
    });

    it('should fail the check when the data cannot be loaded', async () => {
        expect(await main(['--check', '--config', join(dir, 'config.json')])).toBe(1);
        expect(errors[0]).toMatch(/^\[CLI\] Item catalog could not be read from /);
    });

    it('should fail the check on invalid configuration', async () => {
        const path = join(dir, 'config.json');
        writeFileSync(path, JSON.stringify({ gameplay: { maxInventoryItems: 500 } }));

        expect(await main(['--check', '--config', path])).toBe(1);
        expect(errors[0]).toBe('[CLI] Invalid configuration values');
        expect(errors[1]).toMatch(/^\[CLI\] {3}gameplay\.maxInventoryItems: /);
    });

    it('should convert a story outline', async () => {
        const output = join(dir, 'rooms.json');

        expect(await main(['convert', 'stories/blue_room.md', output, '--name', 'Blue Room'])).toBe(0);
        expect(existsSync(output)).toBe(true);
        expect(errors).toEqual([`[CLI] Converted stories/blue_room.md to ${output} (room 'blue_room')`]);
    });

    it('should print usage when convert is missing paths', async () => {
        expect(await main(['convert', 'only.md'])).toBe(1);
        expect(errors[0]).toContain('Usage:');
    });

    it('should report a failed conversion', async () => {
        expect(await main(['convert', join(dir, 'missing.md'), join(dir, 'out.json')])).toBe(1);
        expect(errors[0]).toMatch(/^\[CLI\] Conversion failed: /);
    });
});
