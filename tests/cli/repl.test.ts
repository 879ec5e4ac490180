import { PassThrough } from 'stream';
import { runRepl } from '../../src/cli/repl.js';
import { DEFAULT_CONFIG } from '../../src/schema/config.js';
import { makeGame } from '../fixtures.js';

const formatting = DEFAULT_CONFIG.textFormatting;

function capture(stream: PassThrough): () => string {
    const chunks: string[] = [];
    stream.on('data', chunk => chunks.push(String(chunk)));
    return () => chunks.join('');
}

describe('REPL', () => {
    it('should greet, run commands and stop on quit', async () => {
        const input = new PassThrough();
        const output = new PassThrough();
        const read = capture(output);
        const game = makeGame({ render: {} });

        const done = runRepl(game, formatting, { input, output });
        input.write('take coin\n');
        input.write('quit\n');
        await done;

        const text = read();
        expect(text.startsWith(`${'-'.repeat(40)}\nWelcome to Threshold!\n${'-'.repeat(40)}\n\n`)).toBe(true);
        expect(text).toContain("Type 'help' for a list of commands. Type 'quit' to exit the game.\n\nA quiet hall.");
        expect(text).toContain('> You take the Coin.\n\n> Thanks for playing!\n\n');
        expect(game.isRunning).toBe(false);
        expect(game.state.hasItem('coin')).toBe(true);
    });

    it('should prompt again on a blank line', async () => {
        const input = new PassThrough();
        const output = new PassThrough();
        const read = capture(output);

        const done = runRepl(makeGame(), formatting, { input, output });
        input.write('\n');
        input.write('quit\n');
        await done;

        expect(read()).toContain('> > Thanks for playing!');
    });

    it('should finish when input ends', async () => {
        const input = new PassThrough();
        const output = new PassThrough();
        const game = makeGame();

        const done = runRepl(game, formatting, { input, output });
        input.end('look\n');
        await done;

        expect(game.isRunning).toBe(true);
    });
});
