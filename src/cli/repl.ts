import { createInterface } from 'readline';
import { Readable, Writable } from 'stream';
import { Game } from '../engine/game.js';
import { parseCommand } from '../engine/parser.js';
import { TextFormatting } from '../schema/config.js';
import { banner, formatResponse } from './presenter.js';

export interface ReplStreams {
    input: Readable;
    output: Writable;
}

/**
 * Runs the read-eval-print loop until the player quits or input ends.
 * One line is fully applied before the next is read.
 */
export function runRepl(
    game: Game,
    formatting: TextFormatting,
    streams: ReplStreams = { input: process.stdin, output: process.stdout }
): Promise<void> {
    const { input, output } = streams;
    const rl = createInterface({ input, output });
    const gap = '\n'.repeat(formatting.paragraphSpacing);

    const write = (paragraphs: string[]) => {
        output.write(`${formatResponse(paragraphs, formatting)}\n${gap}`);
    };

    output.write(`${banner('Welcome to Threshold!', formatting)}\n\n`);
    write(game.intro().paragraphs);
    rl.setPrompt(formatting.promptSymbol);

    return new Promise(resolve => {
        rl.on('line', line => {
            if (line.trim() === '') {
                rl.prompt();
                return;
            }

            const response = game.execute(parseCommand(line));
            write(response.paragraphs);

            if (response.ended) {
                rl.close();
            } else {
                rl.prompt();
            }
        });

        rl.on('SIGINT', () => {
            output.write('\nThanks for playing!\n');
            rl.close();
        });

        rl.on('close', () => resolve());

        rl.prompt();
    });
}
