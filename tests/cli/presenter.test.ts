import { banner, formatResponse, separator, wrapLine, wrapText } from '../../src/cli/presenter.js';
import { DEFAULT_CONFIG } from '../../src/schema/config.js';

const formatting = DEFAULT_CONFIG.textFormatting;

describe('Presenter', () => {
    describe('wrapLine', () => {
        it('should leave short lines alone', () => {
            expect(wrapLine('A quiet hall.', 80)).toEqual(['A quiet hall.']);
        });

        it('should break on word boundaries', () => {
            expect(wrapLine('the quick brown fox', 10)).toEqual(['the quick', 'brown fox']);
        });

        it('should keep indentation on continuation lines', () => {
            expect(wrapLine('  - alpha beta gamma', 12)).toEqual(['  - alpha', '  beta gamma']);
        });

        it('should not split words longer than the width', () => {
            expect(wrapLine('extraordinarily long', 5)).toEqual(['extraordinarily', 'long']);
        });
    });

    it('should wrap each line of a paragraph separately', () => {
        expect(wrapText('short\nthe quick brown fox', 10)).toBe('short\nthe quick\nbrown fox');
    });

    it('should separate paragraphs by the configured spacing', () => {
        expect(formatResponse(['one', 'two'], formatting)).toBe('one\n\ntwo');
        expect(formatResponse(['one', 'two'], { ...formatting, paragraphSpacing: 0 })).toBe('one\ntwo');
        expect(formatResponse(['one', 'two'], { ...formatting, paragraphSpacing: 2 })).toBe('one\n\n\ntwo');
    });

    it('should draw separators and banners', () => {
        const custom = { ...formatting, separatorChar: '=', separatorLength: 10 };

        expect(separator(formatting)).toBe('-'.repeat(40));
        expect(banner('Hello', custom)).toBe('==========\nHello\n==========');
    });
});
