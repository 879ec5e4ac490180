import { TextFormatting } from '../schema/config.js';

/**
 * Word-wraps one line to `width`, keeping its leading indentation on every
 * continuation line. Words longer than the width are left whole.
 */
export function wrapLine(line: string, width: number): string[] {
    if (line.length <= width) {
        return [line];
    }

    const indent = /^\s*/.exec(line)?.[0] ?? '';
    const words = line.trim().split(/\s+/);
    const lines: string[] = [];
    let current = '';

    for (const word of words) {
        if (current === '') {
            current = indent + word;
        } else if (current.length + 1 + word.length <= width) {
            current += ` ${word}`;
        } else {
            lines.push(current);
            current = indent + word;
        }
    }
    lines.push(current);

    return lines;
}

export function wrapText(text: string, width: number): string {
    return text
        .split('\n')
        .flatMap(line => wrapLine(line, width))
        .join('\n');
}

export function formatResponse(paragraphs: string[], formatting: TextFormatting): string {
    const gap = '\n'.repeat(formatting.paragraphSpacing + 1);
    return paragraphs.map(paragraph => wrapText(paragraph, formatting.lineWidth)).join(gap);
}

export function separator(formatting: TextFormatting): string {
    return formatting.separatorChar.repeat(formatting.separatorLength);
}

export function banner(title: string, formatting: TextFormatting): string {
    const line = separator(formatting);
    return [line, title, line].join('\n');
}
