import { readFileSync, writeFileSync } from 'fs';
import { ExitDefinition } from '../schema/room.js';

/**
 * Converts an authored story outline into a story room definition.
 *
 * Syntax:
 * ## Node Title (node_id)
 * "Prompt text in quotes, or the first line of the section"
 * - [Choice text] -> next_node_id
 *
 * - A section without choices is a leaf: its text is the outcome
 * - (REWARD: item_id) and (FLAG: flag_name) inside a leaf section attach a reward or flag
 */

const SECTION_PATTERN = /^##\s+(.+?)\s*\(([\w-]+)\)/gm;
const CHOICE_PATTERN = /- \[(.+?)\] *(?:→|->) *([\w-]+)(?: *\(REWARD: *([\w-]+)\))?/gi;
const REWARD_PATTERN = /\(REWARD: *([\w-]+)\)/i;
const FLAG_PATTERN = /\(FLAG: *([\w-]+)\)/i;
const PROMPT_PATTERN = /["“]([\s\S]+?)["”]/;
const MARKER_PATTERN = /\((?:REWARD|FLAG): *[\w-]+\)|Terminal:\s*True/gi;

export interface MarkdownChoice {
    text: string;
    nextNode: string;
}

export interface MarkdownNode {
    prompt: string;
    choices?: MarkdownChoice[];
    outcomeText?: string;
    reward?: string;
    flag?: string;
}

export interface StoryRoomOptions {
    name: string;
    description?: string;
    completionFlag?: string;
    exits?: Record<string, ExitDefinition>;
}

export interface MarkdownStoryRoom {
    type: 'story';
    name: string;
    description: string;
    completionFlag: string;
    storyNodes: Record<string, MarkdownNode>;
    exits: Record<string, ExitDefinition>;
}

export function slugify(name: string): string {
    return name.trim().toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '');
}

export function parseStoryMarkdown(markdown: string): Record<string, MarkdownNode> {
    const sections = Array.from(markdown.matchAll(SECTION_PATTERN));
    const nodes: Record<string, MarkdownNode> = {};

    sections.forEach((section, index) => {
        const start = (section.index ?? 0) + section[0].length;
        const end = index + 1 < sections.length ? sections[index + 1].index ?? markdown.length : markdown.length;
        const body = markdown.slice(start, end).trim();
        const nodeId = section[2];

        const text = body.replace(MARKER_PATTERN, '').replace(/[ \t]+\n/g, '\n').trim();
        const quoted = PROMPT_PATTERN.exec(text);
        const prompt = quoted ? quoted[1].trim() : text.split('\n')[0].trim();

        const choices: MarkdownChoice[] = [];
        for (const match of body.matchAll(CHOICE_PATTERN)) {
            if (match[3]) {
                console.warn(`[Loader] Reward '${match[3]}' on a branching choice in node '${nodeId}' is ignored`);
            }
            choices.push({ text: match[1].trim(), nextNode: match[2] });
        }

        if (choices.length > 0) {
            nodes[nodeId] = { prompt, choices };
            return;
        }

        const leaf: MarkdownNode = { prompt, outcomeText: text };
        const reward = REWARD_PATTERN.exec(body);
        const flag = FLAG_PATTERN.exec(body);
        if (reward) leaf.reward = reward[1];
        if (flag) leaf.flag = flag[1];
        nodes[nodeId] = leaf;
    });

    return nodes;
}

export function markdownToRoom(markdown: string, options: StoryRoomOptions): MarkdownStoryRoom {
    const storyNodes = parseStoryMarkdown(markdown);
    const first = Object.values(storyNodes)[0];

    return {
        type: 'story',
        name: options.name,
        description: options.description ?? first?.prompt ?? '',
        completionFlag: options.completionFlag ?? `${slugify(options.name)}_complete`,
        storyNodes,
        exits: options.exits ?? { return: 'hub' }
    };
}

/**
 * Writes a rooms file holding the one converted room, keyed by its slug.
 * Returns the room id.
 */
export function convertMarkdownFile(inputPath: string, outputPath: string, options: StoryRoomOptions): string {
    const room = markdownToRoom(readFileSync(inputPath, 'utf-8'), options);
    const roomId = slugify(options.name);
    writeFileSync(outputPath, JSON.stringify({ [roomId]: room }, null, 4) + '\n', 'utf-8');
    return roomId;
}
