import { Item } from '../schema/item.js';
import { ExitSpec, StoryNode } from '../schema/room.js';
import { PlayerState } from './player-state.js';

interface RoomBase {
    readonly id: string;
    readonly name: string;
    readonly description: string;
    /** Items lying in the room, in placement order. */
    items: Item[];
    readonly exits: ReadonlyMap<string, ExitSpec>;
    visited: boolean;
}

export interface HubRoom extends RoomBase {
    readonly kind: 'hub';
    readonly scenery: readonly string[];
}

export interface StoryRoom extends RoomBase {
    readonly kind: 'story';
    readonly storyNodes: ReadonlyMap<string, StoryNode>;
    readonly entryNodeId: string | undefined;
    readonly completionFlag: string | undefined;
}

export type Room = HubRoom | StoryRoom;

export interface RenderOptions {
    showRoomName?: boolean;
    showExits?: boolean;
    choicePrefix?: string;
}

export function enterRoom(room: Room, state: PlayerState, options: RenderOptions = {}): string {
    room.visited = true;
    return lookRoom(room, state, options);
}

/**
 * Renders the room as it currently stands. Never mutates the room or state.
 */
export function lookRoom(room: Room, state: PlayerState, options: RenderOptions = {}): string {
    const lines: string[] = [];

    if (options.showRoomName) {
        lines.push(room.name);
    }
    if (room.description) {
        lines.push(room.description);
    }

    switch (room.kind) {
        case 'hub':
            lines.push(...describeHub(room));
            break;
        case 'story':
            lines.push(...describeStory(room, state, options.choicePrefix ?? '  '));
            break;
    }

    if (options.showExits) {
        const open = visibleExits(room, state);
        if (open.length > 0) {
            lines.push(`Exits: ${open.join(', ')}`);
        }
    }

    return lines.join('\n');
}

function describeItems(room: Room): string[] {
    if (room.items.length === 0) return [];
    return [`You can see: ${room.items.map(item => item.name).join(', ')}`];
}

function describeHub(room: HubRoom): string[] {
    return [...room.scenery, ...describeItems(room)];
}

function describeStory(room: StoryRoom, state: PlayerState, choicePrefix: string): string[] {
    const lines = describeItems(room);
    const node = currentStoryNode(room, state);

    if (node && node.choices.length > 0) {
        if (node.prompt) {
            lines.push(node.prompt);
        }
        node.choices.forEach((choice, index) => {
            lines.push(`${choicePrefix}${index + 1}. ${choice.text}`);
        });
    }

    return lines;
}

// Exits whose completion flag is already set are closed for good and not listed.
function visibleExits(room: Room, state: PlayerState): string[] {
    const open: string[] = [];
    for (const [direction, spec] of room.exits) {
        if (spec.completionFlag !== undefined && state.isFlagSet(spec.completionFlag)) continue;
        open.push(direction);
    }
    return open;
}

/**
 * The node the player is standing at: the stored cursor, else the entry node.
 * Undefined once the room's story has been resolved.
 */
export function currentStoryNode(room: StoryRoom, state: PlayerState): StoryNode | undefined {
    if (state.isDoorCompleted(room.id)) {
        return undefined;
    }
    const nodeId = state.getStoryCursor(room.id) ?? room.entryNodeId;
    return nodeId === undefined ? undefined : room.storyNodes.get(nodeId);
}

export function addRoomItem(room: Room, item: Item): void {
    if (!room.items.some(existing => existing.id === item.id)) {
        room.items.push(item);
    }
}

export function removeRoomItem(room: Room, itemId: string): boolean {
    const index = room.items.findIndex(item => item.id === itemId);
    if (index === -1) return false;
    room.items.splice(index, 1);
    return true;
}

export function findRoomItemByName(room: Room, name: string): Item | undefined {
    const wanted = name.trim().toLowerCase();
    return room.items.find(item => item.name.toLowerCase() === wanted);
}
