import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { extname, join } from 'path';
import * as yaml from 'yaml';
import { ItemCatalog } from '../engine/catalog.js';
import { normalizeDirection } from '../engine/exits.js';
import { DEFAULT_STARTING_ROOM } from '../engine/player-state.js';
import { Room } from '../engine/room.js';
import { World } from '../engine/world.js';
import { formatIssues, isRecord } from '../schema/format.js';
import { Item } from '../schema/item.js';
import {
    Choice,
    ChoiceDefinitionSchema,
    ExitDefinitionSchema,
    ExitSpec,
    ROOM_TYPES,
    RoomDefinitionSchema,
    StoryNode,
    StoryNodeDefinition,
    StoryNodeDefinitionSchema
} from '../schema/room.js';
import { LoadedConfig, resolveDataPath } from './config.js';
import { StartupError } from './errors.js';

const ROOM_FILE_EXTENSIONS = new Set(['.json', '.yaml', '.yml']);

/**
 * Raw data read from disk, before validation. Kept so a fresh World can be
 * built for every game without touching the filesystem again.
 */
export interface WorldSource {
    items: Record<string, unknown>;
    rooms: Record<string, unknown>;
}

export interface BuildWorldOptions {
    startingRoomId?: string;
}

export function loadWorld(loaded: LoadedConfig): World {
    return buildWorld(readWorldSource(loaded), { startingRoomId: loaded.config.gameplay.startingRoom });
}

export function readWorldSource(loaded: LoadedConfig): WorldSource {
    const itemsPath = resolveDataPath(loaded, loaded.config.filePaths.itemsData);
    const roomsDir = resolveDataPath(loaded, loaded.config.filePaths.roomsDir);

    return {
        items: readItemsFile(itemsPath),
        rooms: readRoomsDirectory(roomsDir)
    };
}

export function readItemsFile(path: string): Record<string, unknown> {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (e) {
        throw new StartupError(`Item catalog could not be read from ${path}: ${(e as Error).message}`);
    }

    if (!isRecord(raw)) {
        throw new StartupError(`Item catalog at ${path} must be an object of item id to item`);
    }
    return raw;
}

/**
 * Reads every JSON or YAML file in the directory, in name order. Each file is
 * an object of room id to room definition. Unreadable files are skipped.
 */
export function readRoomsDirectory(dir: string): Record<string, unknown> {
    if (!existsSync(dir) || !statSync(dir).isDirectory()) {
        throw new StartupError(`Rooms directory not found: ${dir}`);
    }

    const rooms: Record<string, unknown> = {};
    const files = readdirSync(dir)
        .filter(file => ROOM_FILE_EXTENSIONS.has(extname(file).toLowerCase()))
        .sort();

    for (const file of files) {
        const path = join(dir, file);
        let raw: unknown;
        try {
            const content = readFileSync(path, 'utf-8');
            raw = extname(file).toLowerCase() === '.json' ? JSON.parse(content) : yaml.parse(content);
        } catch (e) {
            console.warn(`[Loader] Skipping unreadable room file ${path}: ${(e as Error).message}`);
            continue;
        }

        if (!isRecord(raw)) {
            console.warn(`[Loader] Skipping room file ${path}: expected an object of room id to room`);
            continue;
        }

        for (const [roomId, definition] of Object.entries(raw)) {
            if (roomId in rooms) {
                console.warn(`[Loader] Duplicate room '${roomId}' in ${path}. Keeping the first definition.`);
                continue;
            }
            rooms[roomId] = definition;
        }
    }

    return rooms;
}

/**
 * Validates raw data into a playable World. Bad individual entries are
 * skipped with a warning; no rooms at all, or no starting room, is fatal.
 */
export function buildWorld(source: WorldSource, options: BuildWorldOptions = {}): World {
    const startingRoomId = options.startingRoomId ?? DEFAULT_STARTING_ROOM;
    const catalog = ItemCatalog.load(source.items);

    const rooms = new Map<string, Room>();
    const exitsByRoom = new Map<string, Map<string, ExitSpec>>();
    for (const [id, raw] of Object.entries(source.rooms)) {
        const built = buildRoom(id, raw, catalog);
        if (built) {
            rooms.set(id, built.room);
            exitsByRoom.set(id, built.exits);
        }
    }

    if (rooms.size === 0) {
        throw new StartupError('No rooms loaded. Cannot start the game.');
    }
    if (!rooms.has(startingRoomId)) {
        throw new StartupError(`Starting room '${startingRoomId}' was not loaded`);
    }

    // Second pass: exits can only be checked once every room is known.
    for (const [id, exits] of exitsByRoom) {
        pruneDanglingExits(id, exits, rooms);
    }

    return { catalog, rooms, startingRoomId };
}

interface BuiltRoom {
    room: Room;
    /** Mutable handle on room.exits for the dangling-exit pass. */
    exits: Map<string, ExitSpec>;
}

function buildRoom(id: string, raw: unknown, catalog: ItemCatalog): BuiltRoom | undefined {
    if (!isRecord(raw)) {
        console.warn(`[Loader] Skipping room '${id}': expected an object`);
        return undefined;
    }

    const type = raw.type;
    if (typeof type !== 'string' || !ROOM_TYPES.some(known => known === type)) {
        console.warn(`[Loader] Unknown room type '${String(type)}' for room '${id}'. Skipping.`);
        return undefined;
    }

    const result = RoomDefinitionSchema.safeParse(raw);
    if (!result.success) {
        console.warn(`[Loader] Skipping malformed room '${id}': ${formatIssues(result.error)}`);
        return undefined;
    }

    const definition = result.data;
    const exits = buildExits(id, definition.exits);
    const base = {
        id,
        name: definition.name,
        description: definition.description,
        items: placeItems(id, definition.items, catalog),
        exits,
        visited: false
    };

    if (definition.type === 'hub') {
        return { room: { ...base, kind: 'hub', scenery: definition.scenery }, exits };
    }

    const storyNodes = buildStoryNodes(id, definition.storyNodes);
    let entryNodeId = definition.entryNode;
    if (entryNodeId !== undefined && !storyNodes.has(entryNodeId)) {
        console.warn(`[Loader] Entry node '${entryNodeId}' of room '${id}' does not exist. Using the first node.`);
        entryNodeId = undefined;
    }
    if (storyNodes.size === 0) {
        console.warn(`[Loader] Story room '${id}' has no story nodes`);
    }

    return {
        room: {
            ...base,
            kind: 'story',
            storyNodes,
            entryNodeId: entryNodeId ?? storyNodes.keys().next().value,
            completionFlag: definition.completionFlag
        },
        exits
    };
}

function placeItems(roomId: string, itemIds: string[], catalog: ItemCatalog): Item[] {
    const items: Item[] = [];
    for (const itemId of itemIds) {
        const item = catalog.get(itemId);
        if (!item) {
            console.warn(`[Loader] Room '${roomId}' places unknown item '${itemId}'. Skipping.`);
            continue;
        }
        if (!items.some(existing => existing.id === itemId)) {
            items.push(item);
        }
    }
    return items;
}

function buildExits(roomId: string, raw: Record<string, unknown>): Map<string, ExitSpec> {
    const exits = new Map<string, ExitSpec>();

    for (const [direction, value] of Object.entries(raw)) {
        const result = ExitDefinitionSchema.safeParse(value);
        if (!result.success) {
            console.warn(`[Loader] Skipping malformed exit '${direction}' in room '${roomId}': ${formatIssues(result.error)}`);
            continue;
        }

        const definition = result.data;
        exits.set(
            normalizeDirection(direction),
            typeof definition === 'string' ? { destination: definition, locked: false } : definition
        );
    }

    return exits;
}

function pruneDanglingExits(roomId: string, exits: Map<string, ExitSpec>, rooms: ReadonlyMap<string, Room>): void {
    for (const [direction, spec] of exits) {
        if (!rooms.has(spec.destination)) {
            console.warn(`[Loader] Exit '${direction}' of room '${roomId}' leads to unknown room '${spec.destination}'. Removing.`);
            exits.delete(direction);
        }
    }
}

function buildStoryNodes(roomId: string, raw: Record<string, unknown>): Map<string, StoryNode> {
    const definitions = new Map<string, StoryNodeDefinition>();
    for (const [nodeId, value] of Object.entries(raw)) {
        const result = StoryNodeDefinitionSchema.safeParse(value);
        if (!result.success) {
            console.warn(`[Loader] Skipping malformed story node '${nodeId}' in room '${roomId}': ${formatIssues(result.error)}`);
            continue;
        }
        definitions.set(nodeId, result.data);
    }

    const nodes = new Map<string, StoryNode>();
    for (const [nodeId, definition] of definitions) {
        const where = `story node '${nodeId}' of room '${roomId}'`;
        const choices: Choice[] = [];

        for (const [index, value] of definition.choices.entries()) {
            const choice = toChoice(value, definitions, `choice ${index + 1} of ${where}`);
            if (choice) {
                choices.push(choice);
            }
        }

        if (choices.length === 0 && definition.outcomeText !== undefined) {
            choices.push({
                kind: 'leaf',
                text: definition.choiceText ?? 'Continue',
                outcomeText: definition.outcomeText,
                reward: definition.reward,
                flag: definition.flag
            });
        }

        nodes.set(nodeId, { id: nodeId, prompt: definition.prompt, choices });
    }

    return nodes;
}

/**
 * Decides at load time whether a raw choice branches or resolves the story.
 */
function toChoice(
    value: unknown,
    nodes: ReadonlyMap<string, StoryNodeDefinition>,
    where: string
): Choice | undefined {
    const result = ChoiceDefinitionSchema.safeParse(value);
    if (!result.success) {
        console.warn(`[Loader] Skipping malformed ${where}: ${formatIssues(result.error)}`);
        return undefined;
    }

    const { text, nextNode, outcomeText, reward, flag } = result.data;

    if (nextNode !== undefined) {
        if (outcomeText !== undefined || reward !== undefined) {
            console.warn(`[Loader] ${where} has both nextNode and an outcome. Treating it as a branch.`);
        }
        if (!nodes.has(nextNode)) {
            console.warn(`[Loader] Skipping ${where}: nextNode '${nextNode}' does not exist`);
            return undefined;
        }
        return { kind: 'branch', text, nextNode };
    }

    if (outcomeText !== undefined) {
        return { kind: 'leaf', text, outcomeText, reward, flag };
    }

    console.warn(`[Loader] Skipping ${where}: it needs either nextNode or outcomeText`);
    return undefined;
}
