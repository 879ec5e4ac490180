import { Item } from '../schema/item.js';
import { LeafChoice } from '../schema/room.js';
import { renderHelp } from './commands.js';
import { RETURN_EXIT, normalizeDirection, resolveExit } from './exits.js';
import { DEFAULT_CAPACITY, Inventory } from './inventory.js';
import { ParsedCommand } from './parser.js';
import { PlayerState } from './player-state.js';
import {
    RenderOptions,
    Room,
    StoryRoom,
    enterRoom,
    findRoomItemByName,
    lookRoom,
    removeRoomItem
} from './room.js';
import { applyBranchChoice, completeStoryRoom, selectChoice } from './story.js';
import { World } from './world.js';

export interface GameResponse {
    /** Rendered text, one entry per paragraph; line breaks inside are kept. */
    paragraphs: string[];
    ended: boolean;
}

export interface GameOptions {
    capacity?: number;
    render?: RenderOptions;
    showItemCount?: boolean;
    logCommands?: boolean;
    logStateChanges?: boolean;
    /** Rehydrated state; a fresh state at the starting room otherwise. */
    state?: PlayerState;
}

const UNKNOWN_COMMAND = "I don't understand that. Type 'help' for available commands.";

/**
 * Applies parsed commands to one play-through. Owns the player state, the
 * inventory view and the world's rooms. Every command either fully applies or
 * leaves all three untouched.
 */
export class Game {
    readonly state: PlayerState;
    readonly inventory: Inventory;
    private running = true;
    private readonly render: RenderOptions;
    private readonly showItemCount: boolean;
    private readonly logCommands: boolean;
    private readonly logStateChanges: boolean;

    constructor(private readonly world: World, options: GameOptions = {}) {
        this.render = options.render ?? {};
        this.showItemCount = options.showItemCount ?? true;
        this.logCommands = options.logCommands ?? false;
        this.logStateChanges = options.logStateChanges ?? false;

        this.state = options.state ?? new PlayerState(world.startingRoomId);
        if (!world.rooms.has(this.state.currentRoomId)) {
            console.warn(`[Game] Unknown current room '${this.state.currentRoomId}', starting at '${world.startingRoomId}'`);
            this.state.currentRoomId = world.startingRoomId;
        }

        this.inventory = this.synchronize(options.capacity ?? DEFAULT_CAPACITY);
    }

    get isRunning(): boolean {
        return this.running;
    }

    get currentRoom(): Room {
        return this.getRoom(this.state.currentRoomId);
    }

    intro(): GameResponse {
        return this.reply(
            "Type 'help' for a list of commands. Type 'quit' to exit the game.",
            enterRoom(this.currentRoom, this.state, this.render)
        );
    }

    execute(command: ParsedCommand): GameResponse {
        if (this.logCommands) {
            console.error(`[Game] Command: ${command.verb ?? '<unknown>'} ${command.args.join(' ')}`.trimEnd());
        }

        switch (command.verb) {
            case null:
                return this.reply(UNKNOWN_COMMAND);
            case 'quit':
                this.running = false;
                return { paragraphs: ['Thanks for playing!'], ended: true };
            case 'help':
                return this.reply(renderHelp(command.args[0]));
            case 'look':
                return this.look(command.args);
            case 'go':
                return this.go(command.args);
            case 'inventory':
                return this.showInventory();
            case 'take':
                return this.take(command.args);
            case 'choose':
                return this.choose(command.args);
            case 'talk':
            case 'use':
                return this.reply(`'${command.verb}' is not implemented yet.`);
        }
    }

    private look(args: string[]): GameResponse {
        const words = args[0] === 'at' ? args.slice(1) : args;
        const target = words.join(' ');

        if (target === '' || target === 'around') {
            return this.reply(lookRoom(this.currentRoom, this.state, this.render));
        }

        const item = this.inventory.findByName(target) ?? findRoomItemByName(this.currentRoom, target);
        if (!item) {
            return this.reply(`You don't see any '${target}' here.`);
        }

        return this.reply(
            item.description || `There is nothing remarkable about the ${item.name}.`,
            ...flavorOf(item)
        );
    }

    private go(args: string[]): GameResponse {
        if (args.length === 0) {
            return this.reply('Go where?');
        }

        const direction = normalizeDirection(args[0]);
        const outcome = resolveExit(this.currentRoom.exits, direction, this.state);
        if (outcome.kind === 'blocked') {
            return this.reply(outcome.message);
        }

        const destination = this.world.rooms.get(outcome.destination);
        if (!destination) {
            console.warn(`[Game] Exit '${direction}' of room '${this.currentRoom.id}' leads to unknown room '${outcome.destination}'`);
            return this.reply(`The way ${direction} leads nowhere.`);
        }

        return this.reply(outcome.message, this.moveTo(destination));
    }

    private showInventory(): GameResponse {
        if (this.inventory.isEmpty()) {
            return this.reply("You aren't carrying anything.");
        }

        const header = this.showItemCount
            ? `You are carrying (${this.inventory.count}/${this.inventory.capacity}):`
            : 'You are carrying:';
        const lines = this.inventory.list().map(item => `  - ${item.name}`);
        return this.reply([header, ...lines].join('\n'));
    }

    private take(args: string[]): GameResponse {
        if (args.length === 0) {
            return this.reply('Take what?');
        }

        const name = args.join(' ');
        const room = this.currentRoom;
        const item = findRoomItemByName(room, name);
        if (!item) {
            const held = this.inventory.findByName(name);
            return this.reply(held ? `You already have the ${held.name}.` : `There is no '${name}' here.`);
        }

        const result = this.inventory.add(item.id);
        switch (result.status) {
            case 'full':
                return this.reply("You can't carry any more.");
            case 'already_held':
                return this.reply(`You already have the ${result.item.name}.`);
            case 'unknown_item':
                return this.reply(`The ${item.name} slips through your fingers.`);
            case 'added':
                break;
        }

        removeRoomItem(room, item.id);
        this.state.addItem(item.id);
        this.trace(`Took '${item.id}' from '${room.id}'`);

        return this.reply(`You take the ${item.name}.`, ...flavorOf(item));
    }

    private choose(args: string[]): GameResponse {
        const selection = selectChoice(this.currentRoom, this.state, args[0]);

        switch (selection.kind) {
            case 'no_choices':
                return this.reply('There are no choices to make here.');
            case 'invalid':
                return this.reply(selection.message);
            case 'branch':
                applyBranchChoice(selection.room, this.state, selection.choice);
                this.trace(`Story cursor for '${selection.room.id}' -> '${selection.choice.nextNode}'`);
                return this.reply(lookRoom(selection.room, this.state, this.render));
            case 'leaf':
                return this.resolveLeaf(selection.room, selection.choice);
        }
    }

    private resolveLeaf(room: StoryRoom, choice: LeafChoice): GameResponse {
        let reward: Item | undefined;

        // The reward is claimed first: a full inventory must stop the whole resolution.
        if (choice.reward !== undefined && !this.state.hasItem(choice.reward)) {
            const item = this.world.catalog.get(choice.reward);
            if (!item) {
                console.warn(`[Game] Story reward '${choice.reward}' in room '${room.id}' is not in the item catalog`);
            } else {
                const result = this.inventory.add(item.id);
                switch (result.status) {
                    case 'full':
                        return this.reply(`Your hands are full. You cannot accept the ${item.name} until you make room.`);
                    case 'added':
                        reward = result.item;
                        this.state.addItem(result.item.id);
                        this.trace(`Granted '${result.item.id}'`);
                        break;
                    case 'already_held':
                    case 'unknown_item':
                        break;
                }
            }
        }

        const paragraphs = [choice.outcomeText];
        if (reward) {
            paragraphs.push(`You receive the ${reward.name}.`, ...flavorOf(reward));
        }

        const flags = completeStoryRoom(room, this.state, choice);
        if (flags.length > 0) {
            this.trace(`Set flags: ${flags.join(', ')}`);
        }

        // Leaving through the return exit is automatic and skips lock checks.
        const back = room.exits.get(RETURN_EXIT);
        if (back) {
            const destination = this.world.rooms.get(back.destination);
            if (destination) {
                paragraphs.push(this.moveTo(destination));
            } else {
                console.warn(`[Game] Return exit of room '${room.id}' leads to unknown room '${back.destination}'`);
            }
        }

        return this.reply(...paragraphs);
    }

    private moveTo(room: Room): string {
        this.trace(`Moved '${this.state.currentRoomId}' -> '${room.id}'`);
        this.state.currentRoomId = room.id;
        return enterRoom(room, this.state, this.render);
    }

    /**
     * Rebuilds the inventory from the held ids and clears held items out of
     * every room so nothing collected reappears.
     */
    private synchronize(capacity: number): Inventory {
        const { inventory, dropped } = Inventory.fromHeldIds(this.world.catalog, capacity, this.state.heldItemIds);

        for (const id of dropped) {
            console.warn(`[Game] Dropping held item '${id}': unknown item or over capacity`);
            this.state.removeItem(id);
        }

        for (const room of this.world.rooms.values()) {
            for (const id of this.state.heldItemIds) {
                removeRoomItem(room, id);
            }
        }

        return inventory;
    }

    private getRoom(id: string): Room {
        const room = this.world.rooms.get(id);
        if (!room) {
            throw new Error(`Room ${id} not found`);
        }
        return room;
    }

    private trace(message: string): void {
        if (this.logStateChanges) {
            console.error(`[Game] ${message}`);
        }
    }

    private reply(...paragraphs: string[]): GameResponse {
        return { paragraphs, ended: false };
    }
}

function flavorOf(item: Item): string[] {
    return item.flavorText ? [item.flavorText] : [];
}

