import { Game, GameOptions } from '../src/engine/game.js';
import { parseCommand } from '../src/engine/parser.js';
import { RenderOptions, Room, StoryRoom } from '../src/engine/room.js';
import { World } from '../src/engine/world.js';
import { WorldSource, buildWorld } from '../src/storage/world-loader.js';

/**
 * A small world: a hub with a locked vault to the north, a story room to the
 * east that closes once resolved, and an open garden to the south.
 */
export function makeSource(): WorldSource {
    return {
        items: {
            key: { name: 'Key', description: 'A small iron key.', flavorText: 'It is cold to the touch.' },
            locket: { name: 'Locket', description: 'A silver locket.' },
            feather: { name: 'Feather', flavorText: 'It weighs nothing.' },
            coin: { name: 'Coin', description: 'A worn coin.' }
        },
        rooms: {
            hub: {
                type: 'hub',
                name: 'Hub',
                description: 'A quiet hall.',
                scenery: ['A fountain trickles.'],
                items: ['coin'],
                exits: {
                    east: { destination: 'blue', completionFlag: 'blue_done' },
                    north: {
                        destination: 'vault',
                        locked: true,
                        requiredItemId: 'key',
                        lockedMessage: 'The vault door is locked.'
                    },
                    south: 'garden'
                }
            },
            vault: {
                type: 'hub',
                name: 'Vault',
                description: 'Gold everywhere.',
                items: ['locket'],
                exits: { south: 'hub' }
            },
            blue: {
                type: 'story',
                name: 'Blue Room',
                description: 'Everything is blue.',
                completionFlag: 'blue_done',
                entryNode: 'start',
                storyNodes: {
                    start: {
                        prompt: 'A bird watches you.',
                        choices: [
                            { text: 'Whistle', nextNode: 'song' },
                            { text: 'Leave', outcomeText: 'You leave the bird be.' }
                        ]
                    },
                    song: {
                        prompt: 'The bird sings.',
                        choices: [
                            {
                                text: 'Listen',
                                outcomeText: 'The song fills you with calm.',
                                reward: 'key',
                                flag: 'heard_song'
                            }
                        ]
                    }
                },
                exits: { return: 'hub' }
            },
            garden: {
                type: 'story',
                name: 'Garden',
                description: 'Flowers sway.',
                items: ['feather'],
                storyNodes: {
                    gate: { outcomeText: 'The gate creaks shut behind you.', choiceText: 'Open the gate' }
                },
                exits: { return: 'hub', north: 'hub' }
            }
        }
    };
}

export function makeWorld(): World {
    return buildWorld(makeSource(), { startingRoomId: 'hub' });
}

export const SHOW_ALL: RenderOptions = { showRoomName: true, showExits: true };

export function makeGame(options: GameOptions = {}): Game {
    return new Game(makeWorld(), { render: SHOW_ALL, ...options });
}

export function run(game: Game, input: string): string[] {
    return game.execute(parseCommand(input)).paragraphs;
}

export function getRoom(world: World, id: string): Room {
    const room = world.rooms.get(id);
    if (!room) {
        throw new Error(`Fixture room ${id} not found`);
    }
    return room;
}

export function getStoryRoom(world: World, id: string): StoryRoom {
    const room = getRoom(world, id);
    if (room.kind !== 'story') {
        throw new Error(`Fixture room ${id} is not a story room`);
    }
    return room;
}
