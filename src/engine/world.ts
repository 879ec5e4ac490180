import { ItemCatalog } from './catalog.js';
import { Room } from './room.js';

/**
 * Everything loaded from the data files for one play-through. Room item lists
 * are mutated during play, so every game gets its own World.
 */
export interface World {
    readonly catalog: ItemCatalog;
    readonly rooms: ReadonlyMap<string, Room>;
    readonly startingRoomId: string;
}
