import { FlagValue, PlayerStateSnapshot, PlayerStateSnapshotSchema } from '../schema/state.js';

export const DEFAULT_STARTING_ROOM = 'hub';

/**
 * The canonical mutable record of a play-through: where the player is, what
 * they hold, which doors they finished, flags, and each story room's cursor.
 */
export class PlayerState {
    currentRoomId: string;
    readonly heldItemIds = new Set<string>();
    readonly completedDoorIds = new Set<string>();
    readonly flags = new Map<string, FlagValue>();
    readonly storyNodeCursor = new Map<string, string>();

    constructor(startingRoomId: string = DEFAULT_STARTING_ROOM) {
        this.currentRoomId = startingRoomId;
    }

    static fromSnapshot(raw: unknown): PlayerState {
        const snapshot = PlayerStateSnapshotSchema.parse(raw);
        const state = new PlayerState(snapshot.currentRoomId);

        snapshot.heldItemIds.forEach(id => state.heldItemIds.add(id));
        snapshot.completedDoorIds.forEach(id => state.completedDoorIds.add(id));
        for (const [name, value] of Object.entries(snapshot.flags)) {
            state.flags.set(name, value);
        }
        for (const [roomId, nodeId] of Object.entries(snapshot.storyNodeCursor)) {
            state.storyNodeCursor.set(roomId, nodeId);
        }

        return state;
    }

    toSnapshot(): PlayerStateSnapshot {
        return {
            currentRoomId: this.currentRoomId,
            heldItemIds: Array.from(this.heldItemIds),
            completedDoorIds: Array.from(this.completedDoorIds),
            flags: Object.fromEntries(this.flags),
            storyNodeCursor: Object.fromEntries(this.storyNodeCursor)
        };
    }

    setFlag(name: string, value: FlagValue): void {
        this.flags.set(name, value);
    }

    /** Returns undefined when the flag was never set. */
    getFlag(name: string): FlagValue | undefined {
        return this.flags.get(name);
    }

    isFlagSet(name: string): boolean {
        return this.flags.get(name) === true;
    }

    addItem(itemId: string): void {
        this.heldItemIds.add(itemId);
    }

    hasItem(itemId: string): boolean {
        return this.heldItemIds.has(itemId);
    }

    removeItem(itemId: string): boolean {
        return this.heldItemIds.delete(itemId);
    }

    completeDoor(doorId: string): void {
        this.completedDoorIds.add(doorId);
    }

    isDoorCompleted(doorId: string): boolean {
        return this.completedDoorIds.has(doorId);
    }

    getStoryCursor(roomId: string): string | undefined {
        return this.storyNodeCursor.get(roomId);
    }

    setStoryCursor(roomId: string, nodeId: string): void {
        this.storyNodeCursor.set(roomId, nodeId);
    }
}
