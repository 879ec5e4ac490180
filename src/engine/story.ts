import { BranchChoice, LeafChoice, StoryNode } from '../schema/room.js';
import { PlayerState } from './player-state.js';
import { Room, StoryRoom, currentStoryNode } from './room.js';

export type ChoiceSelection =
    | { kind: 'no_choices' }
    | { kind: 'invalid'; message: string }
    | { kind: 'branch'; room: StoryRoom; node: StoryNode; choice: BranchChoice }
    | { kind: 'leaf'; room: StoryRoom; node: StoryNode; choice: LeafChoice };

/**
 * Validates a 1-based choice index against the room's current node.
 * Pure: the caller applies the selected transition.
 */
export function selectChoice(room: Room, state: PlayerState, rawIndex: string | undefined): ChoiceSelection {
    if (room.kind !== 'story') {
        return { kind: 'no_choices' };
    }

    const node = currentStoryNode(room, state);
    if (!node || node.choices.length === 0) {
        return { kind: 'no_choices' };
    }

    const count = node.choices.length;
    if (rawIndex === undefined) {
        return { kind: 'invalid', message: `Choose which option? Enter a number between 1 and ${count}.` };
    }

    const index = /^\d+$/.test(rawIndex) ? Number(rawIndex) : NaN;
    if (!Number.isInteger(index) || index < 1 || index > count) {
        return { kind: 'invalid', message: `Please choose a number between 1 and ${count}.` };
    }

    const choice = node.choices[index - 1];
    return choice.kind === 'branch'
        ? { kind: 'branch', room, node, choice }
        : { kind: 'leaf', room, node, choice };
}

export function applyBranchChoice(room: StoryRoom, state: PlayerState, choice: BranchChoice): void {
    state.setStoryCursor(room.id, choice.nextNode);
}

/**
 * Marks the room's story as resolved. Returns the flags that were set.
 * Granting the reward and leaving the room are up to the caller.
 */
export function completeStoryRoom(room: StoryRoom, state: PlayerState, choice: LeafChoice): string[] {
    const flagsSet: string[] = [];

    if (choice.flag !== undefined) {
        state.setFlag(choice.flag, true);
        flagsSet.push(choice.flag);
    }
    if (room.completionFlag !== undefined) {
        state.setFlag(room.completionFlag, true);
        flagsSet.push(room.completionFlag);
    }
    state.completeDoor(room.id);

    return flagsSet;
}
