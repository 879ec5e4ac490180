import { ExitSpec } from '../schema/room.js';
import { PlayerState } from './player-state.js';

/** Logical exit a story room uses to send the player back once it resolves. */
export const RETURN_EXIT = 'return';

const DIRECTION_ALIASES: Record<string, string> = {
    n: 'north',
    s: 'south',
    e: 'east',
    w: 'west',
    u: 'up',
    d: 'down',
    ne: 'northeast',
    nw: 'northwest',
    se: 'southeast',
    sw: 'southwest'
};

export function normalizeDirection(raw: string): string {
    const direction = raw.trim().toLowerCase();
    return DIRECTION_ALIASES[direction] ?? direction;
}

export type BlockReason = 'no_exit' | 'closed' | 'locked';

export type ExitOutcome =
    | { kind: 'blocked'; reason: BlockReason; message: string }
    | { kind: 'move'; destination: string; message: string };

/**
 * Decides whether the player may leave by `direction`. The checks run in a
 * fixed order: missing exit, closed by completion flag, unlocked, key held,
 * locked. A closed exit stays closed even when the player holds the key.
 */
export function resolveExit(
    exits: ReadonlyMap<string, ExitSpec>,
    direction: string,
    state: PlayerState
): ExitOutcome {
    const spec = exits.get(direction);

    if (!spec) {
        return { kind: 'blocked', reason: 'no_exit', message: `You can't go ${direction} from here.` };
    }

    if (spec.completionFlag !== undefined && state.isFlagSet(spec.completionFlag)) {
        return { kind: 'blocked', reason: 'closed', message: `The way ${direction} has closed for good.` };
    }

    if (!spec.locked) {
        return { kind: 'move', destination: spec.destination, message: `You head ${direction}.` };
    }

    if (spec.requiredItemId !== undefined && state.hasItem(spec.requiredItemId)) {
        return {
            kind: 'move',
            destination: spec.destination,
            message: spec.unlockMessage ?? `You unlock the way ${direction}.`
        };
    }

    return {
        kind: 'blocked',
        reason: 'locked',
        message: spec.lockedMessage ?? `The way ${direction} is locked.`
    };
}
