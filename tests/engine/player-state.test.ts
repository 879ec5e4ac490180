import { DEFAULT_STARTING_ROOM, PlayerState } from '../../src/engine/player-state.js';

describe('PlayerState', () => {
    it('should start in the hub with nothing held', () => {
        const state = new PlayerState();

        expect(state.currentRoomId).toBe(DEFAULT_STARTING_ROOM);
        expect(state.toSnapshot()).toEqual({
            currentRoomId: 'hub',
            heldItemIds: [],
            completedDoorIds: [],
            flags: {},
            storyNodeCursor: {}
        });
    });

    it('should only treat a flag as set when it is exactly true', () => {
        const state = new PlayerState();
        state.setFlag('opened', true);
        state.setFlag('count', 1);
        state.setFlag('label', 'true');

        expect(state.isFlagSet('opened')).toBe(true);
        expect(state.isFlagSet('count')).toBe(false);
        expect(state.isFlagSet('label')).toBe(false);
        expect(state.isFlagSet('never')).toBe(false);
        expect(state.getFlag('never')).toBeUndefined();
        expect(state.getFlag('count')).toBe(1);
    });

    it('should track held items without duplicates', () => {
        const state = new PlayerState();
        state.addItem('key');
        state.addItem('key');

        expect(Array.from(state.heldItemIds)).toEqual(['key']);
        expect(state.removeItem('key')).toBe(true);
        expect(state.removeItem('key')).toBe(false);
        expect(state.hasItem('key')).toBe(false);
    });

    it('should record completed doors and story cursors', () => {
        const state = new PlayerState();
        state.completeDoor('blue');
        state.setStoryCursor('blue', 'song');

        expect(state.isDoorCompleted('blue')).toBe(true);
        expect(state.isDoorCompleted('red')).toBe(false);
        expect(state.getStoryCursor('blue')).toBe('song');
        expect(state.getStoryCursor('red')).toBeUndefined();
    });

    it('should rebuild from a snapshot', () => {
        const state = PlayerState.fromSnapshot({
            currentRoomId: 'vault',
            heldItemIds: ['key'],
            completedDoorIds: ['blue'],
            flags: { blue_done: true, visits: 3 },
            storyNodeCursor: { blue: 'song' }
        });

        expect(state.currentRoomId).toBe('vault');
        expect(state.hasItem('key')).toBe(true);
        expect(state.isDoorCompleted('blue')).toBe(true);
        expect(state.isFlagSet('blue_done')).toBe(true);
        expect(state.getFlag('visits')).toBe(3);
        expect(state.getStoryCursor('blue')).toBe('song');
    });

    it('should fill missing snapshot fields with empty collections', () => {
        const state = PlayerState.fromSnapshot({ currentRoomId: 'garden' });

        expect(state.toSnapshot()).toEqual({
            currentRoomId: 'garden',
            heldItemIds: [],
            completedDoorIds: [],
            flags: {},
            storyNodeCursor: {}
        });
    });

    it('should reject a snapshot without a current room', () => {
        expect(() => PlayerState.fromSnapshot({ heldItemIds: [] })).toThrow();
    });
});
