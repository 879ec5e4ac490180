import { Item } from '../schema/item.js';
import { ItemCatalog } from './catalog.js';

export const DEFAULT_CAPACITY = 10;

export type AddItemResult =
    | { status: 'added'; item: Item }
    | { status: 'already_held'; item: Item }
    | { status: 'full' }
    | { status: 'unknown_item' };

/**
 * The items the player carries, in pickup order.
 *
 * This is a view over PlayerState.heldItemIds: the game keeps both in step,
 * and rebuilds the view with {@link Inventory.fromHeldIds} on startup.
 */
export class Inventory {
    private readonly items = new Map<string, Item>();

    constructor(
        private readonly catalog: ItemCatalog,
        readonly capacity: number = DEFAULT_CAPACITY
    ) { }

    static fromHeldIds(
        catalog: ItemCatalog,
        capacity: number,
        heldIds: Iterable<string>
    ): { inventory: Inventory; dropped: string[] } {
        const inventory = new Inventory(catalog, capacity);
        const dropped: string[] = [];

        for (const id of heldIds) {
            const result = inventory.add(id);
            if (result.status === 'full' || result.status === 'unknown_item') {
                dropped.push(id);
            }
        }

        return { inventory, dropped };
    }

    /**
     * Checks run capacity, then duplicate, then catalog; the set is only
     * touched once all three pass.
     */
    add(itemId: string): AddItemResult {
        if (this.items.size >= this.capacity) {
            return { status: 'full' };
        }

        const held = this.items.get(itemId);
        if (held) {
            return { status: 'already_held', item: held };
        }

        const item = this.catalog.get(itemId);
        if (!item) {
            return { status: 'unknown_item' };
        }

        this.items.set(itemId, item);
        return { status: 'added', item };
    }

    remove(itemId: string): Item | undefined {
        const item = this.items.get(itemId);
        if (item) {
            this.items.delete(itemId);
        }
        return item;
    }

    has(itemId: string): boolean {
        return this.items.has(itemId);
    }

    /**
     * Case-insensitive match on the display name; the first match wins.
     */
    findByName(name: string): Item | undefined {
        const wanted = name.trim().toLowerCase();
        for (const item of this.items.values()) {
            if (item.name.toLowerCase() === wanted) {
                return item;
            }
        }
        return undefined;
    }

    list(): Item[] {
        return Array.from(this.items.values());
    }

    get count(): number {
        return this.items.size;
    }

    isEmpty(): boolean {
        return this.items.size === 0;
    }

    isFull(): boolean {
        return this.items.size >= this.capacity;
    }
}
