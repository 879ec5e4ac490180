import { Item, ItemDefinitionSchema } from '../schema/item.js';
import { formatIssues } from '../schema/format.js';

/**
 * Read-only lookup of every collectible item, keyed by item id.
 */
export class ItemCatalog {
    private readonly items: ReadonlyMap<string, Item>;

    constructor(items: Iterable<Item>) {
        const map = new Map<string, Item>();
        for (const item of items) {
            map.set(item.id, Object.freeze({ ...item }));
        }
        this.items = map;
    }

    /**
     * Builds a catalog from the raw items file. Malformed entries are skipped
     * with a warning; missing fields take their defaults.
     */
    static load(raw: Record<string, unknown>): ItemCatalog {
        const items: Item[] = [];

        for (const [id, entry] of Object.entries(raw)) {
            const result = ItemDefinitionSchema.safeParse(entry);
            if (!result.success) {
                console.warn(`[Loader] Skipping malformed item '${id}': ${formatIssues(result.error)}`);
                continue;
            }
            items.push({ id, ...result.data });
        }

        return new ItemCatalog(items);
    }

    get(id: string): Item | undefined {
        return this.items.get(id);
    }

    has(id: string): boolean {
        return this.items.has(id);
    }

    ids(): string[] {
        return Array.from(this.items.keys());
    }

    get size(): number {
        return this.items.size;
    }
}
