import { PersistedCommoditySchema, type PersistedSnapshot } from "@milticker/shared";
import { toPositivePrice } from "../pricing/priceUtils.js";

/**
 * Last-known commodity prices recovered from the previous snapshot.
 * Read-only once built.
 */
export class PersistedPriceIndex {
    private readonly prices: ReadonlyMap<string, number>;

    private constructor(prices: Map<string, number>) {
        this.prices = prices;
    }

    static empty(): PersistedPriceIndex {
        return new PersistedPriceIndex(new Map());
    }

    /**
     * Build from a parsed snapshot. Malformed rows and entries without a
     * usable positive price are skipped; on duplicate names the first entry wins.
     */
    static fromSnapshot(snapshot: PersistedSnapshot): PersistedPriceIndex {
        const prices = new Map<string, number>();
        for (const entry of snapshot.commodities) {
            const parsed = PersistedCommoditySchema.safeParse(entry);
            if (!parsed.success) continue;
            const row = parsed.data;
            if (prices.has(row.name)) continue;
            const price = toPositivePrice(row.price);
            if (price !== null) {
                prices.set(row.name, price);
            }
        }
        return new PersistedPriceIndex(prices);
    }

    lookup(name: string): number | null {
        return this.prices.get(name) ?? null;
    }

    get size(): number {
        return this.prices.size;
    }
}
