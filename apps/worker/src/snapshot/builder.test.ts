/**
 * Tests for snapshot assembly across runs.
 */

import { describe, it, expect, vi } from "vitest";
import { PriceSourceId, SnapshotSchema, type PriceSourceIdType } from "@milticker/shared";
import { buildSnapshot, runSnapshot, type SnapshotCollaborators } from "./builder.js";
import { MemorySnapshotStore } from "../store/snapshotStore.js";
import {
    ABSENT_OBSERVATION,
    type PriceObservation,
    type PriceSource,
    type SourceRegistry,
} from "../sources/types.js";

class ScriptedSource implements PriceSource {
    observations: Record<string, PriceObservation> = {};

    constructor(readonly id: PriceSourceIdType) {}

    isAvailable(): boolean {
        return true;
    }

    async observe(symbol: string): Promise<PriceObservation> {
        return this.observations[symbol] ?? ABSENT_OBSERVATION;
    }
}

function setup() {
    const chart = new ScriptedSource(PriceSourceId.YAHOO_CHART);
    const quote = new ScriptedSource(PriceSourceId.YAHOO_QUOTE);
    const sources: SourceRegistry = new Map<PriceSourceIdType, PriceSource>([
        [chart.id, chart],
        [quote.id, quote],
    ]);
    return { chart, quote, sources };
}

const collaborators: SnapshotCollaborators = {
    contracts: () => [{ entity: "Acme Systems Inc.", value_usd: 12_500_000, note: "DoD daily awards" }],
    conflicts: () => [{ name: "Red Sea", note: "Shipping insurance premia rising" }],
    apparel: () => [{ brand: "5.11 Tactical", note: "Duty apparel & gear" }],
};

const NOW = 1_760_000_000_123;

describe("buildSnapshot", () => {
    it("emits every configured commodity in order, placeholders on full outage", async () => {
        const { sources } = setup();

        const { snapshot } = await buildSnapshot({
            store: new MemorySnapshotStore(),
            sources,
            collaborators,
            now: () => NOW,
        });

        expect(snapshot.commodities).toEqual([
            { name: "WTI", price: 83.12, pct: 0 },
            { name: "Brent", price: 86.47, pct: 0 },
            { name: "HRC Steel", price: 830, pct: 0.9 },
            { name: "Copper", price: 4.12, pct: -1.8 },
            { name: "Aluminum", price: 2421, pct: 0.7 },
        ]);
        expect(snapshot.generated_at).toBe(1_760_000_000);
        expect(SnapshotSchema.safeParse(snapshot).success).toBe(true);
    });

    it("appends collaborator lists verbatim", async () => {
        const { sources } = setup();

        const { snapshot } = await buildSnapshot({
            store: new MemorySnapshotStore(),
            sources,
            collaborators,
            now: () => NOW,
        });

        expect(snapshot.contracts).toEqual([
            { entity: "Acme Systems Inc.", value_usd: 12_500_000, note: "DoD daily awards" },
        ]);
        expect(snapshot.conflicts).toEqual([{ name: "Red Sea", note: "Shipping insurance premia rising" }]);
        expect(snapshot.apparel).toEqual([{ brand: "5.11 Tactical", note: "Duty apparel & gear" }]);
    });

    it("replaces a failing or malformed collaborator list with an empty one", async () => {
        const { sources } = setup();

        const { snapshot } = await buildSnapshot({
            store: new MemorySnapshotStore(),
            sources,
            collaborators: {
                contracts: async () => {
                    throw new Error("feed down");
                },
                conflicts: () => [{ name: "", note: "missing name" }],
                apparel: collaborators.apparel,
            },
            now: () => NOW,
        });

        expect(snapshot.contracts).toEqual([]);
        expect(snapshot.conflicts).toEqual([]);
        expect(snapshot.apparel).toHaveLength(1);
    });

    it("does not save", async () => {
        const { sources } = setup();
        const store = new MemorySnapshotStore();
        const save = vi.spyOn(store, "save");

        await buildSnapshot({ store, sources, collaborators, now: () => NOW });

        expect(save).not.toHaveBeenCalled();
    });
});

describe("runSnapshot", () => {
    it("feeds run 1 prices into run 2 as baselines", async () => {
        const { chart, quote, sources } = setup();
        const store = new MemorySnapshotStore();

        // Run 1: candles available for WTI
        chart.observations = { "CL=F": { price: 80, previousPrice: 78 } };
        const first = await runSnapshot({ store, sources, collaborators, now: () => NOW });
        expect(first.snapshot.commodities[0]).toEqual({ name: "WTI", price: 80, pct: 2.56 });

        const baselines = await store.load();
        expect(baselines.lookup("WTI")).toBe(80);

        // Run 2: candles down, live quote has a price but no previous close
        chart.observations = {};
        quote.observations = { "CL=F": { price: 84, previousPrice: null } };
        const second = await runSnapshot({ store, sources, collaborators, now: () => NOW + 3_600_000 });

        expect(second.snapshot.commodities[0]).toEqual({ name: "WTI", price: 84, pct: 5 });
        expect(second.snapshot.generated_at).toBe(1_760_003_600);
    });

    it("keeps placeholder prices as the next run's baselines", async () => {
        const { quote, sources } = setup();
        const store = new MemorySnapshotStore();

        await runSnapshot({ store, sources, collaborators, now: () => NOW });

        quote.observations = { "HG=F": { price: 4.33, previousPrice: null } };
        const { snapshot } = await runSnapshot({ store, sources, collaborators, now: () => NOW });

        // 100 * (4.33 - 4.12) / 4.12 = 5.0970...
        expect(snapshot.commodities[3]).toEqual({ name: "Copper", price: 4.33, pct: 5.1 });
    });

    it("saves the snapshot it returns", async () => {
        const { sources } = setup();
        const store = new MemorySnapshotStore();

        const { snapshot } = await runSnapshot({ store, sources, collaborators, now: () => NOW });

        expect(store.saved).toBe(JSON.stringify(snapshot));
    });

    it("honours a custom commodity table", async () => {
        const { chart, sources } = setup();
        chart.observations = { "GC=F": { price: 2400, previousPrice: 2500 } };

        const { snapshot } = await runSnapshot({
            store: new MemorySnapshotStore(),
            sources,
            collaborators,
            commodities: [
                {
                    name: "Gold",
                    sources: [{ source: PriceSourceId.YAHOO_CHART, symbol: "GC=F" }],
                    placeholder: { price: 2300, pct: 0 },
                },
            ],
            now: () => NOW,
        });

        expect(snapshot.commodities).toEqual([{ name: "Gold", price: 2400, pct: -4 }]);
    });
});
