/**
 * Snapshot assembler.
 *
 * 1. Load last-known prices from the store (once)
 * 2. Resolve every configured commodity concurrently, keeping table order
 * 3. Append contract, conflict and apparel lists from their collaborators
 * 4. Stamp generated_at and hand the document back (runSnapshot also saves it)
 */

import {
    ApparelNoteSchema,
    ConflictNoteSchema,
    CommodityTableSchema,
    ContractAwardSchema,
    DEFAULT_COMMODITIES,
    type ApparelNote,
    type CommodityDefinition,
    type ConflictNote,
    type ContractAward,
    type Snapshot,
} from "@milticker/shared";
import { z } from "zod";
import { createChildLogger } from "../log/logger.js";
import { ResolutionState, resolveCommodity, type Resolution } from "../resolve/resolver.js";
import type { SourceRegistry } from "../sources/types.js";
import type { SnapshotStore } from "../store/snapshotStore.js";

const logger = createChildLogger({ module: "snapshot" });

type ListProvider<T> = () => T[] | Promise<T[]>;

export interface SnapshotCollaborators {
    contracts: ListProvider<ContractAward>;
    conflicts: ListProvider<ConflictNote>;
    apparel: ListProvider<ApparelNote>;
}

export interface SnapshotDeps {
    store: SnapshotStore;
    sources: SourceRegistry;
    collaborators: SnapshotCollaborators;
    /** Defaults to DEFAULT_COMMODITIES. Throws on an invalid table (duplicate names etc.) */
    commodities?: readonly CommodityDefinition[];
    /** Epoch milliseconds. Defaults to Date.now */
    now?: () => number;
}

export interface SnapshotResult {
    snapshot: Snapshot;
    resolutions: Resolution[];
}

/**
 * Run a collaborator and validate what it returns.
 * A collaborator that throws or returns malformed entries contributes
 * nothing rather than failing the run.
 */
async function collectList<T>(
    label: string,
    provider: ListProvider<T>,
    schema: z.ZodType<T>
): Promise<T[]> {
    try {
        const items = await provider();
        const parsed = z.array(schema).safeParse(items);
        if (!parsed.success) {
            logger.warn({ list: label, issues: parsed.error.issues.length }, "Malformed list, dropping it");
            return [];
        }
        return parsed.data;
    } catch (err) {
        logger.warn({ err, list: label }, "List provider failed, using empty list");
        return [];
    }
}

/**
 * Build a snapshot without persisting it.
 */
export async function buildSnapshot(deps: SnapshotDeps): Promise<SnapshotResult> {
    const commodities = CommodityTableSchema.parse(deps.commodities ?? DEFAULT_COMMODITIES);
    const now = deps.now ?? Date.now;

    const baselines = await deps.store.load();
    logger.debug({ baselines: baselines.size }, "Baselines loaded");

    const [resolutions, contracts, conflicts, apparel] = await Promise.all([
        Promise.all(commodities.map((c) => resolveCommodity(c, deps.sources, baselines))),
        collectList("contracts", deps.collaborators.contracts, ContractAwardSchema),
        collectList("conflicts", deps.collaborators.conflicts, ConflictNoteSchema),
        collectList("apparel", deps.collaborators.apparel, ApparelNoteSchema),
    ]);

    const snapshot: Snapshot = {
        commodities: resolutions.map((r) => r.quote),
        contracts,
        conflicts,
        apparel,
        generated_at: Math.floor(now() / 1000),
    };

    return { snapshot, resolutions };
}

/**
 * Build a snapshot and save it. The saved document is the next run's baseline.
 */
export async function runSnapshot(deps: SnapshotDeps): Promise<SnapshotResult> {
    const result = await buildSnapshot(deps);
    await deps.store.save(result.snapshot);

    const placeholders = result.resolutions.filter((r) => r.state === ResolutionState.PLACEHOLDER).length;
    logger.info(
        {
            commodities: result.snapshot.commodities.length,
            placeholders,
            contracts: result.snapshot.contracts.length,
            generatedAt: result.snapshot.generated_at,
        },
        "Snapshot complete"
    );
    return result;
}
