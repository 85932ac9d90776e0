/**
 * Snapshot persistence.
 *
 * The written snapshot doubles as the fallback baseline for the next run:
 * load() recovers last-known prices, save() writes the new document.
 * A missing or unreadable previous snapshot is never fatal; load() then
 * returns an empty index, same as a first-ever run.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { PersistedSnapshotSchema, type Snapshot } from "@milticker/shared";
import { createChildLogger } from "../log/logger.js";
import { PersistedPriceIndex } from "./priceIndex.js";

const logger = createChildLogger({ module: "snapshot-store" });

export interface SnapshotStore {
    load(): Promise<PersistedPriceIndex>;
    save(snapshot: Snapshot): Promise<void>;
}

/**
 * Parse raw snapshot JSON into a price index.
 * Malformed JSON or an unexpected shape yields an empty index.
 */
export function parsePriceIndex(raw: string, origin: string): PersistedPriceIndex {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (err) {
        logger.warn({ err, origin }, "Previous snapshot is not valid JSON, ignoring it");
        return PersistedPriceIndex.empty();
    }

    const result = PersistedSnapshotSchema.safeParse(json);
    if (!result.success) {
        logger.warn(
            { origin, issues: result.error.issues.length },
            "Previous snapshot has unexpected shape, ignoring it"
        );
        return PersistedPriceIndex.empty();
    }

    return PersistedPriceIndex.fromSnapshot(result.data);
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Snapshot stored as a JSON file on disk.
 */
export class FileSnapshotStore implements SnapshotStore {
    readonly path: string;

    constructor(path: string) {
        this.path = resolve(path);
    }

    async load(): Promise<PersistedPriceIndex> {
        let raw: string;
        try {
            raw = await readFile(this.path, "utf8");
        } catch (err) {
            if (isMissingFile(err)) {
                logger.info({ path: this.path }, "No previous snapshot, starting without baselines");
            } else {
                logger.warn({ err, path: this.path }, "Failed to read previous snapshot");
            }
            return PersistedPriceIndex.empty();
        }

        const index = parsePriceIndex(raw, this.path);
        logger.debug({ path: this.path, prices: index.size }, "Loaded previous snapshot");
        return index;
    }

    async save(snapshot: Snapshot): Promise<void> {
        await mkdir(dirname(this.path), { recursive: true });
        await writeFile(this.path, JSON.stringify(snapshot, null, 2));
        logger.debug({ path: this.path }, "Snapshot written");
    }
}

/**
 * In-memory store for tests and dry runs.
 * Holds the last saved document as serialized JSON so load() goes through
 * the same parsing path as the file store.
 */
export class MemorySnapshotStore implements SnapshotStore {
    private raw: string | null;

    constructor(initial?: unknown) {
        this.raw = initial === undefined ? null : JSON.stringify(initial);
    }

    async load(): Promise<PersistedPriceIndex> {
        if (this.raw === null) return PersistedPriceIndex.empty();
        return parsePriceIndex(this.raw, "memory");
    }

    async save(snapshot: Snapshot): Promise<void> {
        this.raw = JSON.stringify(snapshot);
    }

    /** Last saved document, or null if nothing was saved yet. */
    get saved(): string | null {
        return this.raw;
    }
}
