import type { PriceSourceIdType } from "@milticker/shared";
import type { Logger } from "pino";

/**
 * What a single upstream returned for one symbol.
 * Each field is independently nullable; all-null means the source had nothing.
 */
export interface PriceObservation {
    price: number | null;
    previousPrice: number | null;
    /**
     * Percent change computed by the upstream itself, when it provides one.
     * Only the commodities index sets this.
     */
    pctChange?: number | null;
}

export const ABSENT_OBSERVATION: PriceObservation = Object.freeze({
    price: null,
    previousPrice: null,
});

/**
 * A price source. observe() must resolve, never reject: failures are
 * reported as ABSENT_OBSERVATION.
 */
export interface PriceSource {
    readonly id: PriceSourceIdType;
    /** False when the source cannot run this time (e.g. missing credential). */
    isAvailable(): boolean;
    observe(symbol: string): Promise<PriceObservation>;
}

export type SourceRegistry = ReadonlyMap<PriceSourceIdType, PriceSource>;

/**
 * Run an upstream call and convert any failure into an absent observation.
 */
export async function guardObservation(
    log: Logger,
    context: { source: string; symbol: string },
    fetcher: () => Promise<PriceObservation>
): Promise<PriceObservation> {
    try {
        return await fetcher();
    } catch (err) {
        log.warn({ err, ...context }, "Price source unavailable");
        return ABSENT_OBSERVATION;
    }
}
