/**
 * Commodity resolver.
 *
 * Interprets one row of the priority table:
 *   UNRESOLVED -> PARTIAL (price only) -> RESOLVED
 *   UNRESOLVED -> PLACEHOLDER
 *
 * Rules:
 * - The first source to yield a price owns the price. Later sources are only
 *   consulted to fill a missing previous price, and earlier sources win, so a
 *   daily-candle baseline beats an intraday one.
 * - A source that yields a price together with a ready-made percent change
 *   (commodities index) resolves the commodity on its own.
 * - A price without any baseline falls back to the last snapshot's price;
 *   failing that, pct is 0.
 * - No price at all means the configured placeholder.
 */

import type {
    CommodityDefinition,
    CommodityQuote,
    PriceSourceIdType,
} from "@milticker/shared";
import { createChildLogger } from "../log/logger.js";
import { percentChange, round2, toPositivePrice } from "../pricing/priceUtils.js";
import type { PersistedPriceIndex } from "../store/priceIndex.js";
import { guardObservation, type SourceRegistry } from "../sources/types.js";

const logger = createChildLogger({ module: "resolver" });

export const ResolutionState = {
    RESOLVED: "RESOLVED",
    /** Price found but no baseline anywhere; pct is 0 */
    PARTIAL: "PARTIAL",
    PLACEHOLDER: "PLACEHOLDER",
} as const;

export type ResolutionStateType = (typeof ResolutionState)[keyof typeof ResolutionState];

export type PriceOrigin = PriceSourceIdType | "placeholder";
export type BaselineOrigin = PriceSourceIdType | "store" | "upstream-pct" | "placeholder";

export interface Resolution {
    quote: CommodityQuote;
    state: ResolutionStateType;
    priceSource: PriceOrigin;
    /** Where the pct came from; null when there was no baseline */
    baselineSource: BaselineOrigin | null;
}

interface Candidate {
    price: number | null;
    priceSource: PriceSourceIdType | null;
    previousPrice: number | null;
    previousSource: PriceSourceIdType | null;
}

/**
 * Resolve a single commodity into a complete quote. Never rejects.
 */
export async function resolveCommodity(
    definition: CommodityDefinition,
    sources: SourceRegistry,
    baselines: PersistedPriceIndex
): Promise<Resolution> {
    const log = logger.child({ commodity: definition.name });
    const candidate: Candidate = {
        price: null,
        priceSource: null,
        previousPrice: null,
        previousSource: null,
    };

    for (const ref of definition.sources) {
        if (candidate.price !== null && candidate.previousPrice !== null) break;

        const source = sources.get(ref.source);
        if (!source) {
            log.warn({ source: ref.source }, "Source not registered, skipping");
            continue;
        }
        if (!source.isAvailable()) {
            log.debug({ source: ref.source }, "Source not available this run, skipping");
            continue;
        }

        const observation = await guardObservation(
            log,
            { source: ref.source, symbol: ref.symbol },
            () => source.observe(ref.symbol)
        );
        const price = toPositivePrice(observation.price);
        const previousPrice = toPositivePrice(observation.previousPrice);

        if (candidate.price === null && price !== null) {
            const pct = round2(observation.pctChange);
            if (pct !== null) {
                log.debug({ source: ref.source, price, pct }, "Resolved from upstream percent change");
                return {
                    quote: { name: definition.name, price, pct },
                    state: ResolutionState.RESOLVED,
                    priceSource: ref.source,
                    baselineSource: "upstream-pct",
                };
            }
            candidate.price = price;
            candidate.priceSource = ref.source;
        }

        if (candidate.previousPrice === null && previousPrice !== null) {
            candidate.previousPrice = previousPrice;
            candidate.previousSource = ref.source;
        }
    }

    if (candidate.price === null || candidate.priceSource === null) {
        log.warn("No source produced a price, using placeholder");
        return {
            quote: {
                name: definition.name,
                price: definition.placeholder.price,
                pct: definition.placeholder.pct,
            },
            state: ResolutionState.PLACEHOLDER,
            priceSource: "placeholder",
            baselineSource: "placeholder",
        };
    }

    let baseline = candidate.previousPrice;
    let baselineSource: BaselineOrigin | null = candidate.previousSource;
    if (baseline === null) {
        baseline = baselines.lookup(definition.name);
        baselineSource = baseline === null ? null : "store";
    }

    const quote: CommodityQuote = {
        name: definition.name,
        price: candidate.price,
        pct: percentChange(candidate.price, baseline),
    };
    const state = baseline === null ? ResolutionState.PARTIAL : ResolutionState.RESOLVED;

    log.debug({ ...quote, state, priceSource: candidate.priceSource, baselineSource }, "Commodity resolved");
    return { quote, state, priceSource: candidate.priceSource, baselineSource };
}
