import type { PriceSourceIdType } from "@milticker/shared";
import { TradingEconomicsSource } from "./tradingEconomics.js";
import type { PriceSource, SourceRegistry } from "./types.js";
import { YahooChartSource } from "./yahooChart.js";
import { YahooQuoteSource } from "./yahooQuote.js";

export {
    ABSENT_OBSERVATION,
    guardObservation,
    type PriceObservation,
    type PriceSource,
    type SourceRegistry,
} from "./types.js";
export { YahooChartSource } from "./yahooChart.js";
export { YahooQuoteSource } from "./yahooQuote.js";
export { TradingEconomicsSource } from "./tradingEconomics.js";

export interface SourceRegistryOptions {
    tradingEconomicsKey?: string;
}

/**
 * Build the registry of live upstream sources, keyed by source id.
 */
export function createSourceRegistry(options: SourceRegistryOptions = {}): SourceRegistry {
    const sources: PriceSource[] = [
        new YahooChartSource(),
        new YahooQuoteSource(),
        new TradingEconomicsSource(options.tradingEconomicsKey),
    ];
    return new Map(sources.map((s): [PriceSourceIdType, PriceSource] => [s.id, s]));
}
