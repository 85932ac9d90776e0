import { PriceSourceId } from "@milticker/shared";
import { createChildLogger } from "../log/logger.js";
import { fetchYahooChart } from "./yahoo.js";
import { ABSENT_OBSERVATION, guardObservation, type PriceObservation, type PriceSource } from "./types.js";

const logger = createChildLogger({ module: "source", source: PriceSourceId.YAHOO_QUOTE });

function finiteOrNull(value: number | null | undefined): number | null {
    return value !== null && value !== undefined && Number.isFinite(value) ? value : null;
}

/**
 * Live-quote source: last trade price and the prior session's close from
 * the intraday chart's quote block. Used when daily candles lag behind.
 */
export class YahooQuoteSource implements PriceSource {
    readonly id = PriceSourceId.YAHOO_QUOTE;

    isAvailable(): boolean {
        return true;
    }

    observe(symbol: string): Promise<PriceObservation> {
        return guardObservation(logger, { source: this.id, symbol }, async () => {
            const { meta } = await fetchYahooChart(symbol, { range: "1d", interval: "1m" });

            const price = finiteOrNull(meta.regularMarketPrice);
            const previousPrice =
                finiteOrNull(meta.previousClose) ?? finiteOrNull(meta.chartPreviousClose);

            if (price === null && previousPrice === null) {
                logger.warn({ symbol }, "Quote block has no prices");
                return ABSENT_OBSERVATION;
            }

            logger.debug({ symbol, price, previousPrice }, "Live quote fetched");
            return { price, previousPrice };
        });
    }
}
