import { PriceSourceId } from "@milticker/shared";
import { createChildLogger } from "../log/logger.js";
import { fetchYahooChart, validCloses } from "./yahoo.js";
import { ABSENT_OBSERVATION, guardObservation, type PriceObservation, type PriceSource } from "./types.js";

const logger = createChildLogger({ module: "source", source: PriceSourceId.YAHOO_CHART });

/**
 * Daily-candle source: the two most recent daily closes of a 5-day window
 * become (price, previousPrice). Fewer than two valid closes is absence.
 */
export class YahooChartSource implements PriceSource {
    readonly id = PriceSourceId.YAHOO_CHART;

    isAvailable(): boolean {
        return true;
    }

    observe(symbol: string): Promise<PriceObservation> {
        return guardObservation(logger, { source: this.id, symbol }, async () => {
            const result = await fetchYahooChart(symbol, { range: "5d", interval: "1d" });
            const closes = validCloses(result);

            if (closes.length < 2) {
                logger.warn({ symbol, closes: closes.length }, "Not enough daily closes");
                return ABSENT_OBSERVATION;
            }

            const [previousPrice, price] = closes.slice(-2);
            logger.debug({ symbol, price, previousPrice }, "Daily closes fetched");
            return { price, previousPrice };
        });
    }
}
