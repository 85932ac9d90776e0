import Bottleneck from "bottleneck";
import { logger } from "../log/logger.js";

/**
 * Upstream rate limiters.
 *
 * One limiter per host. Yahoo throttles aggressively on bursts from a
 * single IP, so chart and quote calls share one limiter.
 */

/**
 * Yahoo Finance chart endpoint (candles and live quote).
 */
export const yahooLimiter = new Bottleneck({
    maxConcurrent: 2,
    minTime: 250, // ~4 rps
    reservoir: 8,
    reservoirRefreshAmount: 4,
    reservoirRefreshInterval: 1000,
});

/**
 * TradingEconomics. One commodities list call per run is expected.
 */
export const tradingEconomicsLimiter = new Bottleneck({
    maxConcurrent: 1,
    minTime: 1000,
});

/**
 * defense.gov contracts RSS.
 */
export const defenseFeedLimiter = new Bottleneck({
    maxConcurrent: 1,
    minTime: 1000,
});

function logFailures(limiter: Bottleneck, upstream: string): void {
    // "failed" fires on job errors, not on limiter throttling
    limiter.on("failed", (error, jobInfo) => {
        const errorMessage = error instanceof Error ? error.message : String(error);
        logger.warn(
            { error: errorMessage, jobId: jobInfo.options.id, upstream },
            "Upstream request failed"
        );
    });
}

logFailures(yahooLimiter, "yahoo");
logFailures(tradingEconomicsLimiter, "trading-economics");
logFailures(defenseFeedLimiter, "defense-gov");
