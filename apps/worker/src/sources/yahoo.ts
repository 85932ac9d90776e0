/**
 * Yahoo Finance v8 chart API client.
 *
 * Endpoint: {YAHOO_CHART_BASE_URL}/v8/finance/chart/{symbol}
 * No key required. The same endpoint serves both daily candles
 * (range=5d, interval=1d) and the live quote block in `meta`.
 */

import { request } from "undici";
import { z } from "zod";
import { env } from "../config/env.js";
import { yahooLimiter } from "../http/limiters.js";
import { createChildLogger } from "../log/logger.js";

const logger = createChildLogger({ module: "yahoo-api" });

const NullableNumber = z.number().nullable().optional();

const YahooChartMetaSchema = z.object({
    symbol: z.string().optional(),
    currency: z.string().nullable().optional(),
    regularMarketPrice: NullableNumber,
    /** Prior session's official close (present on intraday ranges) */
    previousClose: NullableNumber,
    /** Close before the first bar of the requested range */
    chartPreviousClose: NullableNumber,
});

const YahooChartResultSchema = z.object({
    meta: YahooChartMetaSchema,
    timestamp: z.array(z.number()).optional(),
    indicators: z
        .object({
            quote: z
                .array(
                    z.object({
                        close: z.array(z.number().nullable()).optional(),
                    })
                )
                .optional(),
        })
        .optional(),
});

const YahooChartResponseSchema = z.object({
    chart: z.object({
        result: z.array(YahooChartResultSchema).nullable().optional(),
        error: z
            .object({
                code: z.string().optional(),
                description: z.string().optional(),
            })
            .nullable()
            .optional(),
    }),
});

export type YahooChartResult = z.infer<typeof YahooChartResultSchema>;

export interface YahooChartParams {
    range: "1d" | "5d";
    interval: "1m" | "1d";
}

/**
 * Fetch one chart result for a symbol.
 * Throws on HTTP errors, Yahoo-reported errors and empty results.
 */
export async function fetchYahooChart(
    symbol: string,
    params: YahooChartParams
): Promise<YahooChartResult> {
    const url = new URL(
        `/v8/finance/chart/${encodeURIComponent(symbol)}`,
        env.YAHOO_CHART_BASE_URL
    );
    url.searchParams.set("range", params.range);
    url.searchParams.set("interval", params.interval);
    url.searchParams.set("includePrePost", "false");

    const data = await yahooLimiter.schedule(async () => {
        logger.debug({ url: url.toString() }, "Yahoo chart request");
        const response = await request(url.toString(), {
            method: "GET",
            headers: {
                Accept: "application/json",
                // Yahoo rejects requests without a browser-like user agent
                "User-Agent": "Mozilla/5.0 (compatible; MilTicker/1.0)",
            },
            headersTimeout: env.HTTP_TIMEOUT_MS,
            bodyTimeout: env.HTTP_TIMEOUT_MS,
        });

        if (response.statusCode !== 200) {
            const body = await response.body.text();
            throw new Error(`Yahoo API error ${response.statusCode}: ${body.slice(0, 200)}`);
        }

        const json = await response.body.json();
        return YahooChartResponseSchema.parse(json);
    });

    if (data.chart.error) {
        throw new Error(
            `Yahoo API error for ${symbol}: ${data.chart.error.description ?? data.chart.error.code ?? "unknown"}`
        );
    }

    const result = data.chart.result?.[0];
    if (!result) {
        throw new Error(`Yahoo API returned no chart result for ${symbol}`);
    }
    return result;
}

/**
 * Valid (non-null, finite) closes in chronological order.
 */
export function validCloses(result: YahooChartResult): number[] {
    const closes = result.indicators?.quote?.[0]?.close ?? [];
    return closes.filter((c): c is number => c !== null && Number.isFinite(c));
}
