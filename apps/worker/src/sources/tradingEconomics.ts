/**
 * TradingEconomics commodities index.
 *
 * Endpoint: {TRADING_ECONOMICS_BASE_URL}/markets/commodities?c={key}&f=json
 * Returns every listed commodity in one call, each row carrying its last
 * price and the day's percent change, so one fetch per run serves all
 * lookups. Requires TE_KEY; without it the source reports itself unavailable.
 */

import { PriceSourceId } from "@milticker/shared";
import { request } from "undici";
import { z } from "zod";
import { env } from "../config/env.js";
import { tradingEconomicsLimiter } from "../http/limiters.js";
import { createChildLogger, redactUrl } from "../log/logger.js";
import { round2, toPositivePrice } from "../pricing/priceUtils.js";
import { ABSENT_OBSERVATION, guardObservation, type PriceObservation, type PriceSource } from "./types.js";

const logger = createChildLogger({ module: "source", source: PriceSourceId.TRADING_ECONOMICS });

const NumericSchema = z.union([z.number(), z.string()]).nullable().optional();

const CommodityRowSchema = z.object({
    Symbol: z.string().nullable().optional(),
    Name: z.string().nullable().optional(),
    Last: NumericSchema,
    DailyPercentualChange: NumericSchema,
});

export type CommodityRow = z.infer<typeof CommodityRowSchema>;

const CommodityRowsSchema = z.array(CommodityRowSchema);

/**
 * Split a symbol such as "hrc steel" into lower-cased match keywords.
 */
export function toKeywords(symbol: string): string[] {
    return symbol
        .toLowerCase()
        .split(/\s+/)
        .filter((k) => k.length > 0);
}

/**
 * First row whose name contains every keyword (case-insensitive) and has a
 * usable last price.
 */
export function findCommodityRow(rows: CommodityRow[], keywords: string[]): CommodityRow | null {
    if (keywords.length === 0) return null;
    for (const row of rows) {
        const name = (row.Name ?? "").toLowerCase();
        if (!keywords.every((k) => name.includes(k))) continue;
        if (toPositivePrice(row.Last) === null) continue;
        return row;
    }
    return null;
}

export class TradingEconomicsSource implements PriceSource {
    readonly id = PriceSourceId.TRADING_ECONOMICS;

    private readonly apiKey: string | undefined;
    private rows: Promise<CommodityRow[]> | null = null;

    constructor(apiKey: string | undefined) {
        this.apiKey = apiKey;
    }

    isAvailable(): boolean {
        return this.apiKey !== undefined && this.apiKey !== "";
    }

    observe(symbol: string): Promise<PriceObservation> {
        return guardObservation(logger, { source: this.id, symbol }, async () => {
            if (!this.isAvailable()) {
                logger.debug({ symbol }, "No TE_KEY configured, skipping");
                return ABSENT_OBSERVATION;
            }

            const row = findCommodityRow(await this.loadRows(), toKeywords(symbol));
            if (!row) {
                logger.warn({ symbol }, "No matching commodity row");
                return ABSENT_OBSERVATION;
            }

            const observation: PriceObservation = {
                price: toPositivePrice(row.Last),
                previousPrice: null,
                pctChange: round2(row.DailyPercentualChange),
            };
            logger.debug({ symbol, row: row.Name, ...observation }, "Commodity row matched");
            return observation;
        });
    }

    /** Fetch the commodities list once per instance. */
    private loadRows(): Promise<CommodityRow[]> {
        if (!this.rows) {
            this.rows = this.fetchRows();
        }
        return this.rows;
    }

    private async fetchRows(): Promise<CommodityRow[]> {
        const url = new URL("/markets/commodities", env.TRADING_ECONOMICS_BASE_URL);
        url.searchParams.set("c", this.apiKey ?? "");
        url.searchParams.set("f", "json");

        return tradingEconomicsLimiter.schedule(async () => {
            logger.debug({ url: redactUrl(url) }, "TradingEconomics request");
            const response = await request(url.toString(), {
                method: "GET",
                headers: { Accept: "application/json" },
                headersTimeout: env.HTTP_TIMEOUT_MS,
                bodyTimeout: env.HTTP_TIMEOUT_MS,
            });

            if (response.statusCode !== 200) {
                const body = await response.body.text();
                throw new Error(
                    `TradingEconomics API error ${response.statusCode}: ${body.slice(0, 200)}`
                );
            }

            const json = await response.body.json();
            return CommodityRowsSchema.parse(json);
        });
    }
}
