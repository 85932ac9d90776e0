/**
 * DoD daily contract awards.
 *
 * The defense.gov contracts RSS carries award announcements as HTML
 * summaries. Vendor names and amounts are pulled out with a best-effort
 * pattern ("<Vendor>, <City>, <State>, was awarded $<amount> [million|billion]").
 * Any failure yields an empty list; the anchor entries are always present.
 */

import type { ContractAward } from "@milticker/shared";
import { XMLParser } from "fast-xml-parser";
import { request } from "undici";
import { z } from "zod";
import { env } from "../config/env.js";
import { defenseFeedLimiter } from "../http/limiters.js";
import { createChildLogger } from "../log/logger.js";

const logger = createChildLogger({ module: "defense-contracts" });

const LIVE_NOTE = "DoD daily awards";
const MAX_FEED_ITEMS = 4;

/** Fixed reference entries appended after live awards. */
export const ANCHOR_CONTRACTS: readonly ContractAward[] = [
    { entity: "Lockheed Martin", value_usd: 540_000_000, note: "JASSM production lot (placeholder)" },
    { entity: "Raytheon", value_usd: 220_000_000, note: "Patriot spares IDIQ (placeholder)" },
];

// Only the vendor is case-sensitive: it must start with a capital.
const AWARD_PATTERN =
    /([A-Z][A-Za-z0-9&.\- ]+(?:, [A-Z][A-Za-z.\- ]+)*?)\s*(?:, [A-Z]{2})?,?\s*(?:[Hh]as [Bb]een|[Ww]as) [Aa]warded\s*\$([\d,]+(?:\.\d+)?)\s*([Bb]illion|[Mm]illion|BILLION|MILLION)?/g;

const SCALE: Record<string, number> = {
    billion: 1_000_000_000,
    million: 1_000_000,
};

const FeedItemSchema = z.object({
    title: z.string().optional(),
    summary: z.string().optional(),
    description: z.string().optional(),
});

const FeedSchema = z.object({
    rss: z.object({
        channel: z.object({
            item: z.array(FeedItemSchema).optional(),
        }),
    }),
});

const parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    isArray: (tagName) => tagName === "item",
});

export function stripTags(html: string): string {
    return html.replace(/<[^>]+>/g, " ");
}

/**
 * Extract award entries from plain announcement text, at most `limit`.
 */
export function extractContractAwards(text: string, limit: number): ContractAward[] {
    const awards: ContractAward[] = [];
    if (limit <= 0) return awards;

    for (const match of text.matchAll(AWARD_PATTERN)) {
        const entity = (match[1] ?? "").trim();
        const amount = Number((match[2] ?? "").replace(/,/g, ""));
        if (!entity || !Number.isFinite(amount)) continue;

        const scale = SCALE[(match[3] ?? "").toLowerCase()] ?? 1;
        awards.push({ entity, value_usd: Math.round(amount * scale), note: LIVE_NOTE });
        if (awards.length >= limit) break;
    }
    return awards;
}

/**
 * Parse the RSS document and extract awards from its first items.
 */
export function parseContractFeed(xml: string, limit: number): ContractAward[] {
    const feed = FeedSchema.parse(parser.parse(xml));
    const items = (feed.rss.channel.item ?? []).slice(0, MAX_FEED_ITEMS);

    const awards: ContractAward[] = [];
    for (const item of items) {
        const text = stripTags(item.summary ?? item.description ?? "");
        awards.push(...extractContractAwards(text, limit - awards.length));
        if (awards.length >= limit) break;
    }
    return awards;
}

/**
 * Fetch live awards from the defense.gov feed. Never rejects.
 */
export async function fetchDefenseContracts(limit = 6): Promise<ContractAward[]> {
    const url = env.DOD_CONTRACTS_FEED_URL;
    try {
        const xml = await defenseFeedLimiter.schedule(async () => {
            logger.debug({ url }, "Contracts feed request");
            const response = await request(url, {
                method: "GET",
                headers: { Accept: "application/rss+xml, application/xml;q=0.9" },
                headersTimeout: env.HTTP_TIMEOUT_MS,
                bodyTimeout: env.HTTP_TIMEOUT_MS,
            });

            const body = await response.body.text();
            if (response.statusCode !== 200) {
                throw new Error(`Contracts feed error ${response.statusCode}: ${body.slice(0, 200)}`);
            }
            return body;
        });

        const awards = parseContractFeed(xml, limit);
        logger.info({ count: awards.length }, "Contract awards extracted");
        return awards;
    } catch (err) {
        logger.warn({ err }, "Contracts feed unavailable");
        return [];
    }
}

/**
 * Live awards followed by the anchor entries.
 */
export async function collectContracts(limit = 6): Promise<ContractAward[]> {
    const live = await fetchDefenseContracts(limit);
    return [...live, ...ANCHOR_CONTRACTS];
}
