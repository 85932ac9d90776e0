/**
 * Unit tests for the TradingEconomics commodities index source.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { ABSENT_OBSERVATION } from "./types.js";
import { TradingEconomicsSource, findCommodityRow, toKeywords } from "./tradingEconomics.js";

vi.mock("../config/env.js", () => ({
    env: {
        YAHOO_CHART_BASE_URL: "https://yahoo.test",
        TRADING_ECONOMICS_BASE_URL: "https://te.test",
        DOD_CONTRACTS_FEED_URL: "https://dod.test/rss",
        HTTP_TIMEOUT_MS: 1000,
        SNAPSHOT_PATH: "public/data.json",
        NODE_ENV: "test",
        LOG_LEVEL: "silent",
    },
}));

vi.mock("../http/limiters.js", () => ({
    tradingEconomicsLimiter: { schedule: (job: () => Promise<unknown>) => job() },
}));

vi.mock("undici", () => ({
    request: vi.fn(),
}));

import { request } from "undici";
const mockRequest = request as ReturnType<typeof vi.fn>;

function jsonResponse(statusCode: number, payload: unknown) {
    return {
        statusCode,
        body: {
            json: async () => payload,
            text: async () => JSON.stringify(payload),
        },
    };
}

const ROWS = [
    { Symbol: "XAUUSD:CUR", Name: "Gold", Last: 2031.4, DailyPercentualChange: 0.2 },
    { Symbol: "JBP:COM", Name: "Steel", Last: 3520, DailyPercentualChange: -0.5 },
    { Symbol: "HRC:COM", Name: "HRC Steel", Last: 905.5, DailyPercentualChange: 1.234 },
];

describe("toKeywords", () => {
    it("splits and lower-cases the symbol", () => {
        expect(toKeywords("  HRC   Steel ")).toEqual(["hrc", "steel"]);
        expect(toKeywords("")).toEqual([]);
    });
});

describe("findCommodityRow", () => {
    it("matches rows containing every keyword", () => {
        expect(findCommodityRow(ROWS, ["hrc", "steel"])?.Symbol).toBe("HRC:COM");
        expect(findCommodityRow(ROWS, ["steel"])?.Symbol).toBe("JBP:COM");
    });

    it("skips matching rows without a usable price", () => {
        const rows = [
            { Name: "HRC Steel", Last: null },
            { Name: "US HRC Steel Futures", Last: "910" },
        ];
        expect(findCommodityRow(rows, ["hrc", "steel"])?.Name).toBe("US HRC Steel Futures");
    });

    it("returns null without keywords or matches", () => {
        expect(findCommodityRow(ROWS, [])).toBeNull();
        expect(findCommodityRow(ROWS, ["lithium"])).toBeNull();
    });
});

describe("TradingEconomicsSource", () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it("is unavailable without a key and never calls upstream", async () => {
        const source = new TradingEconomicsSource(undefined);

        expect(source.isAvailable()).toBe(false);
        expect(await source.observe("hrc steel")).toEqual(ABSENT_OBSERVATION);
        expect(mockRequest).not.toHaveBeenCalled();
    });

    it("returns the last price and upstream percent change", async () => {
        mockRequest.mockResolvedValue(jsonResponse(200, ROWS));
        const source = new TradingEconomicsSource("test-key");

        const observation = await source.observe("hrc steel");

        expect(observation).toEqual({ price: 905.5, previousPrice: null, pctChange: 1.23 });
        expect(mockRequest.mock.calls[0]?.[0]).toBe(
            "https://te.test/markets/commodities?c=test-key&f=json"
        );
    });

    it("leaves pctChange null when upstream has none", async () => {
        mockRequest.mockResolvedValue(jsonResponse(200, [{ Name: "HRC Steel", Last: 899 }]));
        const source = new TradingEconomicsSource("test-key");

        expect(await source.observe("hrc steel")).toEqual({
            price: 899,
            previousPrice: null,
            pctChange: null,
        });
    });

    it("fetches the commodities list once per instance", async () => {
        mockRequest.mockResolvedValue(jsonResponse(200, ROWS));
        const source = new TradingEconomicsSource("test-key");

        await source.observe("hrc steel");
        await source.observe("gold");

        expect(mockRequest).toHaveBeenCalledTimes(1);
    });

    it("is absent when no row matches", async () => {
        mockRequest.mockResolvedValue(jsonResponse(200, ROWS));
        const source = new TradingEconomicsSource("test-key");

        expect(await source.observe("lithium")).toEqual(ABSENT_OBSERVATION);
    });

    it("is absent on HTTP errors", async () => {
        mockRequest.mockResolvedValue(jsonResponse(403, { message: "Invalid key" }));
        const source = new TradingEconomicsSource("test-key");

        expect(await source.observe("hrc steel")).toEqual(ABSENT_OBSERVATION);
    });
});
