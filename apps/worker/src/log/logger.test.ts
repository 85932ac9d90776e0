import { describe, it, expect, vi } from "vitest";

vi.mock("../config/env.js", () => ({
    env: {
        NODE_ENV: "test",
        LOG_LEVEL: "silent",
    },
}));

import { redactUrl } from "./logger.js";

describe("redactUrl", () => {
    it("masks the TradingEconomics key", () => {
        const url = new URL("https://te.test/markets/commodities?c=test-key&f=json");

        expect(redactUrl(url)).toBe("https://te.test/markets/commodities?c=***&f=json");
        expect(url.searchParams.get("c")).toBe("test-key");
    });

    it("leaves URLs without a key unchanged", () => {
        const url = new URL("https://yahoo.test/v8/finance/chart/CL%3DF?range=5d&interval=1d");

        expect(redactUrl(url)).toBe(url.toString());
    });
});
