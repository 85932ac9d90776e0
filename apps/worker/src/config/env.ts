import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

// Load .env from the repository root
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "../../../../.env") });

const envSchema = z.object({
    /** TradingEconomics credential. Unset means the steel index source is skipped. */
    TE_KEY: z
        .string()
        .optional()
        .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined)),
    SNAPSHOT_PATH: z.string().default("public/data.json"),
    YAHOO_CHART_BASE_URL: z.string().url().default("https://query1.finance.yahoo.com"),
    TRADING_ECONOMICS_BASE_URL: z.string().url().default("https://api.tradingeconomics.com"),
    DOD_CONTRACTS_FEED_URL: z
        .string()
        .url()
        .default(
            "https://www.defense.gov/DesktopModules/ArticleCS/RSS.ashx?ContentType=400&Site=727&max=10"
        ),
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z
        .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
        .default("info"),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
        console.error("❌ Invalid environment variables:");
        console.error(result.error.format());
        process.exit(1);
    }
    return result.data;
}

export const env = loadEnv();
