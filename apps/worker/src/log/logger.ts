import pino from "pino";
import { env } from "../config/env.js";

export const logger = pino({
    level: env.LOG_LEVEL,
    transport:
        env.NODE_ENV === "development"
            ? {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: "SYS:standard",
                    ignore: "pid,hostname",
                },
            }
            : undefined,
    base: {
        service: "snapshot-builder",
    },
});

export function createChildLogger(bindings: Record<string, unknown>) {
    return logger.child(bindings);
}

/** Query parameters that carry upstream credentials (TradingEconomics `c`). */
const CREDENTIAL_PARAMS = ["c"];

/**
 * Render a URL for logs and error messages with credentials masked.
 */
export function redactUrl(url: URL): string {
    const copy = new URL(url.toString());
    for (const param of CREDENTIAL_PARAMS) {
        if (copy.searchParams.has(param)) {
            copy.searchParams.set(param, "***");
        }
    }
    return copy.toString();
}
