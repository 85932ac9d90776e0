import { z } from "zod";

/**
 * Upstream price sources known to the builder.
 * - yahoo-chart: daily candles (last two closes)
 * - yahoo-quote: live/intraday quote (last trade + prior session close)
 * - trading-economics: keyed commodities index (price + ready-made % change)
 */
export const PriceSourceId = {
    YAHOO_CHART: "yahoo-chart",
    YAHOO_QUOTE: "yahoo-quote",
    TRADING_ECONOMICS: "trading-economics",
} as const;

export type PriceSourceIdType = (typeof PriceSourceId)[keyof typeof PriceSourceId];

export const PriceSourceIdSchema = z.enum([
    PriceSourceId.YAHOO_CHART,
    PriceSourceId.YAHOO_QUOTE,
    PriceSourceId.TRADING_ECONOMICS,
]);

export const SourceRefSchema = z.object({
    source: PriceSourceIdSchema,
    /** Ticker for Yahoo, whitespace-separated name keywords for TradingEconomics */
    symbol: z.string().min(1),
});

export type SourceRef = z.infer<typeof SourceRefSchema>;

export const PlaceholderSchema = z.object({
    price: z.number().positive(),
    pct: z.number(),
});

export type Placeholder = z.infer<typeof PlaceholderSchema>;

/**
 * One row of the priority table: sources are tried in array order.
 */
export const CommodityDefinitionSchema = z.object({
    name: z.string().min(1),
    sources: z.array(SourceRefSchema),
    placeholder: PlaceholderSchema,
});

export type CommodityDefinition = z.infer<typeof CommodityDefinitionSchema>;

export const CommodityTableSchema = z
    .array(CommodityDefinitionSchema)
    .refine((rows) => new Set(rows.map((r) => r.name)).size === rows.length, {
        message: "Commodity names must be unique",
    });

function yahoo(symbol: string): SourceRef[] {
    return [
        { source: PriceSourceId.YAHOO_CHART, symbol },
        { source: PriceSourceId.YAHOO_QUOTE, symbol },
    ];
}

/**
 * Default commodity table. Order here is the output order.
 */
export const DEFAULT_COMMODITIES: readonly CommodityDefinition[] = [
    { name: "WTI", sources: yahoo("CL=F"), placeholder: { price: 83.12, pct: 0 } },
    { name: "Brent", sources: yahoo("BZ=F"), placeholder: { price: 86.47, pct: 0 } },
    {
        name: "HRC Steel",
        sources: [
            { source: PriceSourceId.TRADING_ECONOMICS, symbol: "hrc steel" },
            ...yahoo("HRC=F"),
        ],
        placeholder: { price: 830, pct: 0.9 },
    },
    { name: "Copper", sources: yahoo("HG=F"), placeholder: { price: 4.12, pct: -1.8 } },
    { name: "Aluminum", sources: yahoo("ALI=F"), placeholder: { price: 2421, pct: 0.7 } },
];
