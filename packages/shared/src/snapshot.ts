import { z } from "zod";

/**
 * Snapshot document schema (public/data.json).
 *
 * The dashboard reads this file as-is, and the next builder run reads it
 * back as its fallback price baseline.
 */

export const CommodityQuoteSchema = z.object({
    name: z.string().min(1),
    /** Rounded to 2 decimals, always > 0 in an emitted snapshot */
    price: z.number().positive(),
    /** Percent change vs baseline, 2 decimals. 0 when no baseline exists. */
    pct: z.number(),
});

export type CommodityQuote = z.infer<typeof CommodityQuoteSchema>;

export const ContractAwardSchema = z.object({
    entity: z.string().min(1),
    /** Whole US dollars */
    value_usd: z.number().int().nonnegative(),
    note: z.string(),
});

export type ContractAward = z.infer<typeof ContractAwardSchema>;

export const ConflictNoteSchema = z.object({
    name: z.string().min(1),
    note: z.string(),
});

export type ConflictNote = z.infer<typeof ConflictNoteSchema>;

export const ApparelNoteSchema = z.object({
    brand: z.string().min(1),
    note: z.string(),
});

export type ApparelNote = z.infer<typeof ApparelNoteSchema>;

export const SnapshotSchema = z.object({
    commodities: z.array(CommodityQuoteSchema),
    contracts: z.array(ContractAwardSchema),
    conflicts: z.array(ConflictNoteSchema),
    apparel: z.array(ApparelNoteSchema),
    /** Unix seconds */
    generated_at: z.number().int().nonnegative(),
});

export type Snapshot = z.infer<typeof SnapshotSchema>;

/**
 * One commodity row of a previously written snapshot. Older files may carry
 * null or string prices, which are filtered later.
 */
export const PersistedCommoditySchema = z.object({
    name: z.string(),
    price: z.union([z.number(), z.string()]).nullable().optional(),
});

export type PersistedCommodity = z.infer<typeof PersistedCommoditySchema>;

/**
 * Lenient view of a previously written snapshot. Rows are checked one at a
 * time so a malformed entry only loses itself.
 */
export const PersistedSnapshotSchema = z.object({
    commodities: z.array(z.unknown()),
});

export type PersistedSnapshot = z.infer<typeof PersistedSnapshotSchema>;
