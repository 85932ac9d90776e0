/**
 * Numeric normalization shared by sources, resolver and store.
 *
 * Prices travel as plain numbers rounded to 2 decimals; anything that
 * cannot be coerced becomes null instead of throwing.
 */

/**
 * Round a number or numeric string to 2 decimals.
 * Returns null for null/undefined, empty strings and non-finite values.
 */
export function round2(value: unknown): number | null {
    let n: number;
    if (typeof value === "number") {
        n = value;
    } else if (typeof value === "string" && value.trim() !== "") {
        n = Number(value.trim());
    } else {
        return null;
    }
    if (!Number.isFinite(n)) return null;

    // toFixed rounds the exact binary value, so 1.005 -> "1.00" like the float
    // it actually is. It breaks exact ties away from zero; those go half-even.
    const rounded = isExactCentTie(n) ? roundTieHalfEven(n) : Number(n.toFixed(2));
    return Object.is(rounded, -0) ? 0 : rounded;
}

/**
 * True when n sits exactly halfway between two cents. In binary that only
 * happens for odd multiples of 1/8 (0.125, 0.375, 80.125, ...).
 */
function isExactCentTie(n: number): boolean {
    const eighths = n * 8;
    return Number.isSafeInteger(eighths) && eighths % 2 !== 0;
}

function roundTieHalfEven(n: number): number {
    const cents = Math.floor(Math.abs(n) * 100);
    const even = cents % 2 === 0 ? cents : cents + 1;
    return (Math.sign(n) * even) / 100;
}

/**
 * Percent change from prev to curr, 2 decimals.
 * Returns 0 when there is no usable baseline (prev absent or zero) or
 * when curr is absent.
 */
export function percentChange(
    curr: number | null | undefined,
    prev: number | null | undefined
): number {
    if (curr === null || curr === undefined || !Number.isFinite(curr)) return 0;
    if (prev === null || prev === undefined || !Number.isFinite(prev) || prev === 0) return 0;
    return round2((100 * (curr - prev)) / prev) ?? 0;
}

/**
 * Coerce an upstream price into a usable positive 2-decimal value, or null.
 */
export function toPositivePrice(value: unknown): number | null {
    const price = round2(value);
    return price !== null && price > 0 ? price : null;
}
