import type { ApparelNote, ConflictNote } from "@milticker/shared";

// Maintained by hand; edit and re-run the builder.

export const CONFLICT_NOTES: readonly ConflictNote[] = [
    { name: "Black Sea", note: "Drone strike uptick" },
    { name: "Red Sea", note: "Shipping insurance premia rising" },
    { name: "Taiwan Strait", note: "Increased ADIZ incursions" },
    { name: "Sahel", note: "Cross-border operations reported" },
];

export const APPAREL_NOTES: readonly ApparelNote[] = [
    { brand: "Arc'teryx (LEAF)", note: "Technical shells, load-bearing apparel" },
    { brand: "The North Face", note: "Extreme cold-weather lines; expedition wear" },
    { brand: "Crye Precision", note: "Combat uniforms & plate carriers" },
    { brand: "5.11 Tactical", note: "Duty apparel & gear" },
];
