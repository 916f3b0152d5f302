/**
 * Query limits and filter choices
 */

/** Results shown when the request gives no limit */
export const DEFAULT_RESULT_LIMIT = 10;

/** Larger limits are clamped to this value */
export const MAX_RESULT_LIMIT = 50;

/**
 * Rarity values offered by the /loot command
 */
export const RARITY_CHOICES = [
  "Common",
  "Uncommon",
  "Rare",
  "Very Rare",
  "Legendary",
] as const;
