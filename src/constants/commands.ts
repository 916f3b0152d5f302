/**
 * Chat command names and user-facing messages
 */

export const LOOT_COMMAND_NAME = "loot";
export const LOOT_RELOAD_COMMAND_NAME = "loot_reload";

export const MSG_DATA_UNAVAILABLE_PREFIX = "Loot data is unavailable: ";
export const MSG_NOT_LOADED = "the catalog has not been loaded yet.";
export const MSG_INVALID_LIMIT = "Limit must be a positive number.";
export const MSG_TAGS_UNSUPPORTED =
  "Tag filtering is not available because the data has no tags column.";
export const MSG_EMPTY_TAG_FILTER = "Tag filter must include at least one tag.";
export const MSG_NO_MATCHES = "No items matched your filters.";
export const MSG_RELOAD_FAILED_PREFIX = "Reload failed: ";
export const MSG_COMMAND_FAILED =
  "Something went wrong while running this command.";
