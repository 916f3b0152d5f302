/**
 * Chat command type definitions
 *
 * Handlers are platform-neutral: they take parsed options and
 * return a reply. The bot binding maps these to the chat client.
 */

/**
 * Reply produced by a command handler
 */
export type CommandReply = {
  content: string;
  /** Only visible to the user who ran the command */
  ephemeral: boolean;
};

/**
 * Options of the /loot command after the chat client has parsed them.
 */
export type LootCommandOptions = {
  rarity?: string;
  category?: string;
  subtype?: string;
  tag?: string;
  limit?: number;
};
