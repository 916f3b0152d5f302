/**
 * Loot bot — discord.js binding for the command handlers
 *
 * Loads the catalog once the client is ready, registers the slash
 * commands and routes chat-input interactions to the handlers.
 */

import {
  Client,
  Events,
  GatewayIntentBits,
  MessageFlags,
  type ChatInputCommandInteraction,
} from "discord.js";
import type { CatalogStore } from "@/catalog/store";
import type { CommandReply, LootCommandOptions } from "@/types/commands";
import type { Logger } from "@/types/logger";
import { handleLootCommand } from "@/commands/lootCommand";
import { handleReloadCommand } from "@/commands/reloadCommand";
import {
  LOOT_COMMAND_NAME,
  LOOT_RELOAD_COMMAND_NAME,
  MSG_COMMAND_FAILED,
} from "@/constants/commands";
import * as logger from "@/logger";
import { commandDefinitions } from "./commandDefinitions";

/**
 * Reads /loot options from the interaction. Unset options are left out.
 */
function readLootOptions(
  interaction: ChatInputCommandInteraction,
): LootCommandOptions {
  return {
    rarity: interaction.options.getString("rarity") ?? undefined,
    category: interaction.options.getString("category") ?? undefined,
    subtype: interaction.options.getString("subtype") ?? undefined,
    tag: interaction.options.getString("tag") ?? undefined,
    limit: interaction.options.getInteger("limit") ?? undefined,
  };
}

/**
 * Maps a handler reply to interaction reply options.
 */
export function toInteractionReply(reply: CommandReply): {
  content: string;
  flags: MessageFlags.Ephemeral | undefined;
} {
  return {
    content: reply.content,
    flags: reply.ephemeral ? MessageFlags.Ephemeral : undefined,
  };
}

/**
 * Runs the handler for a command name.
 *
 * @returns The reply, or null for commands this bot does not own
 */
export function dispatchCommand(
  store: CatalogStore,
  commandName: string,
  options: () => LootCommandOptions,
): CommandReply | null {
  switch (commandName) {
    case LOOT_COMMAND_NAME:
      return handleLootCommand(store, options());
    case LOOT_RELOAD_COMMAND_NAME:
      return handleReloadCommand(store);
    default:
      return null;
  }
}

export class LootBot {
  private readonly client: Client;

  constructor(
    private readonly store: CatalogStore,
    private readonly log: Logger = logger.withContext({ component: "bot" }),
  ) {
    this.client = new Client({ intents: [GatewayIntentBits.Guilds] });

    this.client.once(Events.ClientReady, (readyClient) => {
      this.store.reload();
      readyClient.application.commands
        .set(commandDefinitions.map((command) => command.toJSON()))
        .then(() => {
          this.log.info("Slash commands registered", {
            user: readyClient.user.tag,
            commands: commandDefinitions.length,
          });
        })
        .catch((err: unknown) => {
          this.log.error("Failed to register slash commands", {
            error: err instanceof Error ? err.message : String(err),
          });
        });
    });

    this.client.on(Events.InteractionCreate, (interaction) => {
      if (!interaction.isChatInputCommand()) {
        return;
      }
      this.handleInteraction(interaction).catch((err: unknown) => {
        this.log.error("Failed to answer interaction", {
          command: interaction.commandName,
          error: err instanceof Error ? err.message : String(err),
        });
      });
    });
  }

  private async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    let reply: CommandReply | null;
    try {
      reply = dispatchCommand(this.store, interaction.commandName, () =>
        readLootOptions(interaction),
      );
    } catch (err) {
      this.log.error("Command handler failed", {
        command: interaction.commandName,
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
      reply = { content: MSG_COMMAND_FAILED, ephemeral: true };
    }

    if (reply === null) {
      this.log.warn("Unknown command", { command: interaction.commandName });
      return;
    }

    await interaction.reply(toInteractionReply(reply));
  }

  /**
   * Logs in and starts receiving interactions.
   */
  async start(token: string): Promise<void> {
    await this.client.login(token);
  }

  async stop(): Promise<void> {
    await this.client.destroy();
  }
}
