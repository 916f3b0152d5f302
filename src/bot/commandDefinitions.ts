/**
 * Slash command definitions registered with the chat platform
 */

import { SlashCommandBuilder } from "discord.js";
import {
  LOOT_COMMAND_NAME,
  LOOT_RELOAD_COMMAND_NAME,
} from "@/constants/commands";
import { RARITY_CHOICES } from "@/constants/query";

export const lootCommand = new SlashCommandBuilder()
  .setName(LOOT_COMMAND_NAME)
  .setDescription("Find loot items with optional filters.")
  .addStringOption((option) =>
    option
      .setName("rarity")
      .setDescription(RARITY_CHOICES.join(", "))
      .addChoices(...RARITY_CHOICES.map((choice) => ({ name: choice, value: choice }))),
  )
  .addStringOption((option) =>
    option
      .setName("category")
      .setDescription("Armor, Weapon, Wondrous Item, etc."),
  )
  .addStringOption((option) =>
    option.setName("subtype").setDescription("Partial subtype match"),
  )
  .addStringOption((option) =>
    option.setName("tag").setDescription("Comma-separated tags"),
  )
  .addIntegerOption((option) =>
    option
      .setName("limit")
      .setDescription("Maximum results to return (default 10)"),
  );

export const lootReloadCommand = new SlashCommandBuilder()
  .setName(LOOT_RELOAD_COMMAND_NAME)
  .setDescription("Reload loot data from CSVs.");

export const commandDefinitions = [lootCommand, lootReloadCommand];
