/**
 * Integration tests for the /loot and /loot_reload handlers
 *
 * Runs the handlers against a store loaded from fixture tables.
 * The chat client is never started.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CatalogStore } from "@/catalog/store";
import { handleLootCommand, handleReloadCommand } from "@/commands";
import { MessageFlags } from "discord.js";
import { dispatchCommand, toInteractionReply } from "@/bot/lootBot";
import { commandDefinitions } from "@/bot/commandDefinitions";
import {
  createTempTables,
  createTestLogger,
  type TempTablesHarness,
} from "../../helpers/tempTables";

describe("loot commands", () => {
  let tables: TempTablesHarness;
  let store: CatalogStore;

  beforeEach(() => {
    tables = createTempTables({ base: "base_tagged.csv", loot: "loot_tagged.csv" });
    store = new CatalogStore(tables.paths, createTestLogger());
    store.reload();
  });

  afterEach(() => {
    tables.cleanup();
  });

  describe("/loot", () => {
    it("should list matches publicly", () => {
      expect(handleLootCommand(store, { tag: "cursed, rare" })).toEqual({
        content: [
          "Found 1 item(s). Showing 1:",
          "• **Hollow Crown** (Wondrous Item — Crown) — Legendary",
        ].join("\n"),
        ephemeral: false,
      });
    });

    it("should cap the listing and report the full total", () => {
      expect(handleLootCommand(store, { limit: 1 }).content).toBe(
        [
          "Found 5 item(s). Showing 1:",
          "• **Hollow Crown** (Wondrous Item — Crown) — Legendary",
        ].join("\n"),
      );
    });

    it("should filter by subtype substring", () => {
      expect(handleLootCommand(store, { subtype: "sword" }).content).toBe(
        [
          "Found 2 item(s). Showing 2:",
          "• **Emberbrand** (Weapon — Long Sword) — Rare",
          "• **Emberbrand** (Weapon — Long Sword) — Very Rare",
        ].join("\n"),
      );
    });

    it("should combine rarity and tag filters", () => {
      expect(
        handleLootCommand(store, { rarity: "Very Rare", tag: "CURSED" }).content,
      ).toBe(
        [
          "Found 1 item(s). Showing 1:",
          "• **Emberbrand** (Weapon — Long Sword) — Very Rare",
        ].join("\n"),
      );
    });

    it("should answer privately when nothing matches", () => {
      expect(handleLootCommand(store, { category: "Potion" })).toEqual({
        content: "No items matched your filters.",
        ephemeral: true,
      });
    });

    it("should reject a zero limit privately", () => {
      expect(handleLootCommand(store, { limit: 0 })).toEqual({
        content: "Limit must be a positive number.",
        ephemeral: true,
      });
    });

    it("should reject tag filters when the data has no tag column", () => {
      tables.useFixture("base", "base_basic.csv");
      tables.useFixture("loot", "loot_basic.csv");
      store.reload();

      expect(handleLootCommand(store, { tag: "cursed" })).toEqual({
        content:
          "Tag filtering is not available because the data has no tags column.",
        ephemeral: true,
      });
    });

    it("should surface the load error while the catalog is failed", () => {
      tables.useFixture("base", "base_basic.csv");
      tables.useFixture("loot", "loot_unresolved.csv");
      store.reload();

      expect(handleLootCommand(store, { rarity: "Rare" })).toEqual({
        content:
          "Loot data is unavailable: Items_loot.csv contains item_id values that do not appear in Items_base.csv: 3",
        ephemeral: true,
      });
    });
  });

  describe("/loot_reload", () => {
    it("should report the reloaded item count", () => {
      expect(handleReloadCommand(store)).toEqual({
        content: "Reloaded 5 items.",
        ephemeral: true,
      });
    });

    it("should report the failure reason", () => {
      tables.remove("loot");

      expect(handleReloadCommand(store)).toEqual({
        content: `Reload failed: Missing required file: ${tables.paths.lootPath}`,
        ephemeral: true,
      });
    });
  });

  describe("dispatchCommand", () => {
    it("should route command names to their handlers", () => {
      const reply = dispatchCommand(store, "loot", () => ({ rarity: "Common" }));

      expect(reply).toEqual({
        content: [
          "Found 1 item(s). Showing 1:",
          "• **Glass Dagger** (Weapon — Dagger) — Common",
        ].join("\n"),
        ephemeral: false,
      });
      expect(dispatchCommand(store, "loot_reload", () => ({}))).toEqual({
        content: "Reloaded 5 items.",
        ephemeral: true,
      });
    });

    it("should ignore commands it does not own", () => {
      expect(dispatchCommand(store, "ping", () => ({}))).toBeNull();
    });
  });

  describe("toInteractionReply", () => {
    it("should flag private replies as ephemeral", () => {
      expect(
        toInteractionReply({ content: "Reloaded 5 items.", ephemeral: true }),
      ).toEqual({ content: "Reloaded 5 items.", flags: MessageFlags.Ephemeral });
    });

    it("should leave public replies without flags", () => {
      expect(
        toInteractionReply({ content: "Found 1 item(s).", ephemeral: false }),
      ).toEqual({ content: "Found 1 item(s).", flags: undefined });
    });
  });

  describe("command definitions", () => {
    it("should declare /loot options and /loot_reload", () => {
      const [loot, reload] = commandDefinitions.map((command) =>
        command.toJSON(),
      );

      expect(loot.name).toBe("loot");
      expect(loot.options?.map((option) => option.name)).toEqual([
        "rarity",
        "category",
        "subtype",
        "tag",
        "limit",
      ]);
      expect(reload.name).toBe("loot_reload");
    });
  });
});
