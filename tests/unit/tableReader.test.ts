/**
 * Unit tests for the tabular reader
 *
 * Parses CSV text in memory; file access is covered by one temp-dir case.
 */

import { describe, it, expect, afterEach } from "vitest";
import { DataUnavailableError, parseTable, readTable } from "@/catalog";
import { createTempTables, type TempTablesHarness } from "../helpers/tempTables";

describe("parseTable", () => {
  it("should key rows by header columns in file order", () => {
    const rows = parseTable("item_id,rarity\n2,Rare\n1,Common\n", "loot.csv");

    expect(rows).toEqual([
      { item_id: "2", rarity: "Rare" },
      { item_id: "1", rarity: "Common" },
    ]);
  });

  it("should ignore a leading byte-order marker", () => {
    const rows = parseTable("\uFEFFitem_id,rarity\n1,Rare\n", "loot.csv");

    expect(Object.keys(rows[0])).toEqual(["item_id", "rarity"]);
  });

  it("should keep quoted commas inside a cell", () => {
    const rows = parseTable('item_id,tags\n1,"cursed, fire"\n', "base.csv");

    expect(rows[0].tags).toBe("cursed, fire");
  });

  it("should skip blank lines and keep duplicates", () => {
    const rows = parseTable("item_id,rarity\n\n1,Rare\n\n1,Rare\n", "loot.csv");

    expect(rows).toHaveLength(2);
  });

  it("should key short rows by every header column", () => {
    const rows = parseTable(
      "item_id,name,category,subtype\n1,Cloak,Armor\n2,Ring,Wondrous Item,Ring\n",
      "base.csv",
    );

    expect(rows).toEqual([
      { item_id: "1", name: "Cloak", category: "Armor", subtype: "" },
      { item_id: "2", name: "Ring", category: "Wondrous Item", subtype: "Ring" },
    ]);
  });

  it("should drop cells beyond the header", () => {
    const rows = parseTable("item_id,rarity\n1,Rare,extra\n", "loot.csv");

    expect(rows).toEqual([{ item_id: "1", rarity: "Rare" }]);
  });

  it("should treat whitespace-only content as having no header", () => {
    expect(() => parseTable("   \n", "loot.csv")).toThrow(
      "CSV file has no header row: loot.csv",
    );
  });

  it("should not trim cells", () => {
    const rows = parseTable("item_id,name\n1, Cloak \n", "base.csv");

    expect(rows[0].name).toBe(" Cloak ");
  });

  it("should return no rows for a header-only table", () => {
    expect(parseTable("item_id,rarity\n", "loot.csv")).toEqual([]);
  });

  it("should reject empty content as having no header", () => {
    expect(() => parseTable("", "loot.csv")).toThrow(DataUnavailableError);
    expect(() => parseTable("\uFEFF\n\n", "loot.csv")).toThrow(
      "CSV file has no header row: loot.csv",
    );
  });

  it("should report malformed CSV as unavailable data", () => {
    expect(() => parseTable('item_id,name\n1,"Cloak\n', "base.csv")).toThrow(
      /CSV file could not be parsed: base\.csv/,
    );
  });
});

describe("readTable", () => {
  let tables: TempTablesHarness;

  afterEach(() => {
    tables.cleanup();
  });

  it("should read a table from disk", () => {
    tables = createTempTables({ base: "base_basic.csv", loot: "loot_basic.csv" });

    expect(readTable(tables.paths.lootPath)).toEqual([
      { item_id: "1", rarity: "Rare" },
      { item_id: "2", rarity: "Legendary" },
    ]);
  });

  it("should fail with DataUnavailableError for a missing file", () => {
    tables = createTempTables({ base: "base_basic.csv", loot: "loot_basic.csv" });
    tables.remove("loot");

    expect(() => readTable(tables.paths.lootPath)).toThrow(
      `Missing required file: ${tables.paths.lootPath}`,
    );
  });
});
