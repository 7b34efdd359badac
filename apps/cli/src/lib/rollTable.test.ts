import { describe, it, expect } from "vitest";
import * as yaml from "yaml";
import type { ItemView } from "@relicforge/engine";
import { asMarkdown, asYaml, renderRollTable, rollRows, tableCells } from "./rollTable";

function view(name: string, rarity: ItemView["rarity"], sortOrder: number, summary: string): ItemView {
  return { name, rarity, sortOrder, summary, description: "", details: name };
}

const items = [
  view("Zweihander", "rare", 2, "z"),
  view("Club", "common", 0, "c"),
  view("Axe", "common", 0, "a"),
  view("Club", "common", 0, "c")
];

describe("rollRows", () => {
  it("orders by rarity then name and merges repeated results", () => {
    expect(rollRows(items)).toEqual([
      { roll: "1", name: "Axe", rarity: "common", summary: "a" },
      { roll: "2-3", name: "Club", rarity: "common", summary: "c" },
      { roll: "4", name: "Zweihander", rarity: "rare", summary: "z" }
    ]);
  });

  it("keeps one row per face when expanded", () => {
    expect(rollRows(items, false).map((row) => `${row.roll} ${row.name}`)).toEqual([
      "1 Axe",
      "2 Club",
      "3 Club",
      "4 Zweihander"
    ]);
  });

  it("leaves the rarity blank for unranked items", () => {
    expect(rollRows([view("Stick", undefined, 0, "s")])[0].rarity).toBe("");
  });
});

describe("roll table output", () => {
  const rows = rollRows(items);

  it("drops the roll column on request", () => {
    expect(tableCells(rows, { hideRolls: true })[0]).toEqual(["Name", "Rarity", "Summary"]);
    expect(tableCells(rows)[1]).toEqual(["1", "Axe", "common", "a"]);
  });

  it("renders markdown", () => {
    expect(asMarkdown(rows)).toBe(
      [
        "| Roll | Name | Rarity | Summary |",
        "| --- | --- | --- | --- |",
        "| 1 | Axe | common | a |",
        "| 2-3 | Club | common | c |",
        "| 4 | Zweihander | rare | z |"
      ].join("\n")
    );
  });

  it("escapes pipes in markdown cells", () => {
    expect(asMarkdown(rollRows([view("Axe", "common", 0, "a|b")]), { hideRolls: true }).split("\n")[2]).toBe(
      "| Axe | common | a\\|b |"
    );
  });

  it("renders yaml", () => {
    expect(yaml.parse(asYaml(rows, { hideRolls: true }))).toEqual([
      { name: "Axe", rarity: "common", summary: "a" },
      { name: "Club", rarity: "common", summary: "c" },
      { name: "Zweihander", rarity: "rare", summary: "z" }
    ]);
  });

  it("renders text to the requested width", () => {
    expect(renderRollTable(rows, { output: "text", width: 180, hideRolls: true }).split("\n")).toEqual([
      "Name        Rarity  Summary",
      "----------  ------  -------",
      "Axe         common  a",
      "Club        common  c",
      "Zweihander  rare    z"
    ]);
  });
});
