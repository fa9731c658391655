import { readFileSync } from "fs";
import { describe, expect, it } from "vitest";
import { EntityCatalog } from "../../src/lib/catalog/catalog";
import { scanFighterBattles, scanSpiritBattles } from "../../src/lib/wiki/affinity-scanner";

const fixture = (name: string) =>
  readFileSync(new URL(`../fixtures/wiki/${name}`, import.meta.url), "utf8").split(/\r?\n/);

const knownSpirits = () =>
  EntityCatalog.fromRecords([
    { displayName: "Sky Knight" },
    { displayName: "Ember Fox" },
    { displayName: "Moss Golem" },
    { displayName: "Tide Captain" },
  ]);

describe("scanSpiritBattles", () => {
  it("pairs names with affinity and power", () => {
    const result = scanSpiritBattles(fixture("spirit_battle.txt"), knownSpirits(), { source: "spirit_battle.txt" });

    expect(result.records).toEqual([
      { displayName: "Sky Knight", battleAffinity: "Attack", battlePower: 9500 },
      { displayName: "Tide Captain", battleAffinity: "Neutral", battlePower: 12300 },
    ]);
    expect(result.warnings).toEqual([
      { source: "spirit_battle.txt", line: 10, message: "Spirit [Ember Fox] has an invalid affinity [Fire]." },
      {
        source: "spirit_battle.txt",
        line: 13,
        message: "Found [Unknown Bard] in battle data, but the catalog has no entry for it.",
      },
      { source: "spirit_battle.txt", line: 19, message: "Spirit [Moss Golem] has no battle power after its affinity." },
    ]);
  });

  it("goes straight to the power when the affinity is already known", () => {
    const catalog = EntityCatalog.fromRecords([{ displayName: "Sky Knight", battleAffinity: "Shield" }]);
    const result = scanSpiritBattles(["|{{SpiritTableName|sky knight|link=y}}", "|4,000"], catalog, { source: "t" });

    expect(result.records).toEqual([{ displayName: "Sky Knight", battleAffinity: "Shield", battlePower: 4000 }]);
  });

  it("warns when a rowspan cell cannot be split", () => {
    const result = scanSpiritBattles(["|rowspan=2"], knownSpirits(), { source: "t" });
    expect(result.warnings).toEqual([{ source: "t", line: 1, message: "Cannot split the rowspan cell out of the line." }]);
  });
});

describe("scanFighterBattles", () => {
  it("reads fighter entries that start at an icon line", () => {
    const result = scanFighterBattles(fixture("fighter_battle.txt"), { source: "fighter_battle.txt" });
    const fighter = {
      usageType: "Fighter",
      hasBoardBattle: false,
      isInCampaign: true,
      isCampaignReward: false,
    };

    expect(result.warnings).toEqual([]);
    expect(result.records).toEqual([
      { displayName: "Brave Hero", battleAffinity: "Neutral", battlePower: 10000, ...fighter },
      { displayName: "Sly Rogue", battleAffinity: "Grab", battlePower: 9200, ...fighter },
      { displayName: "Sky Knight", battleAffinity: "Attack", battlePower: 11000, ...fighter },
    ]);
  });

  it("ignores names that appear before any icon", () => {
    const result = scanFighterBattles(["|{{SSBU|Early Bird}}", "|{{SpiritType|Grab}}", "|500"], { source: "t" });
    expect(result).toEqual({ records: [], warnings: [] });
  });
});
