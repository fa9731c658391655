import { describe, expect, it } from "vitest";
import { createEntry } from "../../src/lib/battles/entry";
import { allPass, commonalityFilter, commonFilter, isCommonalityFilter } from "../../src/lib/stats/filters";
import { formatStatValue, isNearlyEqual } from "../../src/lib/stats/format";

const skyKnight = { displayName: "Sky Knight", battleAffinity: "Attack", usageType: "Primary", ability: "Iron Will" } as const;

describe("commonFilter", () => {
  it("titles criteria in affinity, kind, usage order", () => {
    expect(commonFilter({ usageType: "Master", kind: "Spirit", affinity: "Neutral" }).title).toBe(
      " (Neutral) (Spirit) (Master)",
    );
    expect(commonFilter().title).toBe("");
  });

  it("matches entry kind and record fields", () => {
    const spirit = createEntry("Spirit");
    expect(commonFilter({ kind: "Spirit", affinity: "Attack" }).test(spirit, skyKnight)).toBe(true);
    expect(commonFilter({ kind: "Boss" }).test(spirit, skyKnight)).toBe(false);
    expect(commonFilter({ usageType: "Primary" }).test(spirit, undefined)).toBe(false);
    expect(allPass.test(spirit, undefined)).toBe(true);
  });
});

describe("CommonalityFilter", () => {
  it("passes everything until a key function is set", () => {
    const filter = commonalityFilter(["Iron Will"]);
    const spirit = createEntry("Spirit");

    expect(filter.title).toBe(" (Filtered)");
    expect(isCommonalityFilter(filter)).toBe(true);
    expect(filter.test(spirit, skyKnight)).toBe(true);

    filter.setKeyFunction((_entry, record) => record?.ability);
    expect(filter.test(spirit, skyKnight)).toBe(false);
    expect(filter.test(spirit, undefined)).toBe(true);
  });

  it("applies its common criteria first", () => {
    const filter = commonalityFilter([], { kind: "Boss" });
    expect(filter.title).toBe(" (Boss)");
    expect(filter.test(createEntry("Spirit"), skyKnight)).toBe(false);
    expect(isCommonalityFilter(commonFilter())).toBe(false);
  });
});

describe("formatStatValue", () => {
  it("groups whole numbers and rounds the rest to two places", () => {
    expect(formatStatValue(1234)).toBe("1,234");
    expect(formatStatValue(1.00001)).toBe("1");
    expect(formatStatValue(2.5)).toBe("2.50");
    expect(formatStatValue(0)).toBe("0");
  });

  it("compares within tolerance", () => {
    expect(isNearlyEqual(1, 1.00005)).toBe(true);
    expect(isNearlyEqual(1, 1.001)).toBe(false);
  });
});
