import { describe, expect, it } from "vitest";
import {
  countGlyphs,
  isIntegerToken,
  parseFirstInteger,
  splitFields,
  splitPipes,
  splitTagTokens,
  stripRowspan,
} from "../../src/lib/wiki/tokens";

describe("wiki tokens", () => {
  it("splits rows on doubled pipes and template braces", () => {
    expect(splitFields("|1||{{SpiritTableName|Sky Knight}}||Primary")).toEqual([
      "|1",
      "SpiritTableName|Sky Knight",
      "Primary",
    ]);
  });

  it("splits template calls on single pipes", () => {
    expect(splitTagTokens("|{{SpiritType|Grab}}")).toEqual(["SpiritType", "Grab"]);
    expect(splitPipes("|{{SpiritTableName|Ember Fox|link=y}}")).toEqual(["{{SpiritTableName", "Ember Fox", "link=y}}"]);
  });

  it("reads the first digit run with group separators", () => {
    expect(parseFirstInteger("power 12,300 total 5")).toBe(12300);
    expect(parseFirstInteger("#var:n3")).toBe(3);
    expect(parseFirstInteger("no power listed")).toBeUndefined();
  });

  it("counts icons by code point", () => {
    expect(countGlyphs("★★★")).toBe(3);
    expect(countGlyphs("")).toBe(0);
  });

  it("recognizes integer cells", () => {
    expect(isIntegerToken(" 1200 ")).toBe(true);
    expect(isIntegerToken("bg|#DDD")).toBe(false);
  });

  it("strips the rowspan prefix cell", () => {
    expect(stripRowspan('|rowspan="2"|9,500')).toBe("9,500");
    expect(stripRowspan('|rowspan="2"|{{SSBU|Sly Rogue}}')).toBe("{{SSBU|Sly Rogue}}");
    expect(stripRowspan("|3,000")).toBe("|3,000");
    expect(stripRowspan("|rowspan=2")).toBeUndefined();
  });
});
