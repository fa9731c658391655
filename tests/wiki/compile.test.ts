import { copyFileSync, existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolvePaths } from "../../src/lib/config";
import { parseAddendum, serializeAddendum } from "../../src/lib/wiki/addendum";
import { compileCatalog, type CatalogSources } from "../../src/lib/wiki/compile";
import { loadCatalog } from "../../src/lib/wiki/load";

const FIXTURE_DIR = fileURLToPath(new URL("../fixtures/wiki/", import.meta.url));

const source = (name: string) => ({
  name,
  lines: readFileSync(path.join(FIXTURE_DIR, name), "utf8").split(/\r?\n/),
});

const wikiSources = (): CatalogSources => ({
  spiritInfo: source("spirit_info.txt"),
  spiritBattle: source("spirit_battle.txt"),
  fighterBattle: source("fighter_battle.txt"),
});

describe("compileCatalog", () => {
  it("merges the list, spirit battles and fighter battles", () => {
    const { catalog, warnings, addendaChanged } = compileCatalog(wikiSources());

    expect(Object.keys(catalog.toJSON())).toEqual([
      "brave hero",
      "ember fox",
      "lone pilot",
      "moss golem",
      "sky knight",
      "sly rogue",
      "tide captain",
    ]);
    expect(warnings).toHaveLength(4);
    expect(addendaChanged).toBe(false);
  });

  it("keeps the first resolved value when fighter data repeats a spirit", () => {
    const { catalog } = compileCatalog(wikiSources());
    expect(catalog.lookup("Sky Knight")).toMatchObject({
      usageType: "Primary",
      battleAffinity: "Attack",
      battlePower: 9500,
      hasBoardBattle: true,
    });
  });

  it("normalizes abilities after merging", () => {
    const { catalog } = compileCatalog(wikiSources());
    expect(catalog.lookup("moss golem")?.ability).toBe("None");
    expect(catalog.lookup("lone pilot")?.ability).toBe("Enhanced");
    expect(catalog.lookup("ember fox")?.battleAffinity).toBeUndefined();
  });

  it("applies addenda last in file-name order", () => {
    const { catalog, addendaChanged } = compileCatalog({
      ...wikiSources(),
      addenda: [
        { name: "b.yaml", text: "Ember Fox:\n  battlePower: 3500\nNew Spirit:\n  usageType: Support\n  ability: N/A\n" },
        { name: "a.json", text: '{"records": {"Ember Fox": {"battleAffinity": "Attack", "battlePower": 3000}}}' },
      ],
    });

    expect(addendaChanged).toBe(true);
    expect(catalog.lookup("ember fox")).toMatchObject({ battleAffinity: "Attack", battlePower: 3500 });
    expect(catalog.lookup("new spirit")).toMatchObject({ displayName: "New Spirit", usageType: "Support", ability: "None" });
  });

  it("keeps the catalog label when an addendum entry sets no display name", () => {
    const { catalog, addendaChanged } = compileCatalog({
      ...wikiSources(),
      addenda: [{ name: "power.yaml", text: "sky knight:\n  battlePower: 1\n" }],
    });

    expect(addendaChanged).toBe(true);
    expect(catalog.lookup("sky knight")).toMatchObject({ displayName: "Sky Knight", battlePower: 1, usageType: "Primary" });
  });

  it("does not count records that only an addendum knows as changes", () => {
    const { catalog, addendaChanged } = compileCatalog({
      ...wikiSources(),
      addenda: [{ name: "extra.yaml", text: "Marx:\n  battlePower: 15000\n" }],
    });

    expect(addendaChanged).toBe(false);
    expect(catalog.lookup("marx")).toMatchObject({ displayName: "Marx", battlePower: 15000 });
  });

  it("reports addenda that are not record collections", () => {
    const { rejectedAddenda, addendaChanged } = compileCatalog({
      addenda: [
        { name: "worse.yaml", text: "Ember Fox:\n  battleAffinity: Fire\n" },
        { name: "bad.json", text: "[1, 2]" },
      ],
    });

    expect(addendaChanged).toBe(false);
    expect(rejectedAddenda.map((rejected) => rejected.name)).toEqual(["bad.json", "worse.yaml"]);
    expect(rejectedAddenda[0].error).toBe("Addendum file does not contain a record collection.");
  });
});

describe("addendum files", () => {
  it("writes records nested under a records key", () => {
    const text = serializeAddendum([{ displayName: "Mario" }]);
    expect(text).toBe('{\n  "records": {\n    "Mario": {\n      "displayName": "Mario"\n    }\n  }\n}\n');

    const parsed = parseAddendum(text);
    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.records.get("Mario")?.displayName).toBe("Mario");
    }
  });

  it("leaves the display name unset when the entry has none", () => {
    const parsed = parseAddendum("Marx:\n  battlePower: 15000\n  hasBoardBattle: null\n  displayName: '  '\n");
    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.records.get("Marx")).toEqual({ battlePower: 15000 });
      expect(parsed.records.get("Marx")?.displayName).toBeUndefined();
    }
  });
});

describe("loadCatalog", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(os.tmpdir(), "catalog-"));
    const metadataDir = path.join(root, "metadata");
    mkdirSync(metadataDir);
    for (const name of ["spirit_info.txt", "spirit_battle.txt", "fighter_battle.txt"]) {
      copyFileSync(path.join(FIXTURE_DIR, name), path.join(metadataDir, name));
    }
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  it("writes the example addendum when no addendum changed anything", () => {
    const paths = resolvePaths(root);
    const first = loadCatalog(paths);

    expect(first.catalog.size).toBe(7);
    expect(existsSync(path.join(paths.addendaDir, "spirit_addendum_example.json"))).toBe(true);
  });

  it("does not merge the example addendum on later loads", () => {
    const paths = resolvePaths(root);
    loadCatalog(paths);

    const second = loadCatalog(paths);
    expect(second.addendaChanged).toBe(false);
    expect(second.catalog.has("mario")).toBe(false);
    expect(second.catalog.size).toBe(7);
  });

  it("merges other addendum files from the addendum directory", () => {
    const paths = resolvePaths(root);
    mkdirSync(paths.addendaDir, { recursive: true });
    writeFileSync(path.join(paths.addendaDir, "power.yaml"), "Ember Fox:\n  battlePower: 3500\n");

    const { catalog, addendaChanged } = loadCatalog(paths);
    expect(addendaChanged).toBe(true);
    expect(catalog.lookup("ember fox")).toMatchObject({ displayName: "Ember Fox", battlePower: 3500 });
    expect(existsSync(path.join(paths.addendaDir, "spirit_addendum_example.json"))).toBe(false);
  });

  it("logs every scan warning with its source line", () => {
    loadCatalog(resolvePaths(root));
    expect(console.warn).toHaveBeenCalledWith("[warn] spirit_info.txt:11 Cannot parse usage type [Legendary] for [Rune Cat].");
  });

  it("skips a missing metadata file", () => {
    rmSync(path.join(root, "metadata", "fighter_battle.txt"));
    const { catalog } = loadCatalog(resolvePaths(root));
    expect(catalog.has("brave hero")).toBe(false);
    expect(catalog.size).toBe(5);
  });
});
