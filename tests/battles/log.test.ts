import { afterEach, describe, expect, it, vi } from "vitest";
import { createEntry, getLosses, playerSlot, updateLoss } from "../../src/lib/battles/entry";
import { BattleLog, CURRENT_SAVE_VERSION, DEFAULT_PLAYER_NAMES } from "../../src/lib/battles/log";

afterEach(() => {
  vi.restoreAllMocks();
});

const threePlayers = () => new BattleLog({ fileName: "test", playerNames: ["Ann", "Ben", "Cal"] });

describe("BattleLog", () => {
  it("reports new keys and notifies listeners only for them", () => {
    const log = threePlayers();
    const onChange = vi.fn();

    expect(log.addOrUpdate("Sky Knight", createEntry("Spirit"), onChange)).toBe(true);
    expect(log.addOrUpdate("SKY KNIGHT ", createEntry("Boss"), onChange)).toBe(false);

    expect(onChange).toHaveBeenCalledTimes(1);
    expect(onChange).toHaveBeenCalledWith(log);
    expect(log.lastAddedKey).toBe("sky knight");
    expect(log.size).toBe(1);
    expect(log.get("sky knight")?.kind).toBe("Boss");
  });

  it("stores validated copies", () => {
    const log = threePlayers();
    const entry = createEntry("Spirit");
    log.addOrUpdate("Ember Fox", entry);
    updateLoss(entry, playerSlot(0), { value: 5 });

    const stored = log.get("ember fox");
    expect(stored?.perPlayerTally.size).toBe(3);
    expect(stored && getLosses(stored, playerSlot(0))).toBe(0);

    if (stored) {
      updateLoss(stored, playerSlot(1), { value: 2 });
    }
    const again = log.get("ember fox");
    expect(again && getLosses(again, playerSlot(1))).toBe(0);
  });

  it("ignores blank names", () => {
    const log = threePlayers();
    expect(log.addOrUpdate("  ", createEntry("Spirit"))).toBe(false);
    expect(log.get(" ")).toBeUndefined();
    expect(log.size).toBe(0);
  });

  it("warns when removing a missing entry", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = threePlayers();
    const onChange = vi.fn();

    expect(log.remove("Nobody", onChange)).toBe(false);
    expect(warn).toHaveBeenCalledWith("[warn] Failed to remove battle entry [Nobody] from save [test].");
    expect(onChange).not.toHaveBeenCalled();

    log.addOrUpdate("Marx", createEntry("Boss"));
    expect(log.remove("marx", onChange)).toBe(true);
    expect(onChange).toHaveBeenCalledTimes(1);
    expect(log.has("marx")).toBe(false);
  });

  it("keeps the first file name", () => {
    const log = new BattleLog();
    log.fileName = "first";
    log.fileName = "second";
    expect(log.fileName).toBe("first");
  });

  it("restores default players and the save version on validate", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = BattleLog.fromEntries({ saveVersion: 0 }, [["Marx", createEntry("Boss")]]);

    expect(log.validate()).toBe(false);
    expect(log.settings.playerNames).toEqual([...DEFAULT_PLAYER_NAMES]);
    expect(log.saveVersion).toBe(CURRENT_SAVE_VERSION);
    expect(log.get("marx")?.perPlayerTally.size).toBe(3);
    expect(log.validate()).toBe(true);
  });

  it("names players by index", () => {
    const log = threePlayers();
    expect(log.playerName(1)).toBe("Ben");
    expect(log.playerName(3)).toBeUndefined();
    expect(log.isValidPlayer(-1)).toBe(false);
  });

  it("compares logs by content", () => {
    const a = threePlayers();
    const b = threePlayers();
    a.addOrUpdate("Marx", createEntry("Boss"));
    b.addOrUpdate("marx", createEntry("Boss"));
    expect(a.equals(b)).toBe(true);

    const changed = createEntry("Boss");
    changed.winner = 2;
    b.addOrUpdate("marx", changed);
    expect(a.equals(b)).toBe(false);
  });
});
