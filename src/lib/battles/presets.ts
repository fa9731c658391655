import { z } from "zod";
import type { EntityCatalog } from "../catalog/catalog.js";
import { hasCampaignBattle } from "../catalog/types.js";
import type { DocumentCodec, Validatable } from "../storage/documents.js";
import { createEntry, type BattleKind } from "./entry.js";
import { BattleLog, DEFAULT_PLAYER_NAMES } from "./log.js";

export const DEFAULT_BOSSES: readonly string[] = [
  "giga bowser",
  "galleom",
  "rathalos",
  "master hand",
  "master hand (light realm)",
  "master hand (final realm)",
  "master hand gauntlet",
  "crazy hand",
  "crazy hand (sacred land)",
  "crazy hand (mysterious dimension)",
  "crazy hand (dracula's castle)",
  "crazy hand (final realm)",
  "ganon",
  "marx",
  "dracula",
  "galeem (light realm)",
  "galeem (final realm)",
  "dharkon (dark realm)",
  "dharkon (final realm)",
  "galeem & dharkon (phase 1)",
  "galeem & dharkon (phase 2)",
  "galeem & dharkon (phase 3)",
];

const creationSettingsSchema = z.object({
  playerNames: z.array(z.string()).nullish(),
  bosses: z.array(z.string()).nullish(),
});

/** Defaults offered when a new save is created. */
export class CreationSettings implements Validatable {
  playerNames: string[];
  bosses: string[] | undefined;

  constructor(playerNames: readonly string[] = [], bosses?: readonly string[]) {
    this.playerNames = [...playerNames];
    this.bosses = bosses ? [...bosses] : undefined;
  }

  validate(): boolean {
    let valid = true;
    if (this.playerNames.length === 0) {
      this.playerNames = [...DEFAULT_PLAYER_NAMES];
      valid = false;
    }
    if (!this.bosses) {
      this.bosses = [...DEFAULT_BOSSES];
      valid = false;
    }
    return valid;
  }
}

export const creationSettingsCodec: DocumentCodec<CreationSettings> = {
  name: "creation settings",
  parse(raw) {
    const parsed = creationSettingsSchema.parse(raw);
    return new CreationSettings(parsed.playerNames ?? [], parsed.bosses ?? undefined);
  },
  serialize(value) {
    return { playerNames: value.playerNames, bosses: value.bosses ?? [] };
  },
  create: () => new CreationSettings(),
};

export const PRESET_NAMES = ["blank", "campaign", "board"] as const;
export type PresetName = (typeof PRESET_NAMES)[number];

export interface PresetOptions {
  fileName: string;
  playerNames: readonly string[];
  bosses?: readonly string[];
}

function createFreshLog(options: PresetOptions): BattleLog {
  return new BattleLog({
    fileName: options.fileName,
    playerNames: options.playerNames.filter((name) => name.trim().length > 0),
  });
}

function addEntries(log: BattleLog, names: Iterable<string>, kind: BattleKind): void {
  for (const name of names) {
    log.addOrUpdate(name, createEntry(kind, log.playerCount));
  }
}

export function createBlankPreset(options: PresetOptions): BattleLog {
  const log = createFreshLog(options);
  addEntries(log, options.bosses ?? [], "Boss");
  return log;
}

/** Bosses, every fighter, and every entity fought in the campaign. */
export function createCampaignPreset(options: PresetOptions, catalog: EntityCatalog): BattleLog {
  const log = createBlankPreset(options);
  catalog.forEach((_key, record) => {
    const isFighter = record.usageType === "Fighter";
    if (isFighter || hasCampaignBattle(record)) {
      log.addOrUpdate(record.displayName, createEntry(isFighter ? "Fighter" : "Spirit", log.playerCount));
    }
  });
  return log;
}

export function createBoardPreset(options: PresetOptions, catalog: EntityCatalog): BattleLog {
  const log = createFreshLog(options);
  catalog.forEach((_key, record) => {
    if (record.hasBoardBattle) {
      log.addOrUpdate(record.displayName, createEntry("Spirit", log.playerCount));
    }
  });
  return log;
}

export function createPreset(preset: PresetName, options: PresetOptions, catalog: EntityCatalog): BattleLog {
  switch (preset) {
    case "blank":
      return createBlankPreset(options);
    case "campaign":
      return createCampaignPreset(options, catalog);
    case "board":
      return createBoardPreset(options, catalog);
  }
}
