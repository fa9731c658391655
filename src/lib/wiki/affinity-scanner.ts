import type { BattleAffinity, EntityRecord } from "../catalog/types.js";
import type { ScanResult } from "./info-scanner.js";
import {
  isBlankLine,
  parseFirstInteger,
  splitPipes,
  splitTagTokens,
  stripRowspan,
  type ScanContext,
  type ScanWarning,
} from "./tokens.js";

export interface RecordLookup {
  lookup(name: string): Readonly<EntityRecord> | undefined;
}

type ScanState = "seekIcon" | "seekName" | "seekAffinity" | "seekPower";

interface PendingEntity {
  displayName: string;
  battleAffinity?: BattleAffinity;
}

type NameResolution = { entity: PendingEntity } | { warning: string } | undefined;

interface BattleVariant {
  label: string;
  requiresIcon: boolean;
  resolveName(line: string): NameResolution;
  commit(entity: PendingEntity, affinity: BattleAffinity, power: number): EntityRecord;
}

const ICON_MARKER = "File:";
const SPIRIT_NAME_MARKER = "SpiritTableName|";
const FIGHTER_NAME_MARKER = "SSBU|";
const AFFINITY_MARKER = "SpiritType|";

const AFFINITY_TAGS: Readonly<Record<string, BattleAffinity>> = {
  Neutral: "Neutral",
  Attack: "Attack",
  Shield: "Shield",
  Grab: "Grab",
};

function scanBattles(lines: readonly string[], context: ScanContext, variant: BattleVariant): ScanResult {
  const records: EntityRecord[] = [];
  const warnings: ScanWarning[] = [];
  const initial: ScanState = variant.requiresIcon ? "seekIcon" : "seekName";

  let state: ScanState = initial;
  let pending: PendingEntity | undefined;
  let affinity: BattleAffinity | undefined;

  const warn = (line: number, message: string) => warnings.push({ source: context.source, line, message });
  const reset = () => {
    state = initial;
    pending = undefined;
    affinity = undefined;
  };

  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    if (isBlankLine(rawLine)) {
      return;
    }
    if (state === "seekIcon") {
      if (rawLine.includes(ICON_MARKER)) {
        state = "seekName";
      }
      return;
    }

    const line = stripRowspan(rawLine);
    if (line === undefined) {
      warn(lineNumber, "Cannot split the rowspan cell out of the line.");
      return;
    }

    switch (state) {
      case "seekName": {
        const resolution = variant.resolveName(line);
        if (!resolution) {
          return;
        }
        if ("warning" in resolution) {
          warn(lineNumber, resolution.warning);
          if (variant.requiresIcon) {
            reset();
          }
          return;
        }
        pending = resolution.entity;
        affinity = pending.battleAffinity;
        state = affinity ? "seekPower" : "seekAffinity";
        return;
      }
      case "seekAffinity": {
        if (!line.includes(AFFINITY_MARKER)) {
          return;
        }
        const tokens = splitTagTokens(line);
        const name = pending?.displayName ?? "";
        if (tokens.length < 2) {
          warn(lineNumber, `${variant.label} [${name}] has no affinity value.`);
          reset();
          return;
        }
        affinity = AFFINITY_TAGS[tokens[1]];
        if (!affinity) {
          warn(lineNumber, `${variant.label} [${name}] has an invalid affinity [${tokens[1]}].`);
          reset();
          return;
        }
        state = "seekPower";
        return;
      }
      case "seekPower": {
        const power = parseFirstInteger(line);
        if (pending && affinity && power !== undefined) {
          records.push(variant.commit(pending, affinity, power));
        } else {
          warn(lineNumber, `${variant.label} [${pending?.displayName ?? ""}] has no battle power after its affinity.`);
        }
        reset();
        return;
      }
    }
  });

  return { records, warnings };
}

/**
 * Reads the per-series spirit battle tables. Every name must already be in
 * the catalog; records that already carry an affinity only pick up a power.
 */
export function scanSpiritBattles(lines: readonly string[], catalog: RecordLookup, context: ScanContext): ScanResult {
  return scanBattles(lines, context, {
    label: "Spirit",
    requiresIcon: false,
    resolveName(line) {
      if (!line.includes(SPIRIT_NAME_MARKER)) {
        return undefined;
      }
      const tokens = splitPipes(line);
      if (tokens.length < 2) {
        return undefined;
      }
      const name = tokens[1];
      const existing = catalog.lookup(name);
      if (!existing) {
        return { warning: `Found [${name}] in battle data, but the catalog has no entry for it.` };
      }
      return { entity: { displayName: existing.displayName, battleAffinity: existing.battleAffinity } };
    },
    commit(entity, affinity, power) {
      return { displayName: entity.displayName, battleAffinity: affinity, battlePower: power };
    },
  });
}

/** Reads the fighter battle grid. Each entry starts at its icon line. */
export function scanFighterBattles(lines: readonly string[], context: ScanContext): ScanResult {
  return scanBattles(lines, context, {
    label: "Fighter",
    requiresIcon: true,
    resolveName(line) {
      if (!line.includes(FIGHTER_NAME_MARKER)) {
        return undefined;
      }
      const tokens = splitTagTokens(line);
      if (tokens.length < 2) {
        return undefined;
      }
      const name = tokens[1].trim();
      return name ? { entity: { displayName: name } } : { warning: "Found a fighter name tag without a name." };
    },
    commit(entity, affinity, power) {
      return {
        displayName: entity.displayName,
        battleAffinity: affinity,
        battlePower: power,
        usageType: "Fighter",
        hasBoardBattle: false,
        isInCampaign: true,
        isCampaignReward: false,
      };
    },
  });
}
