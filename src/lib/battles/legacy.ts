import { readFileSync, readdirSync, statSync } from "fs";
import path from "path";
import { z } from "zod";
import { sanitizeKey } from "../catalog/keys.js";
import { LEGACY_SAVE_PREFIX } from "../config.js";
import { describeError, logger } from "../log.js";
import { saveDisplayName, writeSave } from "../storage/saves.js";
import { BATTLE_KINDS, createEntry, playerSlot, SHARED_SLOT, updateLoss, type BattleKind } from "./entry.js";
import { BattleLog } from "./log.js";

/** Pre-release saves tracked exactly three players, keyed by initial. */
const LEGACY_PLAYER_COUNT = 3;
const LEGACY_INITIALS = ["M", "S", "P"] as const;

const legacyKindSchema = z.union([
  z.number().int().min(0).max(BATTLE_KINDS.length - 1).transform((index): BattleKind => BATTLE_KINDS[index]),
  z.enum(BATTLE_KINDS),
]);

const legacyEntrySchema = z.object({
  Type: legacyKindSchema.default("Spirit"),
  WinningPlayer: z.number().int().default(0),
  bSharedBattle: z.boolean().default(false),
  PlayerLosses: z.record(z.string(), z.number().int()).nullish(),
});

const legacyV0Schema = z.object({
  _saveVersion: z.number().int().default(0),
  LastAddedBattle: z.string().nullish(),
  BattleStats: z.record(z.string(), legacyEntrySchema).nullable(),
});

export type LegacyV0Document = z.infer<typeof legacyV0Schema>;

function playerIndexForLossKey(key: string): number | undefined {
  const index = LEGACY_INITIALS.findIndex((initial) => key.startsWith(initial));
  return index >= 0 ? index : undefined;
}

function convertLosses(raw: Record<string, number> | null | undefined): Map<number, number> {
  const losses = new Map<number, number>();
  for (const [key, value] of Object.entries(raw ?? {})) {
    const index = playerIndexForLossKey(key);
    if (index !== undefined) {
      losses.set(index, value);
    }
  }
  return losses;
}

function convertV0(document: LegacyV0Document): BattleLog {
  const playerNames = Array.from({ length: LEGACY_PLAYER_COUNT }, (_, index) => `Player ${index + 1}`);
  const log = new BattleLog({ playerNames });

  for (const [name, legacy] of Object.entries(document.BattleStats ?? {})) {
    const entry = createEntry(legacy.Type, LEGACY_PLAYER_COUNT);
    entry.isShared = legacy.bSharedBattle;
    // Winner 0 meant nobody; players were numbered from 1.
    entry.winner = legacy.WinningPlayer > 0 ? legacy.WinningPlayer - 1 : null;

    const losses = convertLosses(legacy.PlayerLosses);
    let highest = 0;
    for (let index = 0; index < LEGACY_PLAYER_COUNT; index += 1) {
      const count = losses.get(index) ?? 0;
      updateLoss(entry, playerSlot(index), { value: entry.isShared ? 0 : count });
      highest = Math.max(highest, count);
    }
    if (entry.isShared) {
      updateLoss(entry, SHARED_SLOT, { value: highest });
    }

    log.addOrUpdate(name, entry);
  }

  log.lastAddedKey = sanitizeKey(document.LastAddedBattle ?? "");
  return log;
}

/**
 * Converts an old save document. Returns null when the document is not in a
 * known legacy format.
 */
export function convertLegacyDocument(raw: unknown): BattleLog | null {
  const parsed = legacyV0Schema.safeParse(raw);
  if (!parsed.success || parsed.data._saveVersion !== 0) {
    return null;
  }
  return convertV0(parsed.data);
}

export interface LegacySweepResult {
  converted: string[];
  skipped: string[];
}

/** Converts every legacy file in `legacyDir` into a `legacy_<name>` save. */
export function convertLegacyDirectory(legacyDir: string, savesDir: string): LegacySweepResult {
  const result: LegacySweepResult = { converted: [], skipped: [] };

  let fileNames: string[];
  try {
    fileNames = readdirSync(legacyDir).sort();
  } catch (error) {
    logger.error(`Unable to read legacy directory [${legacyDir}]: ${describeError(error)}`);
    return result;
  }

  for (const fileName of fileNames) {
    const filePath = path.join(legacyDir, fileName);
    let raw: unknown;
    try {
      if (!statSync(filePath).isFile()) {
        continue;
      }
      raw = JSON.parse(readFileSync(filePath, "utf8"));
    } catch (error) {
      logger.warn(`Skipping legacy file [${fileName}]: ${describeError(error)}`);
      result.skipped.push(fileName);
      continue;
    }

    const log = convertLegacyDocument(raw);
    if (!log) {
      logger.warn(`No legacy converter matches [${fileName}].`);
      result.skipped.push(fileName);
      continue;
    }

    log.fileName = `${LEGACY_SAVE_PREFIX}${saveDisplayName(fileName)}`;
    if (writeSave(savesDir, log)) {
      logger.info(`Converted legacy save [${fileName}] to [${log.fileName}].`);
      result.converted.push(log.fileName);
    } else {
      result.skipped.push(fileName);
    }
  }

  return result;
}
