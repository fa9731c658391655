import { playerSlot, SHARED_SLOT, type BattleEntry, type PlayerSlot } from "../battles/entry.js";
import type { BattleLog } from "../battles/log.js";
import type { EntityCatalog } from "../catalog/catalog.js";
import type { EntityRecord } from "../catalog/types.js";
import { describeError, logger } from "../log.js";
import type { StatFilter } from "./filters.js";

/** Comparison stats fold once per player, Single stats once into the shared slot. */
export type DisplayMode = "Comparison" | "Single";

export interface StatResult {
  readonly value: number;
  readonly text: string;
}

export interface FoldContext {
  slot: PlayerSlot;
  /** Catalog display name when the entity is known, else the log key. */
  name: string;
  key: string;
  entry: Readonly<BattleEntry>;
  record: Readonly<EntityRecord> | undefined;
  playerCount: number;
}

export interface StatDefinition<TAcc> {
  readonly title: string;
  readonly displayMode: DisplayMode;
  readonly isHighestValueBest: boolean;
  readonly filter?: StatFilter;
  /** Section headings in a stat list. */
  readonly isDivider?: boolean;
  createAccumulator(): TAcc;
  isApplicable(entry: Readonly<BattleEntry>, record: Readonly<EntityRecord> | undefined): boolean;
  fold(accumulator: TAcc, context: FoldContext): void;
  finalize(accumulator: TAcc): StatResult;
}

export type AnyStatDefinition = StatDefinition<unknown>;

export interface StatTally {
  readonly title: string;
  readonly displayMode: DisplayMode;
  readonly isHighestValueBest: boolean;
  readonly players: readonly StatResult[];
  readonly shared: StatResult;
}

export const EMPTY_RESULT: StatResult = Object.freeze({ value: 0, text: "" });

export function isEntryApplicable<TAcc>(
  stat: StatDefinition<TAcc>,
  entry: Readonly<BattleEntry>,
  record: Readonly<EntityRecord> | undefined,
): boolean {
  return (stat.filter?.test(entry, record) ?? true) && stat.isApplicable(entry, record);
}

/**
 * Runs one stat over the whole log. Neither the log nor the catalog is
 * modified. An entry that throws while folding is skipped with a warning.
 */
export function tallyStat<TAcc>(stat: StatDefinition<TAcc>, log: BattleLog, catalog: EntityCatalog): StatTally {
  const playerCount = log.playerCount;
  const playerAccumulators = Array.from({ length: playerCount }, () => stat.createAccumulator());
  const sharedAccumulator = stat.createAccumulator();

  log.forEach((key, entry) => {
    const record = catalog.lookup(key);
    try {
      if (!isEntryApplicable(stat, entry, record)) {
        return;
      }
      const base = { key, entry, record, playerCount, name: record?.displayName ?? key };
      if (stat.displayMode === "Single") {
        stat.fold(sharedAccumulator, { ...base, slot: SHARED_SLOT });
        return;
      }
      playerAccumulators.forEach((accumulator, index) => {
        stat.fold(accumulator, { ...base, slot: playerSlot(index) });
      });
    } catch (error) {
      logger.warn(`Skipped [${key}] while tallying [${stat.title}]: ${describeError(error)}`);
    }
  });

  return Object.freeze({
    title: stat.title,
    displayMode: stat.displayMode,
    isHighestValueBest: stat.isHighestValueBest,
    players: Object.freeze(playerAccumulators.map((accumulator) => Object.freeze(stat.finalize(accumulator)))),
    shared: Object.freeze(stat.finalize(sharedAccumulator)),
  });
}

export function resultFor(tally: StatTally, slot: PlayerSlot): StatResult {
  if (slot.kind === "shared") {
    return tally.shared;
  }
  return tally.players[slot.index] ?? EMPTY_RESULT;
}
