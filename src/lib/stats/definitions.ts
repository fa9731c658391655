import { getLosses, hasWinner, isWinner, playerSlot, SHARED_SLOT } from "../battles/entry.js";
import { isBlank } from "../catalog/keys.js";
import {
  formatCommonality,
  normalizeCommonalityOptions,
  rankCommonality,
  type CommonalityOptions,
} from "./commonality.js";
import type { DisplayMode, FoldContext, StatDefinition, StatResult } from "./engine.js";
import { isCommonalityFilter, type CommonalityKeyFunction, type StatFilter } from "./filters.js";
import { formatStatValue } from "./format.js";

export interface NumericTally {
  value: number;
  count: number;
}

interface NumericStatOptions {
  title: string;
  filter?: StatFilter;
  displayMode?: DisplayMode;
  isHighestValueBest?: boolean;
  isApplicable?: StatDefinition<NumericTally>["isApplicable"];
  fold(tally: NumericTally, context: FoldContext): void;
  average?: boolean;
}

function withFilterTitle(title: string, filter: StatFilter | undefined): string {
  return title + (filter?.title ?? "");
}

function numericStat(options: NumericStatOptions): StatDefinition<NumericTally> {
  return {
    title: withFilterTitle(options.title, options.filter),
    displayMode: options.displayMode ?? "Comparison",
    isHighestValueBest: options.isHighestValueBest ?? true,
    filter: options.filter,
    createAccumulator: () => ({ value: 0, count: 0 }),
    isApplicable: options.isApplicable ?? (() => true),
    fold: options.fold,
    finalize(tally): StatResult {
      let value = tally.value;
      if (options.average) {
        value = tally.count > 0 ? tally.value / tally.count : 0;
      }
      return { value, text: formatStatValue(value) };
    },
  };
}

function wonBy(context: FoldContext): boolean {
  return isWinner(context.entry, context.slot);
}

function participated(context: FoldContext): boolean {
  return wonBy(context) || context.entry.isShared;
}

export function battlesTotal(filter?: StatFilter): StatDefinition<NumericTally> {
  return numericStat({
    title: "Total Battles",
    filter,
    fold(tally, context) {
      if (participated(context)) {
        tally.value += 1;
      }
      tally.value += getLosses(context.entry, context.slot);
    },
  });
}

export function battlesUnique(filter?: StatFilter): StatDefinition<NumericTally> {
  return numericStat({
    title: "Unique Battles",
    filter,
    fold(tally, context) {
      if (participated(context) || getLosses(context.entry, context.slot) > 0) {
        tally.value += 1;
      }
    },
  });
}

export function battlesWon(firstTry = false, filter?: StatFilter): StatDefinition<NumericTally> {
  return numericStat({
    title: `Battles Won${firstTry ? " First Try" : ""}`,
    filter,
    fold(tally, context) {
      if (!wonBy(context)) {
        return;
      }
      if (firstTry && getLosses(context.entry, context.slot) > 0) {
        return;
      }
      tally.value += 1;
    },
  });
}

/** Wins where no other player lost. First try also requires the winner never lost. */
export function soloWins(firstTry = false, filter?: StatFilter): StatDefinition<NumericTally> {
  return numericStat({
    title: `Battles Won Solo${firstTry ? " First Try" : ""}`,
    filter,
    isApplicable: (entry) => !entry.isShared,
    fold(tally, context) {
      if (!wonBy(context) || context.slot.kind !== "player") {
        return;
      }
      for (let index = 0; index < context.playerCount; index += 1) {
        if (getLosses(context.entry, playerSlot(index)) <= 0) {
          continue;
        }
        if (index !== context.slot.index || firstTry) {
          return;
        }
      }
      tally.value += 1;
    },
  });
}

export function battlesLost(filter?: StatFilter): StatDefinition<NumericTally> {
  return numericStat({
    title: "Total Battles Lost",
    filter,
    isHighestValueBest: false,
    fold(tally, context) {
      tally.value += getLosses(context.entry, context.slot);
    },
  });
}

export function battlesLostUnique(filter?: StatFilter): StatDefinition<NumericTally> {
  return numericStat({
    title: "Unique Battles Lost",
    filter,
    isHighestValueBest: false,
    fold(tally, context) {
      if (getLosses(context.entry, context.slot) > 0) {
        tally.value += 1;
      }
    },
  });
}

/**
 * Wins where every player lost at least `lossesRequired` times first. The
 * first-try variant only lets the winner through with zero losses.
 */
export function saviorWins(lossesRequired: number, firstTry = false, filter?: StatFilter): StatDefinition<NumericTally> {
  const required = Math.max(Math.trunc(lossesRequired), 1);
  return numericStat({
    title: `Savior Wins (${required} ${required > 1 ? "Losses" : "Loss"})${firstTry ? " First Try" : ""}`,
    filter,
    isApplicable: (entry) => !entry.isShared,
    fold(tally, context) {
      if (!wonBy(context) || context.slot.kind !== "player") {
        return;
      }
      for (let index = 0; index < context.playerCount; index += 1) {
        const losses = getLosses(context.entry, playerSlot(index));
        const isSelf = index === context.slot.index;
        if (isSelf && firstTry && losses > 0) {
          return;
        }
        if (losses >= required) {
          continue;
        }
        if (!(isSelf && firstTry && losses <= 0)) {
          return;
        }
      }
      tally.value += 1;
    },
  });
}

export function wonBattlePower(showAverage: boolean, filter?: StatFilter): StatDefinition<NumericTally> {
  return numericStat({
    title: `${showAverage ? "Average" : "Total"} Won Battle Power`,
    filter,
    average: showAverage,
    isApplicable: (_entry, record) => (record?.battlePower ?? 0) > 0,
    fold(tally, context) {
      if (!wonBy(context)) {
        return;
      }
      tally.value += context.record?.battlePower ?? 0;
      tally.count += 1;
    },
  });
}

export function wonClassRank(showAverage: boolean, filter?: StatFilter): StatDefinition<NumericTally> {
  return numericStat({
    title: `${showAverage ? "Average" : "Total"} Won Class Rank`,
    filter,
    average: showAverage,
    isApplicable: (_entry, record) => (record?.classRank ?? 0) > 0,
    fold(tally, context) {
      if (!wonBy(context)) {
        return;
      }
      tally.value += context.record?.classRank ?? 0;
      tally.count += 1;
    },
  });
}

/** Displays an optional heading between groups of stats. Nothing is tallied. */
export function divider(title = ""): StatDefinition<NumericTally> {
  return {
    title,
    displayMode: "Single",
    isHighestValueBest: true,
    isDivider: true,
    createAccumulator: () => ({ value: 0, count: 0 }),
    isApplicable: () => false,
    fold: () => undefined,
    finalize: () => ({ value: 0, text: "" }),
  };
}

export type CommonalityCounts = Map<string, number>;

interface CommonalityStatOptions {
  title: string;
  displayMode?: DisplayMode;
  filter?: StatFilter;
  ranking: CommonalityOptions;
  filterKey?: CommonalityKeyFunction;
  isApplicable?: StatDefinition<CommonalityCounts>["isApplicable"];
  /** Key and increment for one fold, or undefined to count nothing. */
  count(context: FoldContext): { key: string; amount: number } | undefined;
}

function commonalityStat(options: CommonalityStatOptions): StatDefinition<CommonalityCounts> {
  const ranking = normalizeCommonalityOptions(options.ranking);
  if (options.filterKey && isCommonalityFilter(options.filter)) {
    options.filter.setKeyFunction(options.filterKey);
  }
  return {
    title: withFilterTitle(options.title, options.filter),
    displayMode: options.displayMode ?? "Comparison",
    isHighestValueBest: true,
    filter: options.filter,
    createAccumulator: () => new Map<string, number>(),
    isApplicable: options.isApplicable ?? (() => true),
    fold(counts, context) {
      const counted = options.count(context);
      if (!counted) {
        return;
      }
      counts.set(counted.key, (counts.get(counted.key) ?? 0) + counted.amount);
    },
    // Rankings are informational, so the comparison value is always 0.
    finalize: (counts) => ({ value: 0, text: formatCommonality(rankCommonality(counts, ranking)) }),
  };
}

function commonalityTitle(base: string, options: CommonalityOptions): string {
  const { showMostCommon, minCount, rank } = normalizeCommonalityOptions(options);
  return `${showMostCommon ? "Most" : "Least"} ${base} [Rank ${rank}, >= ${minCount}]`;
}

export function commonSeries(options: CommonalityOptions, filter?: StatFilter): StatDefinition<CommonalityCounts> {
  return commonalityStat({
    title: commonalityTitle("Common Series Acquired", options),
    filter,
    ranking: options,
    filterKey: (_entry, record) => record?.series,
    isApplicable: (_entry, record) => !isBlank(record?.series),
    count: (context) =>
      wonBy(context) && context.record?.series ? { key: context.record.series, amount: 1 } : undefined,
  });
}

export function commonAbility(options: CommonalityOptions, filter?: StatFilter): StatDefinition<CommonalityCounts> {
  return commonalityStat({
    title: commonalityTitle("Common Ability Acquired", options),
    filter,
    ranking: options,
    filterKey: (_entry, record) => record?.ability,
    isApplicable: (_entry, record) => !isBlank(record?.ability),
    count: (context) =>
      wonBy(context) && context.record?.ability ? { key: context.record.ability, amount: 1 } : undefined,
  });
}

/**
 * Ranks battles by attempts. Comparison counts each player's losses plus the
 * win; Single counts the whole table's attempts.
 */
export function toughestBattle(
  displayMode: DisplayMode,
  rank: number,
  filter?: StatFilter,
): StatDefinition<CommonalityCounts> {
  const ranking: CommonalityOptions = { showMostCommon: true, minCount: 1, rank };
  const normalizedRank = normalizeCommonalityOptions(ranking).rank;
  return commonalityStat({
    title: `Toughest Battle [Rank ${normalizedRank}${displayMode === "Single" ? ", Shared" : ""}]`,
    displayMode,
    filter,
    ranking,
    count(context) {
      const { entry } = context;
      if (displayMode === "Comparison") {
        return { key: context.name, amount: getLosses(entry, context.slot) + (participated(context) ? 1 : 0) };
      }
      let amount = hasWinner(entry) ? 1 : 0;
      if (entry.isShared) {
        amount += getLosses(entry, SHARED_SLOT);
      } else {
        for (let index = 0; index < context.playerCount; index += 1) {
          amount += getLosses(entry, playerSlot(index));
        }
      }
      return { key: context.name, amount };
    },
  });
}
