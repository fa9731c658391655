import type { BattleLog } from "../battles/log.js";
import { ENHANCED_ABILITY, NONE_ABILITY } from "../catalog/types.js";
import { STATS_PER_PAGE } from "../config.js";
import {
  battlesLost,
  battlesLostUnique,
  battlesTotal,
  battlesUnique,
  battlesWon,
  commonAbility,
  commonSeries,
  divider,
  saviorWins,
  soloWins,
  toughestBattle,
  wonBattlePower,
  wonClassRank,
} from "./definitions.js";
import type { AnyStatDefinition, StatTally } from "./engine.js";
import { commonalityFilter, commonFilter } from "./filters.js";
import { isNearlyEqual } from "./format.js";

const COMMONALITY_RANKS = [1, 2, 3];
const TOUGHEST_RANKS = [1, 2, 3, 4, 5];

/** The default stat board, in display order. */
export function createDisplayedStats(): AnyStatDefinition[] {
  const stats: AnyStatDefinition[] = [
    divider("Overview"),
    battlesTotal(),
    battlesUnique(),
    battlesWon(),
    battlesWon(true),
    soloWins(),
    soloWins(true),
    battlesLost(),
    battlesLostUnique(),
    saviorWins(1),
    saviorWins(2),
    saviorWins(1, true),

    divider("Battle Types"),
    battlesWon(false, commonFilter({ kind: "Spirit" })),
    battlesWon(false, commonFilter({ kind: "Fighter" })),
    battlesWon(false, commonFilter({ kind: "Boss" })),
    battlesLost(commonFilter({ kind: "Boss" })),
    battlesWon(false, commonFilter({ affinity: "Neutral" })),
    battlesWon(false, commonFilter({ affinity: "Attack" })),
    battlesWon(false, commonFilter({ affinity: "Shield" })),
    battlesWon(false, commonFilter({ affinity: "Grab" })),
    battlesWon(false, commonFilter({ usageType: "Primary" })),
    battlesWon(false, commonFilter({ usageType: "Support" })),

    divider("Power"),
    wonBattlePower(true),
    wonBattlePower(false),
    wonClassRank(true),
    wonClassRank(false),

    divider("Commonality"),
  ];

  for (const rank of COMMONALITY_RANKS) {
    stats.push(commonSeries({ showMostCommon: true, minCount: 1, rank }));
  }
  stats.push(commonSeries({ showMostCommon: false, minCount: 1, rank: 1 }));
  for (const rank of COMMONALITY_RANKS) {
    stats.push(
      commonAbility(
        { showMostCommon: true, minCount: 1, rank },
        commonalityFilter([NONE_ABILITY, ENHANCED_ABILITY]),
      ),
    );
  }

  stats.push(divider("Toughest Battles"));
  for (const rank of TOUGHEST_RANKS) {
    stats.push(toughestBattle("Comparison", rank));
  }
  for (const rank of TOUGHEST_RANKS) {
    stats.push(toughestBattle("Single", rank));
  }
  return stats;
}

export function pageCount(total: number, perPage = STATS_PER_PAGE): number {
  return Math.ceil(total / Math.max(perPage, 1));
}

/** Zero-based page of the stat list. Out-of-range pages are empty. */
export function statPage<T>(stats: readonly T[], page: number, perPage = STATS_PER_PAGE): T[] {
  const size = Math.max(perPage, 1);
  if (page < 0) {
    return [];
  }
  return stats.slice(page * size, page * size + size);
}

/**
 * Indices of the players holding the best value. When every player ties,
 * nobody stands out and the list is empty.
 */
export function bestPlayers(tally: StatTally, playerCount = tally.players.length): number[] {
  let best = tally.isHighestValueBest ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  let indices: number[] = [];

  for (let index = 0; index < Math.min(playerCount, tally.players.length); index += 1) {
    const { value } = tally.players[index];
    if (isNearlyEqual(best, value)) {
      indices.push(index);
    } else if (tally.isHighestValueBest ? value > best : value < best) {
      indices = [index];
      best = value;
    }
  }

  return indices.length < playerCount ? indices : [];
}

export function formatResultMessage(tally: StatTally, log: BattleLog): string {
  if (tally.displayMode === "Single") {
    return tally.shared.text;
  }
  return tally.players
    .map((result, index) => `[${log.playerName(index) ?? `Player ${index + 1}`}]: ${result.text}`)
    .join("\n\n");
}
