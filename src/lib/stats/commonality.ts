export const MAX_LISTED_KEYS = 15;

export interface CommonalityOptions {
  showMostCommon: boolean;
  /** Counts below this are ignored. Clamped to at least 1. */
  minCount: number;
  /** 1 is the most (or least) common distinct count. Clamped to at least 1. */
  rank: number;
}

export interface CommonalityRanking {
  count: number;
  keys: string[];
}

export function normalizeCommonalityOptions(options: CommonalityOptions): CommonalityOptions {
  return {
    showMostCommon: options.showMostCommon,
    minCount: Math.max(Math.trunc(options.minCount), 1),
    rank: Math.max(Math.trunc(options.rank), 1),
  };
}

/**
 * Finds every key whose count sits at the requested distinct-count rank.
 * Ties at that rank are all reported.
 */
export function rankCommonality(
  counts: ReadonlyMap<string, number>,
  options: CommonalityOptions,
): CommonalityRanking | undefined {
  const { showMostCommon, minCount, rank } = normalizeCommonalityOptions(options);
  const sorted = [...counts.entries()].sort((a, b) => a[1] - b[1]);
  if (showMostCommon) {
    sorted.reverse();
  }

  let currentRank = 0;
  let best = showMostCommon ? Number.POSITIVE_INFINITY : Number.NEGATIVE_INFINITY;
  const keys: string[] = [];

  for (const [key, count] of sorted) {
    if (count < minCount) {
      // Walking down from the most common end, everything after is smaller.
      if (showMostCommon) {
        break;
      }
      continue;
    }

    if (currentRank === rank) {
      if (count !== best) {
        break;
      }
      keys.push(key);
      continue;
    }

    if (showMostCommon ? count < best : count > best) {
      best = count;
      currentRank += 1;
      if (currentRank === rank) {
        keys.push(key);
      }
    }
  }

  return keys.length > 0 ? { count: best, keys } : undefined;
}

export function formatCommonality(ranking: CommonalityRanking | undefined): string {
  if (!ranking) {
    return "None";
  }
  const listed = ranking.keys.slice(0, MAX_LISTED_KEYS).join(", ");
  const overflow = ranking.keys.length > MAX_LISTED_KEYS ? ", ..." : "";
  return `(${ranking.count}) ${listed}${overflow}`;
}
