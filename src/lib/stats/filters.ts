import type { BattleKind, BattleEntry } from "../battles/entry.js";
import type { BattleAffinity, EntityRecord, UsageType } from "../catalog/types.js";

export interface StatFilter {
  /** Appended to the title of every stat using the filter. */
  readonly title: string;
  test(entry: Readonly<BattleEntry>, record: Readonly<EntityRecord> | undefined): boolean;
}

export interface CommonCriteria {
  kind?: BattleKind;
  affinity?: BattleAffinity;
  usageType?: UsageType;
}

export type CommonalityKeyFunction = (
  entry: Readonly<BattleEntry>,
  record: Readonly<EntityRecord> | undefined,
) => string | undefined;

export const allPass: StatFilter = {
  title: "",
  test: () => true,
};

function criteriaTitle(criteria: CommonCriteria): string {
  return [criteria.affinity, criteria.kind, criteria.usageType]
    .filter((part): part is NonNullable<typeof part> => part !== undefined)
    .map((part) => ` (${part})`)
    .join("");
}

function matchesCriteria(
  criteria: CommonCriteria,
  entry: Readonly<BattleEntry>,
  record: Readonly<EntityRecord> | undefined,
): boolean {
  if (criteria.kind !== undefined && criteria.kind !== entry.kind) {
    return false;
  }
  if (criteria.affinity !== undefined && criteria.affinity !== record?.battleAffinity) {
    return false;
  }
  if (criteria.usageType !== undefined && criteria.usageType !== record?.usageType) {
    return false;
  }
  return true;
}

export function commonFilter(criteria: CommonCriteria = {}): StatFilter {
  return {
    title: criteriaTitle(criteria),
    test: (entry, record) => matchesCriteria(criteria, entry, record),
  };
}

/**
 * Common criteria plus an exclusion list over the owning stat's commonality
 * key. The key function is wired in by the stat after construction; until
 * then nothing is excluded.
 */
export class CommonalityFilter implements StatFilter {
  readonly title: string;
  readonly #criteria: CommonCriteria;
  readonly #exclusions: ReadonlySet<string>;
  #keyFunction: CommonalityKeyFunction | undefined;

  constructor(exclusions: Iterable<string> = [], criteria: CommonCriteria = {}) {
    this.#criteria = { ...criteria };
    this.#exclusions = new Set(exclusions);
    this.title = criteriaTitle(criteria) + (this.#exclusions.size > 0 ? " (Filtered)" : "");
  }

  get exclusions(): ReadonlySet<string> {
    return this.#exclusions;
  }

  setKeyFunction(keyFunction: CommonalityKeyFunction): void {
    this.#keyFunction = keyFunction;
  }

  test(entry: Readonly<BattleEntry>, record: Readonly<EntityRecord> | undefined): boolean {
    if (!matchesCriteria(this.#criteria, entry, record)) {
      return false;
    }
    if (!this.#keyFunction) {
      return true;
    }
    const key = this.#keyFunction(entry, record);
    return key === undefined || !this.#exclusions.has(key);
  }
}

export function commonalityFilter(exclusions: Iterable<string> = [], criteria: CommonCriteria = {}): CommonalityFilter {
  return new CommonalityFilter(exclusions, criteria);
}

export function isCommonalityFilter(filter: StatFilter | undefined): filter is CommonalityFilter {
  return filter instanceof CommonalityFilter;
}
