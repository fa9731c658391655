export const BATTLE_AFFINITIES = ["None", "Neutral", "Attack", "Shield", "Grab"] as const;
export type BattleAffinity = (typeof BATTLE_AFFINITIES)[number];

export const USAGE_TYPES = ["None", "Fighter", "Primary", "Support", "Master"] as const;
export type UsageType = (typeof USAGE_TYPES)[number];

export interface EntityRecord {
  displayName: string;
  collectionIndex?: number;
  series?: string;
  ability?: string;
  battleAffinity?: BattleAffinity;
  usageType?: UsageType;
  classRank?: number;
  slotCount?: number;
  battlePower?: number;
  hasBoardBattle?: boolean;
  isInCampaign?: boolean;
  isCampaignReward?: boolean;
}

/** A record as read from an addendum, where even the display name may be left out. */
export type EntityPatch = Partial<EntityRecord>;

export const NONE_ABILITY = "None";
export const ENHANCED_ABILITY = "Enhanced";

const NONE_ABILITY_ALIASES = new Set(["None", "[None]", "N/A", "No Effect"]);

export function normalizeAbilityText(ability: string): string {
  if (NONE_ABILITY_ALIASES.has(ability)) {
    return NONE_ABILITY;
  }
  if (ability.includes("Can Be Enhanced")) {
    return ENHANCED_ABILITY;
  }
  return ability;
}

/** Returns true when the record was already normalized. */
export function normalizeRecord(record: EntityRecord): boolean {
  if (record.ability === undefined) {
    return true;
  }
  const normalized = normalizeAbilityText(record.ability);
  if (normalized === record.ability) {
    return true;
  }
  record.ability = normalized;
  return false;
}

export function hasCampaignBattle(record: Readonly<EntityRecord>): boolean {
  return (record.isInCampaign ?? false) && !(record.isCampaignReward ?? false);
}

export function isBattleAffinity(value: string): value is BattleAffinity {
  return (BATTLE_AFFINITIES as readonly string[]).includes(value);
}

export function isUsageType(value: string): value is UsageType {
  return (USAGE_TYPES as readonly string[]).includes(value);
}
