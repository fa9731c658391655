import { isBlank } from "./keys.js";
import type { EntityPatch, EntityRecord } from "./types.js";

/**
 * `override` copies every field set on the incoming record. `fill` only
 * writes fields the base record has not resolved yet.
 */
export type MergeMode = "override" | "fill";

type FieldKey = Exclude<keyof EntityRecord, "displayName">;

const MERGED_FIELDS = [
  "collectionIndex",
  "series",
  "ability",
  "battleAffinity",
  "usageType",
  "classRank",
  "slotCount",
  "battlePower",
  "hasBoardBattle",
  "isInCampaign",
  "isCampaignReward",
] as const satisfies readonly FieldKey[];

function isSet(value: string | number | boolean | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  return typeof value === "string" ? !isBlank(value) : true;
}

function copyField<K extends FieldKey>(
  base: Omit<EntityRecord, "displayName">,
  incoming: Readonly<Omit<EntityRecord, "displayName">>,
  field: K,
  mode: MergeMode,
): boolean {
  const value = incoming[field];
  if (!isSet(value)) {
    return false;
  }
  if (mode === "fill" && isSet(base[field])) {
    return false;
  }
  if (base[field] === value) {
    return false;
  }
  base[field] = value;
  return true;
}

function copyDisplayName(base: EntityRecord, displayName: string | undefined, mode: MergeMode): boolean {
  if (displayName === undefined || isBlank(displayName)) {
    return false;
  }
  if ((mode === "fill" && !isBlank(base.displayName)) || base.displayName === displayName) {
    return false;
  }
  base.displayName = displayName;
  return true;
}

/**
 * Field-level merge of `incoming` into `base`. Returns whether `base` changed.
 * A patch without a display name keeps the label `base` already has.
 */
export function appendRecord(
  base: EntityRecord,
  incoming: Readonly<EntityPatch>,
  mode: MergeMode = "override",
): boolean {
  let changed = copyDisplayName(base, incoming.displayName, mode);
  for (const field of MERGED_FIELDS) {
    if (copyField(base, incoming, field, mode)) {
      changed = true;
    }
  }
  return changed;
}
