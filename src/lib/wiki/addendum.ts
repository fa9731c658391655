import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { isBlank } from "../catalog/keys.js";
import { BATTLE_AFFINITIES, USAGE_TYPES, type EntityPatch, type EntityRecord } from "../catalog/types.js";

const addendumRecordSchema = z.object({
  displayName: z.string().nullish(),
  collectionIndex: z.number().int().nullish(),
  series: z.string().nullish(),
  ability: z.string().nullish(),
  battleAffinity: z.enum(BATTLE_AFFINITIES).nullish(),
  usageType: z.enum(USAGE_TYPES).nullish(),
  classRank: z.number().int().min(0).nullish(),
  slotCount: z.number().int().min(0).nullish(),
  battlePower: z.number().int().min(0).nullish(),
  hasBoardBattle: z.boolean().nullish(),
  isInCampaign: z.boolean().nullish(),
  isCampaignReward: z.boolean().nullish(),
});

const addendumSchema = z.record(z.string(), addendumRecordSchema.nullish());

export type AddendumRecord = z.infer<typeof addendumRecordSchema>;

export type AddendumParseResult =
  | { ok: true; records: Map<string, EntityPatch> }
  | { ok: false; error: string };

function present<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

function toEntityPatch(raw: AddendumRecord): EntityPatch {
  const displayName = raw.displayName?.trim();
  return {
    displayName: displayName ? displayName : undefined,
    collectionIndex: present(raw.collectionIndex),
    series: present(raw.series),
    ability: present(raw.ability),
    battleAffinity: present(raw.battleAffinity),
    usageType: present(raw.usageType),
    classRank: present(raw.classRank),
    slotCount: present(raw.slotCount),
    battlePower: present(raw.battlePower),
    hasBoardBattle: present(raw.hasBoardBattle),
    isInCampaign: present(raw.isInCampaign),
    isCampaignReward: present(raw.isCampaignReward),
  };
}

/**
 * Reads an addendum file. The body is either a map of entity name to fields
 * or the same map nested under `records`. JSON and YAML are both accepted.
 */
export function parseAddendum(text: string): AddendumParseResult {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    return { ok: false, error: "Addendum file does not contain a record collection." };
  }

  const body = "records" in raw ? raw.records : raw;
  const parsed = addendumSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ") };
  }

  const records = new Map<string, EntityPatch>();
  for (const [name, value] of Object.entries(parsed.data)) {
    if (isBlank(name)) {
      continue;
    }
    records.set(name.trim(), toEntityPatch(value ?? {}));
  }
  return { ok: true, records };
}

export function serializeAddendum(records: Iterable<EntityRecord>): string {
  const body: Record<string, EntityRecord> = {};
  for (const record of records) {
    body[record.displayName] = record;
  }
  return JSON.stringify({ records: body }, null, 2) + "\n";
}
