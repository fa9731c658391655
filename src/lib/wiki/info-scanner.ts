import type { EntityRecord, UsageType } from "../catalog/types.js";
import {
  countGlyphs,
  isBlankLine,
  isIntegerToken,
  parseFirstInteger,
  splitFields,
  type ScanContext,
  type ScanWarning,
} from "./tokens.js";

export interface ScanResult {
  records: EntityRecord[];
  warnings: ScanWarning[];
}

export type InfoParseResult =
  | { status: "rejected"; warning?: string }
  | { status: "complete"; record: EntityRecord }
  | { status: "partial"; record: EntityRecord; warning: string };

const FIELD_SEPARATOR = "||";
const BATTLE_MARKER = "y|12";
const NO_BATTLE_MARKER = "n|12";
const VAR_YES = "#var:y";
const VAR_NO = "#var:n";
const SHARED_FIELD_COUNT = 8;

const USAGE_TAGS: Readonly<Record<string, UsageType>> = {
  Primary: "Primary",
  Support: "Support",
  Master: "Master",
};

function isFillerToken(token: string): boolean {
  return isBlankLine(token) || isIntegerToken(token) || token.includes("#DDD") || token.includes("colspan");
}

function readDisplayName(raw: string): string {
  const pipeIndex = raw.indexOf("|");
  return (pipeIndex >= 0 ? raw.slice(pipeIndex + 1) : raw).trim();
}

/**
 * Reads one row of the complete spirit list. Rows are positional:
 *
 * 0 ordinal, 1 name, 2 usage type, 3 series, 4 has-battle marker,
 * 5 class rank stars, 6 affinity (ignored), 7 slot icons, then a run of
 * stat and filler cells before the ability and the obtain-method cells.
 */
export function parseInfoFields(fields: readonly string[]): InfoParseResult {
  if (fields.length < SHARED_FIELD_COUNT) {
    return { status: "rejected" };
  }

  let cursor = 0;
  const ordinal = Number.parseInt(fields[cursor++].replace(/\D/g, ""), 10);
  const record: EntityRecord = {
    displayName: readDisplayName(fields[cursor++]),
    collectionIndex: Number.isFinite(ordinal) ? ordinal : 0,
  };

  const usageTag = fields[cursor++];
  if (usageTag === "Fighter") {
    return { status: "rejected" };
  }
  const usageType = USAGE_TAGS[usageTag];
  if (!usageType) {
    return { status: "rejected", warning: `Cannot parse usage type [${usageTag}] for [${record.displayName}].` };
  }
  record.usageType = usageType;

  const series = fields[cursor++];
  if (series.includes("rollover")) {
    // A few entries carry a three-cell placeholder instead of a series.
    if (fields.length <= 9) {
      return {
        status: "rejected",
        warning: `Found rollover series cells for [${record.displayName}] without enough cells after them.`,
      };
    }
    cursor += 2;
  } else {
    record.series = series;
  }

  if (!fields[cursor++].includes(BATTLE_MARKER)) {
    return { status: "rejected" };
  }
  if (usageType === "Master") {
    return { status: "complete", record };
  }

  record.classRank = countGlyphs(fields[cursor++]);
  cursor += 1;
  const slots = fields[cursor++];
  record.slotCount = slots.includes("0") ? 0 : countGlyphs(slots);

  const partial = (warning: string): InfoParseResult => ({
    status: "partial",
    record,
    warning: `[${record.displayName}] ${warning}`,
  });

  while (cursor < fields.length && isFillerToken(fields[cursor])) {
    cursor += 1;
  }
  if (cursor >= fields.length) {
    return partial("has no ability or battle location.");
  }

  record.ability = fields[cursor++];
  if (cursor >= fields.length) {
    return partial("has no battle location.");
  }

  const location = fields[cursor];
  if (location.includes(BATTLE_MARKER)) {
    record.hasBoardBattle = true;
  } else if (location.includes(VAR_YES)) {
    record.hasBoardBattle = true;
    record.isInCampaign = (parseFirstInteger(location) ?? 0) > 1;
  } else if (location.includes(NO_BATTLE_MARKER)) {
    record.hasBoardBattle = false;
  } else if (location.includes(VAR_NO)) {
    record.hasBoardBattle = false;
    if ((parseFirstInteger(location) ?? 0) > 1) {
      record.isInCampaign = false;
    }
  }

  if (record.isInCampaign === undefined) {
    cursor += 1;
    if (cursor >= fields.length) {
      return partial("has no campaign location.");
    }
    const campaign = fields[cursor];
    record.isInCampaign = campaign.includes(BATTLE_MARKER) || campaign.includes(VAR_YES);
  }

  cursor += 1;
  if (!record.isInCampaign || cursor >= fields.length) {
    record.isCampaignReward = false;
    return { status: "complete", record };
  }

  record.isCampaignReward = fields[cursor].includes("chest");
  return { status: "complete", record };
}

export function parseInfoLine(line: string): InfoParseResult {
  return parseInfoFields(splitFields(line));
}

/** Scans the complete spirit list. Lines without a `||` separator are ignored. */
export function scanInfoLines(lines: readonly string[], context: ScanContext): ScanResult {
  const records: EntityRecord[] = [];
  const warnings: ScanWarning[] = [];

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    if (isBlankLine(line) || !line.includes(FIELD_SEPARATOR)) {
      return;
    }
    try {
      const result = parseInfoLine(line);
      if (result.status === "rejected") {
        if (result.warning) {
          warnings.push({ source: context.source, line: lineNumber, message: result.warning });
        }
        return;
      }
      if (result.status === "partial") {
        warnings.push({ source: context.source, line: lineNumber, message: result.warning });
      }
      records.push(result.record);
    } catch (error) {
      warnings.push({
        source: context.source,
        line: lineNumber,
        message: `Unable to parse line: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  });

  return { records, warnings };
}
