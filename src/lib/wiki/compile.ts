import { EntityCatalog } from "../catalog/catalog.js";
import { parseAddendum } from "./addendum.js";
import { scanFighterBattles, scanSpiritBattles } from "./affinity-scanner.js";
import { scanInfoLines, type ScanResult } from "./info-scanner.js";
import type { ScanWarning } from "./tokens.js";

export interface SourceText {
  name: string;
  lines: readonly string[];
}

export interface AddendumSource {
  name: string;
  text: string;
}

export interface CatalogSources {
  spiritInfo?: SourceText;
  spiritBattle?: SourceText;
  fighterBattle?: SourceText;
  addenda?: readonly AddendumSource[];
}

export interface CompileResult {
  catalog: EntityCatalog;
  warnings: ScanWarning[];
  /** Addendum files that could not be read as a record collection. */
  rejectedAddenda: Array<{ name: string; error: string }>;
  /** Whether an addendum changed a record the wiki sources already held. New records do not count. */
  addendaChanged: boolean;
}

function mergeScan(catalog: EntityCatalog, result: ScanResult, warnings: ScanWarning[], fill: boolean): void {
  warnings.push(...result.warnings);
  for (const record of result.records) {
    catalog.mergeRecord(record.displayName, record, fill ? "fill" : "override");
  }
}

/**
 * Builds the catalog from the wiki sources and addenda. Addenda are merged
 * last, in file-name order, and win for every field they set. Abilities are
 * normalized once everything is merged.
 */
export function compileCatalog(sources: CatalogSources): CompileResult {
  const catalog = new EntityCatalog();
  const warnings: ScanWarning[] = [];
  const rejectedAddenda: CompileResult["rejectedAddenda"] = [];

  if (sources.spiritInfo) {
    mergeScan(catalog, scanInfoLines(sources.spiritInfo.lines, { source: sources.spiritInfo.name }), warnings, false);
  }
  if (sources.spiritBattle) {
    const { name, lines } = sources.spiritBattle;
    mergeScan(catalog, scanSpiritBattles(lines, catalog, { source: name }), warnings, true);
  }
  if (sources.fighterBattle) {
    const { name, lines } = sources.fighterBattle;
    mergeScan(catalog, scanFighterBattles(lines, { source: name }), warnings, true);
  }

  let addendaChanged = false;
  const addenda = [...(sources.addenda ?? [])].sort((a, b) => a.name.localeCompare(b.name));
  for (const addendum of addenda) {
    const parsed = parseAddendum(addendum.text);
    if (!parsed.ok) {
      rejectedAddenda.push({ name: addendum.name, error: parsed.error });
      continue;
    }
    for (const [name, record] of parsed.records) {
      const known = catalog.has(name);
      if (catalog.mergeRecord(name, record, "override") && known) {
        addendaChanged = true;
      }
    }
  }

  catalog.validate();
  return { catalog, warnings, rejectedAddenda, addendaChanged };
}
