import { existsSync, readFileSync, readdirSync } from "fs";
import path from "path";
import { ADDENDUM_EXAMPLE_FILE, METADATA_FILES, type DataPaths } from "../config.js";
import { describeError, logger } from "../log.js";
import { readTextLines, writeTextFile } from "../storage/documents.js";
import { serializeAddendum } from "./addendum.js";
import { compileCatalog, type AddendumSource, type CompileResult, type SourceText } from "./compile.js";

const ADDENDUM_EXTENSIONS = new Set([".json", ".yaml", ".yml"]);

function readSource(dir: string, fileName: string): SourceText | undefined {
  const filePath = path.join(dir, fileName);
  if (!existsSync(filePath)) {
    logger.error(`Unable to find metadata source [${filePath}].`);
    return undefined;
  }
  const lines = readTextLines(filePath);
  return lines ? { name: fileName, lines } : undefined;
}

function readAddenda(dir: string): AddendumSource[] {
  let fileNames: string[];
  try {
    fileNames = readdirSync(dir).filter(
      (name) => name !== ADDENDUM_EXAMPLE_FILE && ADDENDUM_EXTENSIONS.has(path.extname(name).toLowerCase()),
    );
  } catch (error) {
    logger.error(`Unable to list addendum directory [${dir}]: ${describeError(error)}`);
    return [];
  }

  const sources: AddendumSource[] = [];
  for (const name of fileNames.sort()) {
    try {
      sources.push({ name, text: readFileSync(path.join(dir, name), "utf8") });
    } catch (error) {
      logger.error(`Failed to read addendum [${name}]: ${describeError(error)}`);
    }
  }
  return sources;
}

/** Compiles the catalog from the data directory and reports every scan warning. */
export function loadCatalog(paths: DataPaths): CompileResult {
  logger.info(`Compiling entity catalog from [${paths.metadataDir}].`);
  const result = compileCatalog({
    spiritInfo: readSource(paths.metadataDir, METADATA_FILES.spiritInfo),
    spiritBattle: readSource(paths.metadataDir, METADATA_FILES.spiritBattle),
    fighterBattle: readSource(paths.metadataDir, METADATA_FILES.fighterBattle),
    addenda: readAddenda(paths.addendaDir),
  });

  for (const warning of result.warnings) {
    logger.warn(`${warning.source}:${warning.line} ${warning.message}`);
  }
  for (const rejected of result.rejectedAddenda) {
    logger.error(`Addendum [${rejected.name}] is not a record collection: ${rejected.error}`);
  }

  if (!result.addendaChanged) {
    const examplePath = path.join(paths.addendaDir, ADDENDUM_EXAMPLE_FILE);
    if (!existsSync(examplePath)) {
      writeTextFile(examplePath, serializeAddendum([{ displayName: "Mario" }]));
    }
  }

  logger.info(`Catalog holds ${result.catalog.size} entities (${result.warnings.length} warnings).`);
  return result;
}
