import { existsSync, mkdirSync, statSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { describeError } from "./log.js";

const ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../");

export const DEFAULT_DATA_DIR = path.join(ROOT, "data");

export const METADATA_FILES = {
  spiritInfo: "spirit_info.txt",
  spiritBattle: "spirit_battle.txt",
  fighterBattle: "fighter_battle.txt",
} as const;

export const SAVE_FILE_PREFIX = "calc_data_stats_";
export const DATA_FILE_EXTENSION = ".json";
export const LEGACY_SAVE_PREFIX = "legacy_";
export const ADDENDUM_EXAMPLE_FILE = "spirit_addendum_example.json";

export const STATS_PER_PAGE = readPositiveInt(process.env.CALC_STATS_PER_PAGE, 50);

export interface DataPaths {
  root: string;
  metadataDir: string;
  addendaDir: string;
  savesDir: string;
  legacyDir: string;
  creationSettingsPath: string;
  catalogPath: string;
}

export class FatalConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalConfigurationError";
  }
}

function readPositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw ?? fallback);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function resolvePaths(root = process.env.CALC_DATA_DIR?.trim() || DEFAULT_DATA_DIR): DataPaths {
  const resolved = path.resolve(root);
  return {
    root: resolved,
    metadataDir: path.join(resolved, "metadata"),
    addendaDir: path.join(resolved, "addenda"),
    savesDir: path.join(resolved, "saves"),
    legacyDir: path.join(resolved, "legacy"),
    creationSettingsPath: path.join(resolved, "creation-settings.json"),
    catalogPath: path.join(resolved, "catalog.json"),
  };
}

function isDirectory(target: string): boolean {
  return existsSync(target) && statSync(target).isDirectory();
}

/**
 * The metadata directory ships with the repository and must exist. The
 * writable directories are created on demand.
 */
export function ensureDataDirectories(paths: DataPaths): void {
  if (!isDirectory(paths.metadataDir)) {
    throw new FatalConfigurationError(`Metadata directory not found: ${paths.metadataDir}`);
  }
  for (const dir of [paths.addendaDir, paths.savesDir, paths.legacyDir]) {
    try {
      mkdirSync(dir, { recursive: true });
    } catch (error) {
      throw new FatalConfigurationError(`Unable to create ${dir}: ${describeError(error)}`);
    }
  }
}
