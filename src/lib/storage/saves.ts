import { readdirSync } from "fs";
import path from "path";
import { isBlank } from "../catalog/keys.js";
import { BattleLog } from "../battles/log.js";
import { createBattleLogCodec } from "../battles/schema.js";
import { DATA_FILE_EXTENSION, SAVE_FILE_PREFIX } from "../config.js";
import { describeError, logger } from "../log.js";
import { readDocument, readOrCreateDocument, writeDocument } from "./documents.js";

export function saveFileName(name: string): string {
  let fileName = name.startsWith(SAVE_FILE_PREFIX) ? name : `${SAVE_FILE_PREFIX}${name}`;
  if (!fileName.endsWith(DATA_FILE_EXTENSION)) {
    fileName = `${fileName}${DATA_FILE_EXTENSION}`;
  }
  return fileName;
}

export function saveDisplayName(fileName: string): string {
  const base = path.basename(fileName);
  const withoutPrefix = base.startsWith(SAVE_FILE_PREFIX) ? base.slice(SAVE_FILE_PREFIX.length) : base;
  return withoutPrefix.endsWith(DATA_FILE_EXTENSION)
    ? withoutPrefix.slice(0, -DATA_FILE_EXTENSION.length)
    : withoutPrefix;
}

export function savePath(savesDir: string, name: string): string {
  return path.join(savesDir, saveFileName(name));
}

export function writeSave(savesDir: string, log: BattleLog): boolean {
  if (isBlank(log.fileName)) {
    logger.error("Unable to write a save without a file name.");
    return false;
  }
  log.validate();
  return writeDocument(savePath(savesDir, log.fileName), log, createBattleLogCodec(log.fileName));
}

export function loadSave(savesDir: string, name: string): BattleLog | null {
  if (isBlank(name)) {
    return null;
  }
  const displayName = saveDisplayName(name);
  return readDocument(savePath(savesDir, displayName), createBattleLogCodec(displayName));
}

/** Loads a save, creating an empty one with `create` when the file is missing. */
export function loadOrCreateSave(savesDir: string, name: string, create?: () => BattleLog): BattleLog | null {
  if (isBlank(name)) {
    return null;
  }
  const displayName = saveDisplayName(name);
  const build = () => {
    const log = create?.() ?? new BattleLog();
    log.fileName = displayName;
    return log;
  };
  return readOrCreateDocument(savePath(savesDir, displayName), createBattleLogCodec(displayName, build));
}

export function listSaves(savesDir: string): string[] {
  try {
    return readdirSync(savesDir)
      .filter((fileName) => fileName.startsWith(SAVE_FILE_PREFIX) && fileName.endsWith(DATA_FILE_EXTENSION))
      .map(saveDisplayName)
      .sort();
  } catch (error) {
    logger.error(`Unable to list saves in [${savesDir}]: ${describeError(error)}`);
    return [];
  }
}
