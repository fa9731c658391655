import { isBlank, sanitizeKey } from "../catalog/keys.js";
import { logger } from "../log.js";
import type { Validatable } from "../storage/documents.js";
import { cloneEntry, entriesEqual, validateEntry, type BattleEntry } from "./entry.js";

export const CURRENT_SAVE_VERSION = 1;
export const DEFAULT_PLAYER_NAMES: readonly string[] = ["Player 1", "Player 2", "Player 3"];

export interface BattleLogSettings {
  playerNames: string[];
}

export interface BattleLogOptions {
  fileName?: string;
  playerNames?: readonly string[];
  lastAddedKey?: string;
  saveVersion?: number;
}

/** Called after an entry is added under a new key or removed. */
export type LogChangeListener = (log: BattleLog) => void;

export type EntryVisitor = (key: string, entry: Readonly<BattleEntry>) => void;

function sameNames(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, index) => name === b[index]);
}

export class BattleLog implements Validatable {
  lastAddedKey: string;
  saveVersion: number;
  readonly settings: BattleLogSettings;
  #entries = new Map<string, BattleEntry>();
  #fileName = "";

  constructor(options: BattleLogOptions = {}) {
    this.fileName = options.fileName ?? "";
    this.lastAddedKey = options.lastAddedKey ?? "";
    this.saveVersion = options.saveVersion ?? CURRENT_SAVE_VERSION;
    this.settings = { playerNames: [...(options.playerNames ?? [])] };
  }

  /**
   * Restores a log from stored entries as-is. Nothing is validated, so a
   * following `validate()` reports whatever needed repair.
   */
  static fromEntries(options: BattleLogOptions, entries: Iterable<[string, BattleEntry]>): BattleLog {
    const log = new BattleLog(options);
    for (const [name, entry] of entries) {
      if (!isBlank(name)) {
        log.#entries.set(sanitizeKey(name), entry);
      }
    }
    return log;
  }

  get fileName(): string {
    return this.#fileName;
  }

  /** The name can only be assigned once. */
  set fileName(value: string) {
    if (isBlank(this.#fileName)) {
      this.#fileName = value;
    }
  }

  get size(): number {
    return this.#entries.size;
  }

  get playerCount(): number {
    return this.settings.playerNames.length;
  }

  playerName(index: number): string | undefined {
    return this.isValidPlayer(index) ? this.settings.playerNames[index] : undefined;
  }

  isValidPlayer(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.playerCount;
  }

  setPlayers(names: readonly string[]): void {
    this.settings.playerNames.splice(0, this.settings.playerNames.length, ...names);
  }

  /**
   * Stores a validated copy of the entry. Returns true when the key is new,
   * in which case it becomes the last added key and `onChange` fires.
   */
  addOrUpdate(name: string, entry: BattleEntry, onChange?: LogChangeListener): boolean {
    if (isBlank(name)) {
      return false;
    }
    const key = sanitizeKey(name);
    const added = !this.#entries.has(key);
    const stored = cloneEntry(entry);
    validateEntry(stored, this.playerCount);
    this.#entries.set(key, stored);
    logger.verbose(`Stored battle entry [${key}, ${stored.kind}] in save [${this.fileName}].`);

    if (!added) {
      return false;
    }
    this.lastAddedKey = key;
    onChange?.(this);
    return true;
  }

  remove(name: string, onChange?: LogChangeListener): boolean {
    if (isBlank(name)) {
      return false;
    }
    const key = sanitizeKey(name);
    if (!this.#entries.delete(key)) {
      logger.warn(`Failed to remove battle entry [${name}] from save [${this.fileName}].`);
      return false;
    }
    logger.verbose(`Removed battle entry [${key}] from save [${this.fileName}].`);
    onChange?.(this);
    return true;
  }

  /** Returns a validated copy, so edits do not leak into the log. */
  get(name: string): BattleEntry | undefined {
    if (isBlank(name)) {
      return undefined;
    }
    const stored = this.#entries.get(sanitizeKey(name));
    if (!stored) {
      return undefined;
    }
    const copy = cloneEntry(stored);
    validateEntry(copy, this.playerCount);
    return copy;
  }

  has(name: string): boolean {
    return this.#entries.has(sanitizeKey(name));
  }

  keys(): string[] {
    return [...this.#entries.keys()];
  }

  forEach(visitor: EntryVisitor): void {
    for (const [key, entry] of this.#entries) {
      visitor(key, entry);
    }
  }

  validate(): boolean {
    let valid = true;

    if (this.settings.playerNames.length === 0) {
      this.setPlayers(DEFAULT_PLAYER_NAMES);
      valid = false;
    }

    for (const [key, entry] of this.#entries) {
      if (!validateEntry(entry, this.playerCount)) {
        logger.warn(`Battle entry [${key}] failed validation and was repaired.`);
        valid = false;
      }
    }

    if (this.saveVersion !== CURRENT_SAVE_VERSION) {
      this.saveVersion = CURRENT_SAVE_VERSION;
      valid = false;
    }
    return valid;
  }

  equals(other: BattleLog): boolean {
    if (
      this.lastAddedKey !== other.lastAddedKey ||
      this.saveVersion !== other.saveVersion ||
      this.size !== other.size ||
      !sameNames(this.settings.playerNames, other.settings.playerNames)
    ) {
      return false;
    }
    for (const [key, entry] of this.#entries) {
      const match = other.#entries.get(key);
      if (!match || !entriesEqual(entry, match)) {
        return false;
      }
    }
    return true;
  }
}
