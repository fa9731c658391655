import { logger } from "../log.js";
import { isBlank, sanitizeKey } from "./keys.js";
import { appendRecord, type MergeMode } from "./merge.js";
import { normalizeRecord, type EntityPatch, type EntityRecord } from "./types.js";

export type CatalogVisitor = (key: string, record: Readonly<EntityRecord>) => void;

export class EntityCatalog {
  #records = new Map<string, EntityRecord>();

  static fromRecords(records: Iterable<EntityRecord>): EntityCatalog {
    const catalog = new EntityCatalog();
    for (const record of records) {
      catalog.set(record.displayName, record);
    }
    return catalog;
  }

  get size(): number {
    return this.#records.size;
  }

  lookup(name: string): Readonly<EntityRecord> | undefined {
    return this.#records.get(sanitizeKey(name));
  }

  has(name: string): boolean {
    return this.#records.has(sanitizeKey(name));
  }

  keys(): string[] {
    return [...this.#records.keys()];
  }

  forEach(visitor: CatalogVisitor): void {
    for (const [key, record] of this.#records) {
      visitor(key, record);
    }
  }

  displayNameFor(key: string): string {
    return this.lookup(key)?.displayName ?? key;
  }

  /** Inserts or replaces the record stored under `name`. Blank names are ignored. */
  set(name: string, record: EntityRecord): boolean {
    if (isBlank(name)) {
      return false;
    }
    this.#records.set(sanitizeKey(name), { ...record });
    return true;
  }

  /**
   * Merges one record into the catalog. Unknown keys are inserted, labelled
   * with `name` when the record has no display name of its own. Known keys
   * are merged field by field.
   */
  mergeRecord(name: string, incoming: Readonly<EntityPatch>, mode: MergeMode = "override"): boolean {
    if (isBlank(name)) {
      return false;
    }
    const key = sanitizeKey(name);
    const existing = this.#records.get(key);
    if (!existing) {
      const displayName = incoming.displayName === undefined || isBlank(incoming.displayName) ? name.trim() : incoming.displayName;
      this.#records.set(key, { ...incoming, displayName });
      return true;
    }
    return appendRecord(existing, incoming, mode);
  }

  /** Returns whether anything changed. */
  append(incoming: ReadonlyMap<string, EntityPatch> | EntityCatalog, mode: MergeMode = "override"): boolean {
    const entries = incoming instanceof EntityCatalog ? incoming.#records : incoming;
    if (entries.size === 0) {
      logger.error("Attempted to append an empty record collection to the catalog.");
      return false;
    }
    let changed = false;
    for (const [name, record] of entries) {
      if (this.mergeRecord(name, record, mode)) {
        changed = true;
      }
    }
    return changed;
  }

  /** Normalizes every record. Returns false when anything was repaired. */
  validate(): boolean {
    let valid = true;
    for (const record of this.#records.values()) {
      if (!normalizeRecord(record)) {
        valid = false;
      }
    }
    return valid;
  }

  toJSON(): Record<string, EntityRecord> {
    const output: Record<string, EntityRecord> = {};
    for (const key of [...this.#records.keys()].sort()) {
      const record = this.#records.get(key);
      if (record) {
        output[key] = { ...record };
      }
    }
    return output;
  }
}
