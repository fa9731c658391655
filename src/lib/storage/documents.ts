import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import { describeError, logger } from "../log.js";

export interface Validatable {
  /** Repairs the value in place. Returns false when anything was repaired. */
  validate(): boolean;
}

export interface DocumentCodec<T extends Validatable> {
  name: string;
  /** Builds a value from parsed JSON. Throws when the shape is unusable. */
  parse(raw: unknown): T;
  serialize(value: T): unknown;
  create(): T;
}

function withTrailingNewline(payload: string): string {
  return payload.endsWith("\n") ? payload : `${payload}\n`;
}

export function writeTextFile(filePath: string, contents: string): boolean {
  try {
    mkdirSync(path.dirname(filePath), { recursive: true });
    writeFileSync(filePath, withTrailingNewline(contents), "utf8");
    return true;
  } catch (error) {
    logger.error(`Failed to write file [${filePath}]: ${describeError(error)}`);
    return false;
  }
}

export function readTextLines(filePath: string): string[] | null {
  try {
    return readFileSync(filePath, "utf8").split(/\r?\n/);
  } catch (error) {
    logger.error(`Failed to read file [${filePath}]: ${describeError(error)}`);
    return null;
  }
}

export function writeDocument<T extends Validatable>(filePath: string, value: T, codec: DocumentCodec<T>): boolean {
  let payload: string;
  try {
    payload = JSON.stringify(codec.serialize(value), null, 2);
  } catch (error) {
    logger.error(`Failed to serialize ${codec.name} for [${filePath}]: ${describeError(error)}`);
    return false;
  }
  const written = writeTextFile(filePath, payload);
  if (written) {
    logger.verbose(`Wrote ${codec.name} to [${filePath}].`);
  }
  return written;
}

/**
 * Reads and validates a document. A document repaired during validation is
 * written straight back so the file matches what was loaded.
 */
export function readDocument<T extends Validatable>(filePath: string, codec: DocumentCodec<T>): T | null {
  let value: T;
  try {
    const contents = readFileSync(filePath, "utf8");
    value = codec.parse(JSON.parse(contents));
  } catch (error) {
    logger.error(`Failed to read ${codec.name} at [${filePath}]: ${describeError(error)}`);
    return null;
  }

  if (!value.validate()) {
    logger.warn(`Repaired ${codec.name} at [${filePath}], rewriting it.`);
    writeDocument(filePath, value, codec);
  }
  return value;
}

export function readOrCreateDocument<T extends Validatable>(filePath: string, codec: DocumentCodec<T>): T | null {
  if (existsSync(filePath)) {
    return readDocument(filePath, codec);
  }

  const value = codec.create();
  value.validate();
  logger.info(`Creating ${codec.name} at [${filePath}].`);
  return writeDocument(filePath, value, codec) ? value : null;
}
