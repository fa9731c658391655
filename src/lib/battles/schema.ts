import { z } from "zod";
import type { DocumentCodec } from "../storage/documents.js";
import { BATTLE_KINDS, type BattleEntry, type PlayerTally } from "./entry.js";
import { BattleLog } from "./log.js";

const tallySchema = z.object({
  losses: z.number().default(0),
});

const entrySchema = z.object({
  kind: z.enum(BATTLE_KINDS).default("Spirit"),
  winner: z.number().int().nullable().default(null),
  isShared: z.boolean().default(false),
  perPlayerTally: z.record(z.string().regex(/^\d+$/), tallySchema).default({}),
  sharedTally: tallySchema.default({ losses: 0 }),
});

export const battleLogDocumentSchema = z.object({
  saveVersion: z.number().int().default(0),
  lastAddedKey: z.string().default(""),
  settings: z
    .object({
      playerNames: z.array(z.string()).default([]),
    })
    .default({ playerNames: [] }),
  entries: z.record(z.string(), entrySchema).default({}),
});

export type BattleLogDocument = z.infer<typeof battleLogDocumentSchema>;
export type BattleEntryDocument = z.infer<typeof entrySchema>;

export function entryFromDocument(raw: BattleEntryDocument): BattleEntry {
  const perPlayerTally = new Map<number, PlayerTally>();
  for (const [index, tally] of Object.entries(raw.perPlayerTally)) {
    perPlayerTally.set(Number(index), { losses: tally.losses });
  }
  return {
    kind: raw.kind,
    winner: raw.winner,
    isShared: raw.isShared,
    perPlayerTally,
    sharedTally: { losses: raw.sharedTally.losses },
  };
}

export function entryToDocument(entry: Readonly<BattleEntry>): BattleEntryDocument {
  const perPlayerTally: Record<string, { losses: number }> = {};
  for (const index of [...entry.perPlayerTally.keys()].sort((a, b) => a - b)) {
    perPlayerTally[String(index)] = { losses: entry.perPlayerTally.get(index)?.losses ?? 0 };
  }
  return {
    kind: entry.kind,
    winner: entry.winner,
    isShared: entry.isShared,
    perPlayerTally,
    sharedTally: { losses: entry.sharedTally.losses },
  };
}

export function battleLogFromDocument(raw: unknown, fileName?: string): BattleLog {
  const document = battleLogDocumentSchema.parse(raw);
  return BattleLog.fromEntries(
    {
      fileName,
      playerNames: document.settings.playerNames,
      lastAddedKey: document.lastAddedKey,
      saveVersion: document.saveVersion,
    },
    Object.entries(document.entries).map(([key, entry]): [string, BattleEntry] => [key, entryFromDocument(entry)]),
  );
}

export function battleLogToDocument(log: BattleLog): BattleLogDocument {
  const entries: Record<string, BattleEntryDocument> = {};
  log.forEach((key, entry) => {
    entries[key] = entryToDocument(entry);
  });
  return {
    saveVersion: log.saveVersion,
    lastAddedKey: log.lastAddedKey,
    settings: { playerNames: [...log.settings.playerNames] },
    entries,
  };
}

export function createBattleLogCodec(fileName?: string, create: () => BattleLog = () => new BattleLog({ fileName })): DocumentCodec<BattleLog> {
  return {
    name: "battle log",
    parse: (raw) => battleLogFromDocument(raw, fileName),
    serialize: battleLogToDocument,
    create,
  };
}
