export const BATTLE_KINDS = ["Spirit", "Fighter", "Boss"] as const;
export type BattleKind = (typeof BATTLE_KINDS)[number];

export interface PlayerTally {
  losses: number;
}

/** Addresses one player's tally, or the tally shared by everyone. */
export type PlayerSlot = { kind: "player"; index: number } | { kind: "shared" };

export const SHARED_SLOT: PlayerSlot = Object.freeze({ kind: "shared" });

export function playerSlot(index: number): PlayerSlot {
  return { kind: "player", index };
}

export interface BattleEntry {
  kind: BattleKind;
  /** Index of the winning player, or null while nobody has won. */
  winner: number | null;
  /** Shared battles count every player as a participant and keep one loss counter. */
  isShared: boolean;
  perPlayerTally: Map<number, PlayerTally>;
  sharedTally: PlayerTally;
}

export type LossChange = { delta: number } | { value: number };

function clampLosses(value: number): number {
  return Number.isFinite(value) ? Math.max(Math.trunc(value), 0) : 0;
}

function validateTally(tally: PlayerTally): boolean {
  const clamped = clampLosses(tally.losses);
  if (clamped === tally.losses) {
    return true;
  }
  tally.losses = clamped;
  return false;
}

/**
 * Clamps every loss counter and backfills a zero tally for each configured
 * player. Returns false when anything was repaired.
 */
export function validateEntry(entry: BattleEntry, playerCount: number): boolean {
  let valid = validateTally(entry.sharedTally);

  for (const tally of entry.perPlayerTally.values()) {
    if (!validateTally(tally)) {
      valid = false;
    }
  }
  for (let index = 0; index < playerCount; index += 1) {
    if (!entry.perPlayerTally.has(index)) {
      entry.perPlayerTally.set(index, { losses: 0 });
      valid = false;
    }
  }

  if (entry.winner !== null && (!Number.isInteger(entry.winner) || entry.winner < 0)) {
    entry.winner = null;
    valid = false;
  }
  return valid;
}

export function createEntry(kind: BattleKind, playerCount = 0): BattleEntry {
  const entry: BattleEntry = {
    kind,
    winner: null,
    isShared: false,
    perPlayerTally: new Map(),
    sharedTally: { losses: 0 },
  };
  validateEntry(entry, playerCount);
  return entry;
}

export function cloneEntry(entry: BattleEntry): BattleEntry {
  const perPlayerTally = new Map<number, PlayerTally>();
  for (const [index, tally] of entry.perPlayerTally) {
    perPlayerTally.set(index, { losses: tally.losses });
  }
  return {
    kind: entry.kind,
    winner: entry.winner,
    isShared: entry.isShared,
    perPlayerTally,
    sharedTally: { losses: entry.sharedTally.losses },
  };
}

export function getLosses(entry: BattleEntry, slot: PlayerSlot, deferToShared = true): number {
  if (slot.kind === "shared" || (deferToShared && entry.isShared)) {
    return entry.sharedTally.losses;
  }
  return entry.perPlayerTally.get(slot.index)?.losses ?? 0;
}

/** Applies a loss change and returns the new count. The shared slot always targets the shared tally. */
export function updateLoss(entry: BattleEntry, slot: PlayerSlot, change: LossChange): number {
  let tally: PlayerTally;
  if (slot.kind === "shared") {
    tally = entry.sharedTally;
  } else {
    const existing = entry.perPlayerTally.get(slot.index);
    tally = existing ?? { losses: 0 };
    if (!existing) {
      entry.perPlayerTally.set(slot.index, tally);
    }
  }

  const next = "delta" in change ? tally.losses + change.delta : change.value;
  tally.losses = clampLosses(next);
  return tally.losses;
}

export function isWinner(entry: BattleEntry, slot: PlayerSlot): boolean {
  return slot.kind === "player" && entry.winner === slot.index;
}

export function hasWinner(entry: BattleEntry): boolean {
  return entry.winner !== null;
}

export function entriesEqual(a: BattleEntry, b: BattleEntry): boolean {
  if (
    a.kind !== b.kind ||
    a.winner !== b.winner ||
    a.isShared !== b.isShared ||
    a.sharedTally.losses !== b.sharedTally.losses ||
    a.perPlayerTally.size !== b.perPlayerTally.size
  ) {
    return false;
  }
  for (const [index, tally] of a.perPlayerTally) {
    if (b.perPlayerTally.get(index)?.losses !== tally.losses) {
      return false;
    }
  }
  return true;
}
