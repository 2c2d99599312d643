/* eslint-disable functional/immutable-data */
import { MinHeap } from "./MinHeap.js";
import type { Envelope, EnvelopeSlot, Player } from "../ports/SessionGateway.js";
import type { EnvelopeId, Importance, PlayerId } from "../typedefs.js";

export const IMPORTANCE_RANK: Readonly<Record<Importance, number>> = {
  high: 0,
  medium: 1,
  low: 2,
};

const TRAILING_NUMBER = /(\d+)$/;

/**
 * Numeric-aware id order: ids ending in digits come first, ordered by that
 * number; the others follow in plain string order.
 */
export function compareEnvelopeIds(a: EnvelopeId, b: EnvelopeId): number {
  const aTail = TRAILING_NUMBER.exec(a)?.[1];
  const bTail = TRAILING_NUMBER.exec(b)?.[1];

  if (aTail !== undefined && bTail !== undefined) {
    const byNumber = Number(aTail) - Number(bTail);
    if (byNumber !== 0) return byNumber;
  } else if (aTail !== undefined) {
    return -1;
  } else if (bTail !== undefined) {
    return 1;
  }

  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareEnvelopes(a: Envelope, b: Envelope): number {
  const byImportance = IMPORTANCE_RANK[a.importance] - IMPORTANCE_RANK[b.importance];
  return byImportance !== 0 ? byImportance : compareEnvelopeIds(a.id, b.id);
}

export function countPerPlayer(envelopes: readonly Envelope[]): Record<PlayerId, number> {
  const counts: Record<PlayerId, number> = {};
  for (const envelope of envelopes) {
    if (envelope.assignedPlayerId === null) continue;
    counts[envelope.assignedPlayerId] = (counts[envelope.assignedPlayerId] ?? 0) + 1;
  }
  return counts;
}

export interface EnvelopeAssignment {
  readonly envelopeId: EnvelopeId;
  readonly playerId: PlayerId;
}

export interface DistributionOutcome {
  readonly assignedCount: number;
  readonly leftCount: number;
  readonly perPlayerCounts: Readonly<Record<PlayerId, number>>;
  readonly assignments: readonly EnvelopeAssignment[];
}

interface HeapEntry {
  readonly count: number;
  readonly index: number;
  readonly playerId: PlayerId;
}

/**
 * Hands every unassigned envelope to the least-served player, one envelope at
 * a time, over a single heap keyed by (count, player index). Existing
 * assignments are kept and count towards each player's load.
 */
export function distributeEquitable(
  playerIds: readonly PlayerId[],
  envelopes: Envelope[],
): DistributionOutcome {
  if (playerIds.length === 0) {
    return { assignedCount: 0, leftCount: 0, perPlayerCounts: {}, assignments: [] };
  }

  const pending = envelopes
    .filter((envelope) => envelope.assignedPlayerId === null)
    .sort(compareEnvelopes);

  const counts = countPerPlayer(envelopes);
  const heap = new MinHeap<HeapEntry>(
    (a, b) => a.count - b.count || a.index - b.index,
    playerIds.map((playerId, index) => ({ count: counts[playerId] ?? 0, index, playerId })),
  );

  const assignments: EnvelopeAssignment[] = [];
  for (const envelope of pending) {
    const entry = heap.pop();
    if (!entry) break;
    envelope.assignedPlayerId = entry.playerId;
    assignments.push({ envelopeId: envelope.id, playerId: entry.playerId });
    heap.push({ ...entry, count: entry.count + 1 });
  }

  return {
    assignedCount: assignments.length,
    leftCount: envelopes.filter((envelope) => envelope.assignedPlayerId === null).length,
    perPlayerCounts: countPerPlayer(envelopes),
    assignments,
  };
}

/** Ordered slot view of the envelopes a player holds. */
export function envelopeSlotsFor(
  playerId: PlayerId,
  envelopes: readonly Envelope[],
): EnvelopeSlot[] {
  return envelopes
    .filter((envelope) => envelope.assignedPlayerId === playerId)
    .map((envelope) => envelope.id)
    .sort(compareEnvelopeIds)
    .map((id, index) => ({ num: index + 1, id }));
}

/** Recomputes every player's derived envelope view from the pool. */
export function syncPlayerEnvelopes(
  players: readonly Player[],
  envelopes: readonly Envelope[],
): void {
  for (const player of players) {
    player.envelopes = envelopeSlotsFor(player.id, envelopes);
  }
}

export interface EnvelopeSummary {
  readonly total: number;
  readonly assigned: number;
  readonly left: number;
  readonly perPlayer: Readonly<Record<PlayerId, number>>;
  /** Unassigned envelopes per importance */
  readonly buckets: Readonly<Record<Importance, number>>;
}

export function envelopeSummary(envelopes: readonly Envelope[]): EnvelopeSummary {
  const buckets: Record<Importance, number> = { high: 0, medium: 0, low: 0 };
  let assigned = 0;
  for (const envelope of envelopes) {
    if (envelope.assignedPlayerId === null) {
      buckets[envelope.importance] += 1;
    } else {
      assigned += 1;
    }
  }

  return {
    total: envelopes.length,
    assigned,
    left: envelopes.length - assigned,
    perPlayer: countPerPlayer(envelopes),
    buckets,
  };
}
