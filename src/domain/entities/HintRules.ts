import type {
  HintDelivery,
  HintRecord,
  Player,
} from "../ports/SessionGateway.js";
import type { HintId, HintTier, PlayerId, TimePoint } from "../typedefs.js";

/** Tiers tried, in order, when the sharing rules give nothing usable */
export const OTHER_TIER_FALLBACKS: readonly HintTier[] = ["vague", "minor", "misleading"];

/**
 * Tier the other players receive when the discoverer does not share.
 * A sharing rule only counts when its tier has text in the hint map.
 */
export function resolveOtherTier(
  discovererTier: HintTier,
  share: boolean,
  hints: Readonly<Record<HintTier, string>>,
  sharingRules: Readonly<Record<HintTier, HintTier>>,
): HintTier {
  if (share) return discovererTier;

  const ruled = sharingRules[discovererTier];
  if (ruled !== undefined && Object.hasOwn(hints, ruled)) return ruled;

  return OTHER_TIER_FALLBACKS.find((tier) => Object.hasOwn(hints, tier)) ?? discovererTier;
}

/** One delivery per player, in player order. */
export function buildDeliveries(
  players: readonly Player[],
  discovererId: PlayerId,
  discovererTier: HintTier,
  otherTier: HintTier,
  hints: Readonly<Record<HintTier, string>>,
): HintDelivery[] {
  return players.map((player) => {
    const tier = player.id === discovererId ? discovererTier : otherTier;
    return {
      playerId: player.id,
      tier,
      text: hints[tier] ?? hints[discovererTier] ?? "",
    };
  });
}

export function findHint(
  history: readonly HintRecord[],
  hintId: HintId,
): HintRecord | undefined {
  return history.find((record) => record.id === hintId);
}

export interface PlayerHintView {
  readonly hintId: HintId;
  readonly roundIndex: number;
  readonly discovererId: PlayerId;
  readonly shared: boolean;
  readonly tier: HintTier;
  readonly text: string;
  readonly destroyed: boolean;
  readonly destroyedBy: PlayerId | null;
  readonly destroyedAt: TimePoint | null;
  readonly createdAt: TimePoint;
}

/** What a single player was handed, or nothing when they received no copy. */
export function projectHintForPlayer(
  record: HintRecord,
  playerId: PlayerId,
): PlayerHintView | undefined {
  const delivery = record.deliveries.find((entry) => entry.playerId === playerId);
  if (!delivery) return undefined;

  return {
    hintId: record.id,
    roundIndex: record.roundIndex,
    discovererId: record.discovererId,
    shared: record.shared,
    tier: delivery.tier,
    text: delivery.text,
    destroyed: record.destroyed,
    destroyedBy: record.destroyedBy,
    destroyedAt: record.destroyedAt,
    createdAt: record.createdAt,
  };
}
