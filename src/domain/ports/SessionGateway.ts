/* eslint-disable functional/prefer-readonly-type */
import type { StorySeed } from "../StorySeed.js";
import type {
  EnvelopeId,
  HintId,
  HintTier,
  Importance,
  PlayerId,
  PlayerRole,
  RoundPhase,
  SessionId,
  TimePoint,
} from "../typedefs.js";

/** Position of an envelope in a player's own, ordered list */
export interface EnvelopeSlot {
  readonly num: number;
  readonly id: EnvelopeId;
}

export interface Player {
  readonly id: PlayerId;
  displayName: string;
  character?: string;
  role: PlayerRole;

  /** Derived view recomputed after every allocation; the pool is authoritative */
  envelopes: EnvelopeSlot[];

  /** Hints this player received, in delivery order */
  receivedHints: HintId[];
}

export interface Envelope {
  readonly id: EnvelopeId;
  readonly importance: Importance;
  readonly description?: string;
  assignedPlayerId: PlayerId | null;
}

export interface SessionFlags {
  phaseLabel: string;
  joinLocked: boolean;
  culpritPlayerId: PlayerId | null;
  /** Locked story facts (weapon, location, ...) */
  canon: Record<string, string>;
}

export interface SessionEvent {
  readonly id: string;
  readonly kind: string;
  readonly scope: string;
  readonly payload: Readonly<Record<string, unknown>>;
  readonly ts: TimePoint;
}

export interface PreparedRound {
  readonly roundIndex: number;
  readonly preparedAt: TimePoint;
  readonly hints: Readonly<Record<HintTier, string>>;
  readonly sharingRules: Readonly<Record<HintTier, HintTier>>;
}

export interface RoundResult {
  readonly winners: readonly PlayerId[];
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly finishedAt: TimePoint;
}

export interface RoundProgress {
  phase: RoundPhase;

  /** 1-based index of the current round; 0 before the first one */
  roundIndex: number;

  /** Recorded results keyed by round index */
  results: Record<string, RoundResult>;
}

export interface HintDelivery {
  readonly playerId: PlayerId;
  readonly tier: HintTier;
  readonly text: string;
}

/**
 * One discovery event. Everything but the destroyed fields is fixed at
 * delivery time; the destroyed fields flip once.
 */
export interface HintRecord {
  readonly id: HintId;
  readonly roundIndex: number;
  readonly discovererId: PlayerId;
  readonly sourceTier: HintTier;
  readonly otherTier: HintTier;
  readonly shared: boolean;
  readonly deliveries: readonly HintDelivery[];
  readonly createdAt: TimePoint;
  destroyed: boolean;
  destroyedBy: PlayerId | null;
  destroyedAt: TimePoint | null;
}

export interface SessionState {
  readonly id: SessionId;
  joinCode: string;
  players: Player[];
  flags: SessionFlags;
  events: SessionEvent[];
  preparedRounds: Record<string, PreparedRound>;
  envelopes: Envelope[];
  round: RoundProgress;
  hintsHistory: HintRecord[];
  killerActions: { destroyUsed: number };
  readonly seed: StorySeed;
}

/**
 * Persistence abstraction for session records.
 * Implementations hand out copies: a loaded record is only observed by others
 * once it is saved back.
 */
export interface SessionGateway {
  /** Load a session, creating it from the configured seed when unknown */
  loadSession(sessionId: SessionId): Promise<SessionState>;

  saveSession(state: SessionState): Promise<void>;

  /** Discard a session and recreate it empty from its seed */
  resetSession(sessionId: SessionId): Promise<SessionState>;

  findSessionIdByJoinCode(joinCode: string): Promise<SessionId | undefined>;
}
