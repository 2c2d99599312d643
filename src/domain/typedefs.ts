/**
 * Core domain typedefs used throughout the party.
 * Identifiers are plain string aliases; adapters decide how they are minted.
 */

/** Unique identifier of a running party session */
export type SessionId = string;

/** Unique identifier of a player */
export type PlayerId = string;

/** Identifier of a physical envelope (story prop) */
export type EnvelopeId = string;

/** Identifier of a delivered hint record */
export type HintId = string;

/** Identifier of one soft timer run */
export type TimerId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Round phase enumeration */
export type RoundPhase = "IDLE" | "INTRO" | "ACTIVE" | "COOLDOWN";

/** Importance of an envelope, highest first */
export type Importance = "high" | "medium" | "low";

/** Named quality level of a clue, e.g. "major", "minor", "vague", "misleading" */
export type HintTier = string;

export type PlayerRole = "culprit" | "other";

/** Checkpoints a soft timer may announce */
export type TimerCheckpointKind = "half_time" | "timer_end";
