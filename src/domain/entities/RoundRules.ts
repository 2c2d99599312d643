import type { TimerCheckpointPlan } from "../ports/Scheduler.js";
import type { RoundProgress } from "../ports/SessionGateway.js";
import type { RoundDefinition, StorySeed } from "../StorySeed.js";
import type { RoundPhase, TimerCheckpointKind } from "../typedefs.js";

/** Phases from which each round-control operation may run */
export const LEGAL_PHASES = {
  beginNextRound: ["IDLE", "COOLDOWN"],
  confirmStart: ["INTRO"],
  finishCurrentRound: ["ACTIVE"],
} as const satisfies Record<string, readonly RoundPhase[]>;

export type RoundControl = keyof typeof LEGAL_PHASES;

export function isLegalTransition(operation: RoundControl, phase: RoundPhase): boolean {
  const legal: readonly RoundPhase[] = LEGAL_PHASES[operation];
  return legal.includes(phase);
}

/** Round definition for a 1-based index, if the plan has one. */
export function roundAt(seed: StorySeed, roundIndex: number): RoundDefinition | undefined {
  if (!Number.isInteger(roundIndex) || roundIndex < 1) return undefined;
  return seed.rounds[roundIndex - 1];
}

export const TIMER_TEXT: Readonly<Record<TimerCheckpointKind, string>> = {
  half_time: "Half of the time has elapsed.",
  timer_end: "Time is up.",
};

/**
 * Checkpoints of a soft timer. Long enough timers announce half-time at
 * max(1, floor(d / 2)) seconds; every timer announces its end at d.
 */
export function planSoftTimer(
  seconds: number,
  halfTimeThresholdSeconds: number,
): TimerCheckpointPlan[] {
  const endMs = seconds * 1000;
  if (seconds < halfTimeThresholdSeconds) {
    return [{ checkpoint: "timer_end", afterMs: endMs }];
  }

  return [
    { checkpoint: "half_time", afterMs: Math.max(1, Math.floor(seconds / 2)) * 1000 },
    { checkpoint: "timer_end", afterMs: endMs },
  ];
}

export interface RoundStatus {
  readonly phase: RoundPhase;
  readonly roundIndex: number;
  readonly currentRound: RoundDefinition | null;
  readonly nextRound: RoundDefinition | null;
  readonly totalRounds: number;
  readonly hasTimer: boolean;
}

export function describeRoundStatus(
  seed: StorySeed,
  progress: RoundProgress,
  hasTimer: boolean,
): RoundStatus {
  const { roundIndex } = progress;
  return {
    phase: progress.phase,
    roundIndex,
    currentRound: roundAt(seed, roundIndex) ?? null,
    nextRound: seed.rounds[roundIndex] ?? null,
    totalRounds: seed.rounds.length,
    hasTimer,
  };
}
