import type { SessionId, TimerCheckpointKind, TimerId } from "../typedefs.js";

export interface TimerCheckpointPlan {
  readonly checkpoint: TimerCheckpointKind;
  /** Offset from the timer start */
  readonly afterMs: number;
}

export interface TimerContext {
  readonly roundIndex: number;
  readonly miniGame?: string;
}

/**
 * Infrastructure abstraction delivering soft-timer checkpoints to the domain
 * as `TimerCheckpoint` commands.
 *
 * At most one timer is outstanding per session: starting a timer cancels the
 * previous one first. Checkpoints of a cancelled timer may still be in flight;
 * the domain drops them by checking {@link isCurrentTimer}.
 */
export interface Scheduler {
  startTimer(
    sessionId: SessionId,
    plan: readonly TimerCheckpointPlan[],
    context: TimerContext,
  ): Promise<TimerId>;

  /** Resolves with whether a timer was running */
  abortTimer(sessionId: SessionId): Promise<boolean>;

  isCurrentTimer(sessionId: SessionId, timerId: TimerId): boolean;

  hasActiveTimer(sessionId: SessionId): boolean;
}
