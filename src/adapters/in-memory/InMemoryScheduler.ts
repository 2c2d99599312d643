/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { TimerCheckpoint } from "../../domain/commands/TimerCheckpoint.js";
import type {
  Scheduler,
  TimerCheckpointPlan,
  TimerContext,
} from "../../domain/ports/Scheduler.js";
import type { SessionId, TimePoint, TimerId } from "../../domain/typedefs.js";

/**
 * Deterministic in-memory scheduler used exclusively in tests.
 *
 * Instead of relying on {@link setTimeout}, the scheduler records queued checkpoints and exposes
 * a {@link runFor} helper that advances the virtual clock (in milliseconds). This makes it
 * possible for tests to control timer progression without depending on real time or fake timers.
 */
interface QueuedCheckpoint {
  readonly command: TimerCheckpoint;
  /** Last checkpoint of its timer */
  readonly final: boolean;
}

interface SchedulerState {
  readonly now: TimePoint;
  readonly queue: readonly QueuedCheckpoint[];
}

export class InMemoryScheduler implements Scheduler {
  readonly #dispatch: (command: TimerCheckpoint) => Promise<unknown> | unknown;
  #state: SchedulerState = { now: 0, queue: [] };
  #current = new Map<SessionId, TimerId>();
  #nextId = 1;

  constructor(dispatch: (command: TimerCheckpoint) => Promise<unknown> | unknown) {
    this.#dispatch = dispatch;
  }

  get now(): TimePoint {
    return this.#state.now;
  }

  async startTimer(
    sessionId: SessionId,
    plan: readonly TimerCheckpointPlan[],
    context: TimerContext,
  ): Promise<TimerId> {
    if (plan.length === 0) {
      throw new Error("Timer plan must contain at least one checkpoint");
    }
    if (plan.some((step) => step.afterMs < 0)) {
      throw new Error("Checkpoint delay must be non-negative");
    }

    await this.abortTimer(sessionId);

    const timerId = `timer-${this.#nextId++}`;
    this.#current.set(sessionId, timerId);

    const lastAfterMs = Math.max(...plan.map((step) => step.afterMs));
    let queue = this.#state.queue;
    for (const step of plan) {
      const command = new TimerCheckpoint(
        sessionId,
        timerId,
        step.checkpoint,
        context,
        this.#state.now + step.afterMs,
      );
      const entry: QueuedCheckpoint = { command, final: step.afterMs === lastAfterMs };
      const insertAt = queue.findIndex((existing) => existing.command.at > command.at);
      queue =
        insertAt === -1
          ? [...queue, entry]
          : [...queue.slice(0, insertAt), entry, ...queue.slice(insertAt)];
    }

    this.#state = { ...this.#state, queue };
    return timerId;
  }

  async abortTimer(sessionId: SessionId): Promise<boolean> {
    const running = this.#current.delete(sessionId);
    this.#state = {
      ...this.#state,
      queue: this.#state.queue.filter((entry) => entry.command.sessionId !== sessionId),
    };
    return running;
  }

  isCurrentTimer(sessionId: SessionId, timerId: TimerId): boolean {
    return this.#current.get(sessionId) === timerId;
  }

  hasActiveTimer(sessionId: SessionId): boolean {
    return this.#current.has(sessionId);
  }

  /** Checkpoints still waiting to fire */
  get pending(): readonly TimerCheckpoint[] {
    return this.#state.queue.map((entry) => entry.command);
  }

  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#state.now + milliseconds;
    let state = this.#state;

    while (state.queue.length > 0) {
      const [next, ...remaining] = state.queue;
      if (!next) {
        break;
      }
      if (next.command.at > targetTime) {
        break;
      }

      state = { now: next.command.at, queue: remaining };
      this.#state = state;
      await this.#dispatch(next.command);

      const { sessionId, timerId } = next.command;
      if (next.final && this.isCurrentTimer(sessionId, timerId)) {
        this.#current.delete(sessionId);
      }
      state = this.#state;
    }

    this.#state = { now: targetTime, queue: state.queue };
  }
}
