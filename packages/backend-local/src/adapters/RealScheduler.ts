/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { randomUUID } from "node:crypto";

import type {
  CommandContext,
  Logger,
  Scheduler,
  SessionId,
  TimerCheckpointPlan,
  TimerContext,
  TimerId,
} from "../core.js";
import { TimerCheckpoint, dispatchCommand } from "../core.js";

interface RealSchedulerOptions {
  readonly dispatch?: typeof dispatchCommand;
  readonly contextFactory: () => Promise<CommandContext>;
  readonly logger?: Logger;
}

interface ActiveTimer {
  readonly timerId: TimerId;
  readonly handles: readonly ReturnType<typeof setTimeout>[];
}

/**
 * Soft timers on `setTimeout`. Each checkpoint is dispatched as a
 * `TimerCheckpoint` command and so queues behind the session's lock.
 */
export class RealScheduler implements Scheduler {
  #timers: Map<SessionId, ActiveTimer> = new Map();
  readonly #dispatch: typeof dispatchCommand;
  readonly #contextFactory: RealSchedulerOptions["contextFactory"];
  readonly #logger: Logger | undefined;

  constructor(options: RealSchedulerOptions) {
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#contextFactory = options.contextFactory;
    this.#logger = options.logger;
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

    if (await this.abortTimer(sessionId)) {
      this.#logger?.warn?.("Replacing running timer", { sessionId });
    }

    const timerId = randomUUID();
    const lastAfterMs = Math.max(...plan.map((step) => step.afterMs));
    const handles = plan.map((step) =>
      setTimeout(async () => {
        try {
          const ctx = await this.#contextFactory();
          await this.#dispatch(
            new TimerCheckpoint(sessionId, timerId, step.checkpoint, context, Date.now()),
            ctx,
          );
        } catch (error) {
          this.#logger?.error?.("Failed to dispatch timer checkpoint", {
            sessionId,
            checkpoint: step.checkpoint,
            error,
          });
        } finally {
          if (step.afterMs === lastAfterMs && this.isCurrentTimer(sessionId, timerId)) {
            this.#timers.delete(sessionId);
          }
        }
      }, step.afterMs),
    );

    this.#timers.set(sessionId, { timerId, handles });
    this.#logger?.info?.("Timer started", {
      sessionId,
      timerId,
      checkpoints: plan.map((step) => `${step.checkpoint}@${step.afterMs}ms`),
    });
    return timerId;
  }

  async abortTimer(sessionId: SessionId): Promise<boolean> {
    const active = this.#timers.get(sessionId);
    if (!active) return false;

    for (const handle of active.handles) {
      clearTimeout(handle);
    }
    this.#timers.delete(sessionId);
    this.#logger?.debug?.("Timer cancelled", { sessionId, timerId: active.timerId });
    return true;
  }

  isCurrentTimer(sessionId: SessionId, timerId: TimerId): boolean {
    return this.#timers.get(sessionId)?.timerId === timerId;
  }

  hasActiveTimer(sessionId: SessionId): boolean {
    return this.#timers.has(sessionId);
  }
}
