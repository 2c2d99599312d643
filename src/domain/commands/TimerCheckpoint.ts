import { Command, type CommandContext } from "./Command.js";
import { TIMER_TEXT } from "../entities/RoundRules.js";
import type { TimerContext } from "../ports/Scheduler.js";
import type { SessionId, TimePoint, TimerCheckpointKind, TimerId } from "../typedefs.js";

/**
 * A soft-timer notice. Announces only; the round phase never changes here.
 * Checkpoints of a cancelled or replaced timer are dropped.
 */
export class TimerCheckpoint extends Command<boolean> {
  readonly type = "TimerCheckpoint" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly timerId: TimerId,
    public readonly checkpoint: TimerCheckpointKind,
    public readonly context: TimerContext,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ scheduler, bus, logger }: CommandContext): Promise<boolean> {
    if (!scheduler.isCurrentTimer(this.sessionId, this.timerId)) {
      logger?.debug?.("Dropping checkpoint of a stale timer", {
        sessionId: this.sessionId,
        timerId: this.timerId,
        checkpoint: this.checkpoint,
      });
      return false;
    }

    await bus.broadcastType("timer", {
      sessionId: this.sessionId,
      event: this.checkpoint,
      text: TIMER_TEXT[this.checkpoint],
      roundIndex: this.context.roundIndex,
      ...(this.context.miniGame !== undefined ? { miniGame: this.context.miniGame } : {}),
    });
    return true;
  }
}
