import { Command, type CommandContext } from "./Command.js";
import type { SessionId, TimePoint } from "../typedefs.js";

export interface AbortTimerResult {
  readonly ok: true;
  readonly aborted: boolean;
}

export class AbortTimer extends Command<AbortTimerResult> {
  readonly type = "AbortTimer" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ scheduler, logger }: CommandContext): Promise<AbortTimerResult> {
    const aborted = await scheduler.abortTimer(this.sessionId);
    if (aborted) {
      logger?.info?.("Timer aborted", { type: this.type, sessionId: this.sessionId });
    }
    return { ok: true, aborted };
  }
}
