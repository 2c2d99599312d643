import { Command, type CommandContext } from "./Command.js";
import type { SessionId, TimePoint } from "../typedefs.js";

export interface ResetSessionResult {
  readonly ok: true;
  readonly sessionId: SessionId;
  readonly joinCode: string;
}

/** Facilitator reset: drops every trace of the session and starts over. */
export class ResetSession extends Command<ResetSessionResult> {
  readonly type = "ResetSession" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({
    sessionGateway,
    scheduler,
    bus,
    logger,
  }: CommandContext): Promise<ResetSessionResult> {
    await scheduler.abortTimer(this.sessionId);
    const state = await sessionGateway.resetSession(this.sessionId);

    logger?.warn?.("Session reset", { type: this.type, sessionId: this.sessionId });

    await bus.broadcastType("phase", {
      sessionId: state.id,
      phase: state.round.phase,
      roundIndex: state.round.roundIndex,
    });
    return { ok: true, sessionId: state.id, joinCode: state.joinCode };
  }
}
