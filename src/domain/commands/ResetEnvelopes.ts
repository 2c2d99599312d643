/* eslint-disable functional/immutable-data */
import { Command, type CommandContext } from "./Command.js";
import { recordEvent } from "../entities/SessionRules.js";
import type { SessionId, TimePoint } from "../typedefs.js";

export interface ResetEnvelopesResult {
  readonly resetCount: number;
}

export class ResetEnvelopes extends Command<ResetEnvelopesResult> {
  readonly type = "ResetEnvelopes" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({
    sessionGateway,
    bus,
    config,
    logger,
  }: CommandContext): Promise<ResetEnvelopesResult> {
    const state = await sessionGateway.loadSession(this.sessionId);

    for (const envelope of state.envelopes) {
      envelope.assignedPlayerId = null;
    }
    for (const player of state.players) {
      player.envelopes = [];
    }
    const resetCount = state.envelopes.length;

    recordEvent(state, config, "envelopes_reset", { resetCount }, this.at);
    await sessionGateway.saveSession(state);

    logger?.info?.("Envelope assignments cleared", {
      type: this.type,
      sessionId: this.sessionId,
      resetCount,
    });

    await bus.broadcastType("event", {
      kind: "envelopes_reset",
      sessionId: this.sessionId,
      resetCount,
    });
    return { resetCount };
  }
}
