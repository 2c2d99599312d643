/* eslint-disable functional/immutable-data */
import { Command, type CommandContext } from "./Command.js";
import { sendEnvelopeUpdates } from "./EnvelopeUpdates.js";
import { syncPlayerEnvelopes } from "../entities/EnvelopeRules.js";
import { recordEvent } from "../entities/SessionRules.js";
import type { EnvelopeId, PlayerId, SessionId, TimePoint } from "../typedefs.js";

export type AssignEnvelopeResult =
  | {
      readonly ok: true;
      readonly envelopeId: EnvelopeId;
      readonly previousOwner: PlayerId | null;
      readonly newOwner: PlayerId;
    }
  | { readonly ok: false; readonly reason: "not_found" | "unknown_player" };

/** Facilitator override: hands one envelope to a given player. */
export class AssignEnvelope extends Command<AssignEnvelopeResult> {
  readonly type = "AssignEnvelope" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly envelopeId: EnvelopeId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<AssignEnvelopeResult> {
    const { sessionGateway, config, logger } = ctx;
    const state = await sessionGateway.loadSession(this.sessionId);

    const envelope = state.envelopes.find((entry) => entry.id === this.envelopeId);
    if (!envelope) {
      return { ok: false, reason: "not_found" };
    }
    if (!state.players.some((player) => player.id === this.playerId)) {
      return { ok: false, reason: "unknown_player" };
    }

    const previousOwner = envelope.assignedPlayerId;
    envelope.assignedPlayerId = this.playerId;
    syncPlayerEnvelopes(state.players, state.envelopes);
    recordEvent(
      state,
      config,
      "envelope_assigned",
      { envelopeId: this.envelopeId, previousOwner, newOwner: this.playerId },
      this.at,
    );
    await sessionGateway.saveSession(state);

    logger?.info?.("Envelope reassigned", {
      type: this.type,
      sessionId: this.sessionId,
      envelopeId: this.envelopeId,
      previousOwner,
      newOwner: this.playerId,
    });

    const recipients =
      previousOwner !== null && previousOwner !== this.playerId
        ? [previousOwner, this.playerId]
        : [this.playerId];
    await sendEnvelopeUpdates(state, recipients, ctx);

    return {
      ok: true,
      envelopeId: this.envelopeId,
      previousOwner,
      newOwner: this.playerId,
    };
  }
}
