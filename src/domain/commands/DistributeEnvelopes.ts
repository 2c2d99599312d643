import { Command, type CommandContext } from "./Command.js";
import { sendEnvelopeUpdates } from "./EnvelopeUpdates.js";
import { distributeEquitable, syncPlayerEnvelopes } from "../entities/EnvelopeRules.js";
import { recordEvent } from "../entities/SessionRules.js";
import type { PlayerId, SessionId, TimePoint } from "../typedefs.js";

export interface DistributeEnvelopesResult {
  readonly assignedCount: number;
  readonly leftCount: number;
  readonly perPlayerCounts: Readonly<Record<PlayerId, number>>;
}

/**
 * Tops up the envelope pool fairly across the registered players. Envelopes
 * that already have an owner stay where they are.
 */
export class DistributeEnvelopes extends Command<DistributeEnvelopesResult> {
  readonly type = "DistributeEnvelopes" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<DistributeEnvelopesResult> {
    const { sessionGateway, config, logger } = ctx;
    const state = await sessionGateway.loadSession(this.sessionId);
    const playerIds = state.players.map((player) => player.id);

    const { assignedCount, leftCount, perPlayerCounts } = distributeEquitable(
      playerIds,
      state.envelopes,
    );
    if (playerIds.length === 0) {
      logger?.warn?.("No players to distribute envelopes to", {
        sessionId: this.sessionId,
      });
      return { assignedCount, leftCount, perPlayerCounts };
    }

    syncPlayerEnvelopes(state.players, state.envelopes);
    recordEvent(
      state,
      config,
      "envelopes_distributed",
      { assignedCount, leftCount },
      this.at,
    );
    await sessionGateway.saveSession(state);

    logger?.info?.("Envelopes distributed", {
      type: this.type,
      sessionId: this.sessionId,
      assignedCount,
      leftCount,
    });

    await sendEnvelopeUpdates(state, playerIds, ctx);
    return { assignedCount, leftCount, perPlayerCounts };
  }
}
