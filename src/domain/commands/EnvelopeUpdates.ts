import type { CommandContext } from "./Command.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { PlayerId } from "../typedefs.js";

/** Sends each listed player their own envelope view; unknown ids are skipped. */
export async function sendEnvelopeUpdates(
  state: SessionState,
  playerIds: readonly PlayerId[],
  { bus }: Pick<CommandContext, "bus">,
): Promise<void> {
  const recipients = state.players.filter((player) => playerIds.includes(player.id));
  await Promise.all(
    recipients.map((player) =>
      bus.sendTypeToPlayer(player.id, "envelopes_update", {
        sessionId: state.id,
        playerId: player.id,
        envelopes: player.envelopes,
      }),
    ),
  );
}
