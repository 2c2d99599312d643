/* eslint-disable functional/immutable-data */
import type { CommandContext } from "./Command.js";
import { recordEvent } from "../entities/SessionRules.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { RoundPhase, TimePoint } from "../typedefs.js";

/** Moves the session to `phase` and logs it; the caller saves and announces. */
export function enterPhase(
  state: SessionState,
  phase: RoundPhase,
  at: TimePoint,
  { config }: Pick<CommandContext, "config">,
): void {
  const from = state.round.phase;
  state.round.phase = phase;
  state.flags.phaseLabel = `ROUND_${state.round.roundIndex}_${phase}`;
  recordEvent(
    state,
    config,
    "phase_changed",
    { from, to: phase, roundIndex: state.round.roundIndex },
    at,
  );
}

export async function announcePhase(
  state: SessionState,
  { bus }: Pick<CommandContext, "bus">,
): Promise<void> {
  await bus.broadcastType("phase", {
    sessionId: state.id,
    phase: state.round.phase,
    roundIndex: state.round.roundIndex,
  });
}
