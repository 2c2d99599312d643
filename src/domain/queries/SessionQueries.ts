import { envelopeSlotsFor, envelopeSummary, type EnvelopeSummary } from "../entities/EnvelopeRules.js";
import { projectHintForPlayer, type PlayerHintView } from "../entities/HintRules.js";
import { describeRoundStatus, type RoundStatus } from "../entities/RoundRules.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type {
  EnvelopeSlot,
  HintRecord,
  SessionGateway,
} from "../ports/SessionGateway.js";
import type { PlayerId, SessionId } from "../typedefs.js";

// Read-only views. They run outside the session lock and see the last saved state.

export async function roundStatus(
  { sessionGateway, scheduler }: { readonly sessionGateway: SessionGateway; readonly scheduler: Scheduler },
  sessionId: SessionId,
): Promise<RoundStatus> {
  const state = await sessionGateway.loadSession(sessionId);
  return describeRoundStatus(state.seed, state.round, scheduler.hasActiveTimer(sessionId));
}

export async function envelopeSummaryOf(
  sessionGateway: SessionGateway,
  sessionId: SessionId,
): Promise<EnvelopeSummary> {
  const state = await sessionGateway.loadSession(sessionId);
  return envelopeSummary(state.envelopes);
}

/** Undefined when the player is not registered. */
export async function playerEnvelopes(
  sessionGateway: SessionGateway,
  sessionId: SessionId,
  playerId: PlayerId,
): Promise<EnvelopeSlot[] | undefined> {
  const state = await sessionGateway.loadSession(sessionId);
  if (!state.players.some((player) => player.id === playerId)) {
    return undefined;
  }
  return envelopeSlotsFor(playerId, state.envelopes);
}

export async function listHints(
  sessionGateway: SessionGateway,
  sessionId: SessionId,
): Promise<HintRecord[]>;
export async function listHints(
  sessionGateway: SessionGateway,
  sessionId: SessionId,
  playerId: PlayerId,
): Promise<PlayerHintView[]>;
export async function listHints(
  sessionGateway: SessionGateway,
  sessionId: SessionId,
  playerId?: PlayerId,
): Promise<HintRecord[] | PlayerHintView[]> {
  const state = await sessionGateway.loadSession(sessionId);
  if (playerId === undefined) {
    return state.hintsHistory;
  }

  const views: PlayerHintView[] = [];
  for (const record of state.hintsHistory) {
    const view = projectHintForPlayer(record, playerId);
    if (view) views.push(view);
  }
  return views;
}
