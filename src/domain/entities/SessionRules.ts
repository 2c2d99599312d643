/* eslint-disable functional/immutable-data */
import { randomInt, randomUUID } from "node:crypto";

import type { GameConfig } from "../GameConfig.js";
import type { SessionEvent, SessionState } from "../ports/SessionGateway.js";
import type { StorySeed } from "../StorySeed.js";
import type { SessionId, TimePoint } from "../typedefs.js";

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;
const JOIN_CODE_ALPHABET = "ABCDEFGHJKLMNPQRSTUVWXYZ";
export const JOIN_CODE_LENGTH = 6;

export function isValidSessionId(value: unknown): value is SessionId {
  return typeof value === "string" && SESSION_ID_PATTERN.test(value);
}

export function generateJoinCode(): string {
  let code = "";
  for (let i = 0; i < JOIN_CODE_LENGTH; i += 1) {
    code += JOIN_CODE_ALPHABET.charAt(randomInt(JOIN_CODE_ALPHABET.length));
  }
  return code;
}

export function normalizeJoinCode(joinCode: string): string {
  return joinCode.trim().toUpperCase();
}

/** Fresh session: no players, unassigned pool, round 0 in IDLE. */
export function createSessionState(
  id: SessionId,
  seed: StorySeed,
  joinCode: string = generateJoinCode(),
): SessionState {
  return {
    id,
    joinCode,
    players: [],
    flags: {
      phaseLabel: "WAITING_START",
      joinLocked: false,
      culpritPlayerId: null,
      canon: {},
    },
    events: [],
    preparedRounds: {},
    envelopes: seed.envelopes.map((definition) => ({
      id: definition.id,
      importance: definition.importance,
      ...(definition.description !== undefined
        ? { description: definition.description }
        : {}),
      assignedPlayerId: null,
    })),
    round: { phase: "IDLE", roundIndex: 0, results: {} },
    hintsHistory: [],
    killerActions: { destroyUsed: 0 },
    seed,
  };
}

/** Appends to the audit log, dropping the oldest entries past the cap. */
export function recordEvent(
  state: SessionState,
  config: Pick<GameConfig, "maxSessionEvents">,
  kind: string,
  payload: Readonly<Record<string, unknown>>,
  at: TimePoint,
  scope = "system",
): SessionEvent {
  const event: SessionEvent = { id: randomUUID(), kind, scope, payload, ts: at };
  state.events.push(event);

  const overflow = state.events.length - config.maxSessionEvents;
  if (overflow > 0) {
    state.events.splice(0, overflow);
  }
  return event;
}
