/* eslint-disable functional/immutable-data */
import { createSessionState, isValidSessionId, normalizeJoinCode } from "../../domain/entities/SessionRules.js";
import { GameCommandInputError } from "../../domain/errors/GameCommandInputError.js";
import type { SessionGateway, SessionState } from "../../domain/ports/SessionGateway.js";
import { createStorySeed, type StorySeed } from "../../domain/StorySeed.js";
import type { SessionId } from "../../domain/typedefs.js";

export type SeedFactory = (sessionId: SessionId) => StorySeed;

export class InMemorySessionGateway implements SessionGateway {
  #sessions = new Map<SessionId, SessionState>();
  readonly #seedFor: SeedFactory;

  constructor(seedFor: SeedFactory = () => createStorySeed()) {
    this.#seedFor = seedFor;
  }

  async loadSession(sessionId: SessionId): Promise<SessionState> {
    const stored = this.#sessions.get(sessionId) ?? this.#create(sessionId);
    return structuredClone(stored);
  }

  async saveSession(state: SessionState): Promise<void> {
    this.#assertValidId(state.id);
    this.#sessions.set(state.id, structuredClone(state));
  }

  async resetSession(sessionId: SessionId): Promise<SessionState> {
    this.#sessions.delete(sessionId);
    return structuredClone(this.#create(sessionId));
  }

  async findSessionIdByJoinCode(joinCode: string): Promise<SessionId | undefined> {
    const wanted = normalizeJoinCode(joinCode);
    if (wanted.length === 0) return undefined;
    for (const state of this.#sessions.values()) {
      if (state.joinCode.toUpperCase() === wanted) return state.id;
    }
    return undefined;
  }

  #create(sessionId: SessionId): SessionState {
    this.#assertValidId(sessionId);
    const state = createSessionState(sessionId, this.#seedFor(sessionId));
    this.#sessions.set(sessionId, state);
    return state;
  }

  #assertValidId(sessionId: SessionId): void {
    if (!isValidSessionId(sessionId)) {
      throw GameCommandInputError.because([`Invalid session id: ${sessionId}`]);
    }
  }
}
