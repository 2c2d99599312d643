/* eslint-disable functional/immutable-data */
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { isMissingFile } from "./fsErrors.js";
import { parseSessionDocument } from "./sessionDocument.js";
import {
  GameCommandInputError,
  createSessionState,
  isValidSessionId,
  normalizeJoinCode,
  type Logger,
  type SessionGateway,
  type SessionId,
  type SessionState,
  type StorySeed,
} from "../core.js";

interface FileSessionGatewayOptions {
  readonly dataDir: string;
  readonly seedFor: (sessionId: SessionId) => StorySeed;
  readonly logger?: Logger;
}

const SESSION_FILE = "session.json";

/**
 * One JSON document per session under `<dataDir>/sessions/<id>/`, fronted by
 * an in-memory cache. Writes go to a temporary file that is then renamed over
 * the document; the cache only changes after the rename succeeds.
 *
 * Loading an unknown id creates the session once: concurrent loads of the
 * same id share the pending creation.
 */
export class FileSessionGateway implements SessionGateway {
  readonly #sessionsDir: string;
  readonly #seedFor: FileSessionGatewayOptions["seedFor"];
  readonly #logger: Logger | undefined;
  #cache = new Map<SessionId, SessionState>();
  #loading = new Map<SessionId, Promise<SessionState>>();
  #writeSeq = 0;

  constructor({ dataDir, seedFor, logger }: FileSessionGatewayOptions) {
    this.#sessionsDir = join(dataDir, "sessions");
    this.#seedFor = seedFor;
    this.#logger = logger;
  }

  async loadSession(sessionId: SessionId): Promise<SessionState> {
    this.#assertValidId(sessionId);

    const cached = this.#cache.get(sessionId);
    if (cached) return structuredClone(cached);

    let pending = this.#loading.get(sessionId);
    if (!pending) {
      pending = this.#loadOrCreate(sessionId).finally(() => {
        this.#loading.delete(sessionId);
      });
      this.#loading.set(sessionId, pending);
    }
    return structuredClone(await pending);
  }

  async saveSession(state: SessionState): Promise<void> {
    this.#assertValidId(state.id);

    const dir = join(this.#sessionsDir, state.id);
    const target = join(dir, SESSION_FILE);
    const temp = `${target}.${process.pid}.${(this.#writeSeq += 1)}.tmp`;

    await mkdir(dir, { recursive: true });
    try {
      await writeFile(temp, JSON.stringify(state, null, 2), "utf8");
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }

    this.#cache.set(state.id, structuredClone(state));
  }

  async resetSession(sessionId: SessionId): Promise<SessionState> {
    this.#assertValidId(sessionId);

    await rm(join(this.#sessionsDir, sessionId), { recursive: true, force: true });
    this.#cache.delete(sessionId);

    const created = createSessionState(sessionId, this.#seedFor(sessionId));
    await this.saveSession(created);
    this.#logger?.warn?.("Session reset on disk", { sessionId });
    return structuredClone(created);
  }

  async findSessionIdByJoinCode(joinCode: string): Promise<SessionId | undefined> {
    const wanted = normalizeJoinCode(joinCode);
    if (wanted.length === 0) return undefined;

    for (const state of this.#cache.values()) {
      if (state.joinCode.toUpperCase() === wanted) return state.id;
    }

    for (const sessionId of await this.#listStoredIds()) {
      if (this.#cache.has(sessionId)) continue;
      const stored = await this.#read(sessionId);
      if (stored?.joinCode.toUpperCase() === wanted) return sessionId;
    }
    return undefined;
  }

  async #loadOrCreate(sessionId: SessionId): Promise<SessionState> {
    const stored = await this.#read(sessionId);
    if (stored) {
      this.#cache.set(sessionId, stored);
      return stored;
    }

    const created = createSessionState(sessionId, this.#seedFor(sessionId));
    await this.saveSession(created);
    this.#logger?.info?.("Session created", { sessionId, joinCode: created.joinCode });
    return created;
  }

  async #read(sessionId: SessionId): Promise<SessionState | undefined> {
    try {
      const text = await readFile(join(this.#sessionsDir, sessionId, SESSION_FILE), "utf8");
      return parseSessionDocument(JSON.parse(text));
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
  }

  async #listStoredIds(): Promise<SessionId[]> {
    try {
      const entries = await readdir(this.#sessionsDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory() && isValidSessionId(entry.name))
        .map((entry) => entry.name);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
  }

  #assertValidId(sessionId: SessionId): void {
    if (!isValidSessionId(sessionId)) {
      throw GameCommandInputError.because([`Invalid session id: ${sessionId}`]);
    }
  }
}
