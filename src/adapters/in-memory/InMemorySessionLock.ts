/* eslint-disable functional/immutable-data */
import type { SessionLock } from "../../domain/ports/SessionLock.js";
import type { SessionId } from "../../domain/typedefs.js";

const settle = (): void => undefined;

/** Promise-chain mutex keyed by session id. */
export class InMemorySessionLock implements SessionLock {
  #tails = new Map<SessionId, Promise<void>>();

  runExclusive<T>(sessionId: SessionId, task: () => Promise<T>): Promise<T> {
    const previous = this.#tails.get(sessionId) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result.then(settle, settle).then(() => {
      if (this.#tails.get(sessionId) === tail) {
        this.#tails.delete(sessionId);
      }
    });
    this.#tails.set(sessionId, tail);

    return result;
  }

  /** Sessions with queued or running work */
  get busySessions(): number {
    return this.#tails.size;
  }
}
