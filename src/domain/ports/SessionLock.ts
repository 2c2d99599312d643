import type { SessionId } from "../typedefs.js";

/**
 * Serializes work per session. Tasks for one session run one at a time in
 * arrival order; tasks for different sessions never wait on each other.
 * A task must not re-enter the lock of any session.
 */
export interface SessionLock {
  runExclusive<T>(sessionId: SessionId, task: () => Promise<T>): Promise<T>;
}
