/* eslint-disable functional/immutable-data */
import { Command, type CommandContext } from "./Command.js";
import { recordEvent } from "../entities/SessionRules.js";
import type { SessionId, TimePoint } from "../typedefs.js";

export interface SetJoinLockResult {
  readonly ok: true;
  readonly joinLocked: boolean;
}

export class SetJoinLock extends Command<SetJoinLockResult> {
  readonly type = "SetJoinLock" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly locked: boolean,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ sessionGateway, config }: CommandContext): Promise<SetJoinLockResult> {
    const state = await sessionGateway.loadSession(this.sessionId);
    if (state.flags.joinLocked !== this.locked) {
      state.flags.joinLocked = this.locked;
      recordEvent(state, config, "join_lock_changed", { joinLocked: this.locked }, this.at);
      await sessionGateway.saveSession(state);
    }
    return { ok: true, joinLocked: state.flags.joinLocked };
  }
}
