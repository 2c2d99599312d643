/* eslint-disable functional/immutable-data */
import { Command, type CommandContext } from "./Command.js";
import { findHint } from "../entities/HintRules.js";
import { recordEvent } from "../entities/SessionRules.js";
import { HintDestroyError } from "../errors/HintDestroyError.js";
import type { HintRecord } from "../ports/SessionGateway.js";
import type { HintId, PlayerId, SessionId, TimePoint } from "../typedefs.js";

/** The culprit burns a delivered hint, within the story's destroy quota. */
export class DestroyHint extends Command<HintRecord> {
  readonly type = "DestroyHint" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly hintId: HintId,
    public readonly killerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({
    sessionGateway,
    bus,
    config,
    logger,
  }: CommandContext): Promise<HintRecord> {
    const state = await sessionGateway.loadSession(this.sessionId);

    const record = findHint(state.hintsHistory, this.hintId);
    if (!record) {
      throw new HintDestroyError("not_found");
    }
    if (record.destroyed) {
      throw new HintDestroyError("already_destroyed");
    }

    const culprit = state.flags.culpritPlayerId;
    if (culprit !== null && culprit !== this.killerId) {
      throw new HintDestroyError("not_authorized");
    }

    const quota = state.seed.rules.destroyQuota;
    if (quota > 0 && state.killerActions.destroyUsed >= quota) {
      throw new HintDestroyError("quota_reached");
    }

    record.destroyed = true;
    record.destroyedBy = this.killerId;
    record.destroyedAt = this.at;
    state.killerActions.destroyUsed += 1;
    recordEvent(
      state,
      config,
      "hint_destroyed",
      { hintId: this.hintId, killerId: this.killerId },
      this.at,
    );
    await sessionGateway.saveSession(state);

    logger?.info?.("Hint destroyed", {
      type: this.type,
      sessionId: this.sessionId,
      hintId: this.hintId,
      destroyUsed: state.killerActions.destroyUsed,
      quota,
    });

    await bus.broadcastType("event", {
      kind: "hint_destroyed",
      sessionId: this.sessionId,
      hintId: this.hintId,
      killerId: this.killerId,
    });
    return record;
  }
}
