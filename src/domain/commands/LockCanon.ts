/* eslint-disable functional/immutable-data */
import { Command, type CommandContext } from "./Command.js";
import { recordEvent } from "../entities/SessionRules.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { SessionId, TimePoint } from "../typedefs.js";

export type LockCanonResult =
  | { readonly ok: true; readonly canon: Readonly<Record<string, string>> }
  | { readonly ok: false; readonly error: "canon_locked" };

/**
 * Fixes the secret story facts (weapon, location, motive, ...) once per
 * session. The facts are never broadcast; the event log only names the keys.
 */
export class LockCanon extends Command<LockCanonResult> {
  readonly type = "LockCanon" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly facts: Readonly<Record<string, string>>,
    public readonly at: TimePoint,
  ) {
    super();

    const issues: string[] = [];
    if (Object.keys(facts).length === 0) {
      issues.push("At least one canon fact is required");
    }
    for (const [key, value] of Object.entries(facts)) {
      if (key.trim().length === 0 || value.trim().length === 0) {
        issues.push(`Canon fact "${key}" must have a name and a value`);
      }
    }
    if (issues.length > 0) {
      throw GameCommandInputError.because(issues);
    }
  }

  async execute({ sessionGateway, config, logger }: CommandContext): Promise<LockCanonResult> {
    const state = await sessionGateway.loadSession(this.sessionId);
    if (Object.keys(state.flags.canon).length > 0) {
      return { ok: false, error: "canon_locked" };
    }

    state.flags.canon = { ...this.facts };
    recordEvent(state, config, "canon_locked", { keys: Object.keys(this.facts) }, this.at);
    await sessionGateway.saveSession(state);

    logger?.info?.("Canon locked", { sessionId: this.sessionId });
    return { ok: true, canon: state.flags.canon };
  }
}
