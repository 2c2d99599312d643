/* eslint-disable functional/immutable-data */
import { Command, type CommandContext } from "./Command.js";
import { roundAt } from "../entities/RoundRules.js";
import { recordEvent } from "../entities/SessionRules.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { PreparedRound } from "../ports/SessionGateway.js";
import type { HintTier, SessionId, TimePoint } from "../typedefs.js";

export type PrepareRoundResult =
  | { readonly ok: true; readonly prepared: PreparedRound }
  | { readonly ok: false; readonly error: "unknown_round" };

/**
 * Stores the hint pack of a round ahead of play. Texts given with the command
 * win over the story's static texts; either way only the tiers the round's
 * hint policy declares are kept. The sharing rules always come from the story.
 */
export class PrepareRound extends Command<PrepareRoundResult> {
  readonly type = "PrepareRound" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly roundIndex: number,
    public readonly at: TimePoint,
    public readonly hints?: Readonly<Record<HintTier, string>>,
  ) {
    super();

    if (!Number.isInteger(roundIndex) || roundIndex < 1) {
      throw GameCommandInputError.because(["Round index must be a positive integer"]);
    }
  }

  async execute({
    sessionGateway,
    config,
    logger,
  }: CommandContext): Promise<PrepareRoundResult> {
    const state = await sessionGateway.loadSession(this.sessionId);
    const round = roundAt(state.seed, this.roundIndex);
    if (!round) {
      return { ok: false, error: "unknown_round" };
    }

    const prepared: PreparedRound = {
      roundIndex: this.roundIndex,
      preparedAt: this.at,
      hints: pickTiers(this.hints ?? round.hints ?? {}, round.hintPolicy.tiers),
      sharingRules: { ...round.hintPolicy.sharingRules },
    };
    state.preparedRounds[String(this.roundIndex)] = prepared;
    recordEvent(
      state,
      config,
      "round_prepared",
      { roundIndex: this.roundIndex, tiers: Object.keys(prepared.hints) },
      this.at,
    );
    await sessionGateway.saveSession(state);

    logger?.info?.("Round prepared", {
      type: this.type,
      sessionId: this.sessionId,
      roundIndex: this.roundIndex,
    });
    return { ok: true, prepared };
  }
}

function pickTiers(
  texts: Readonly<Record<HintTier, string>>,
  tiers: readonly HintTier[],
): Record<HintTier, string> {
  const picked: Record<HintTier, string> = {};
  for (const tier of tiers) {
    const text = texts[tier];
    if (text !== undefined) {
      picked[tier] = text;
    }
  }
  return picked;
}
