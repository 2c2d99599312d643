/* eslint-disable functional/immutable-data */
import type { RoundControlRejection } from "./BeginNextRound.js";
import { Command, type CommandContext } from "./Command.js";
import { composeNarration } from "./Narration.js";
import { announcePhase, enterPhase } from "./PhaseTransitions.js";
import { isLegalTransition, roundAt } from "../entities/RoundRules.js";
import type { RoundResult } from "../ports/SessionGateway.js";
import type { PlayerId, SessionId, TimePoint } from "../typedefs.js";

export type FinishCurrentRoundResult =
  | RoundControlRejection
  | {
      readonly ok: true;
      readonly phase: "COOLDOWN";
      readonly roundIndex: number;
      readonly result: RoundResult;
    };

export class FinishCurrentRound extends Command<FinishCurrentRoundResult> {
  readonly type = "FinishCurrentRound" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly winners: readonly PlayerId[],
    public readonly metadata: Readonly<Record<string, unknown>>,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<FinishCurrentRoundResult> {
    const { sessionGateway, scheduler, bus, logger } = ctx;
    const state = await sessionGateway.loadSession(this.sessionId);
    const { phase, roundIndex } = state.round;

    if (!isLegalTransition("finishCurrentRound", phase)) {
      return { ok: false, error: "illegal_transition", phase };
    }

    await scheduler.abortTimer(this.sessionId);

    const result: RoundResult = {
      winners: [...this.winners],
      metadata: { ...this.metadata },
      finishedAt: this.at,
    };
    state.round.results[String(roundIndex)] = result;
    enterPhase(state, "COOLDOWN", this.at, ctx);

    const outro = roundAt(state.seed, roundIndex)?.narration.outro;
    const text = await composeNarration(
      ctx,
      state,
      {
        event: "round_end",
        roundIndex,
        ...(outro !== undefined ? { hint: outro } : {}),
        context: { roundIndex },
      },
      this.at,
    );
    await sessionGateway.saveSession(state);

    logger?.info?.("Round finished", {
      type: this.type,
      sessionId: this.sessionId,
      roundIndex,
      winners: result.winners,
    });

    await announcePhase(state, ctx);
    await bus.broadcastType("narration", {
      sessionId: this.sessionId,
      event: "round_end",
      text,
      roundIndex,
    });
    await bus.broadcastType("prompt", {
      sessionId: this.sessionId,
      kind: "next_round_ready",
      roundIndex,
    });

    return { ok: true, phase: "COOLDOWN", roundIndex, result };
  }
}
