/* eslint-disable functional/immutable-data */
import { Command, type CommandContext } from "./Command.js";
import { composeNarration } from "./Narration.js";
import { announcePhase, enterPhase } from "./PhaseTransitions.js";
import { isLegalTransition, roundAt } from "../entities/RoundRules.js";
import { recordEvent } from "../entities/SessionRules.js";
import type { RoundDefinition } from "../StorySeed.js";
import type { RoundPhase, SessionId, TimePoint } from "../typedefs.js";

export type RoundControlRejection = {
  readonly ok: false;
  readonly error: "illegal_transition" | "no_rounds";
  readonly phase: RoundPhase;
};

export type BeginNextRoundResult =
  | RoundControlRejection
  | {
      readonly ok: true;
      readonly done: true;
      readonly phase: RoundPhase;
      readonly roundIndex: number;
    }
  | {
      readonly ok: true;
      readonly done: false;
      readonly phase: "INTRO";
      readonly roundIndex: number;
      readonly round: RoundDefinition;
    };

/**
 * Announces the next round of the plan. Does not start the physical game:
 * the facilitator confirms that separately.
 */
export class BeginNextRound extends Command<BeginNextRoundResult> {
  readonly type = "BeginNextRound" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<BeginNextRoundResult> {
    const { sessionGateway, scheduler, bus, logger, config } = ctx;
    const state = await sessionGateway.loadSession(this.sessionId);
    const { phase } = state.round;
    const totalRounds = state.seed.rounds.length;

    if (totalRounds === 0) {
      return { ok: false, error: "no_rounds", phase };
    }
    if (!isLegalTransition("beginNextRound", phase)) {
      return { ok: false, error: "illegal_transition", phase };
    }

    await scheduler.abortTimer(this.sessionId);

    const roundIndex = Math.min(state.round.roundIndex + 1, totalRounds + 1);
    state.round.roundIndex = roundIndex;
    const round = roundAt(state.seed, roundIndex);

    if (!round) {
      const text = await composeNarration(
        ctx,
        state,
        { event: "session_end", roundIndex },
        this.at,
      );
      recordEvent(state, config, "session_end", { roundIndex }, this.at);
      await sessionGateway.saveSession(state);

      logger?.info?.("No rounds left; session ending", {
        type: this.type,
        sessionId: this.sessionId,
        roundIndex,
      });

      await bus.broadcastType("narration", {
        sessionId: this.sessionId,
        event: "session_end",
        text,
        roundIndex,
      });
      return { ok: true, done: true, phase, roundIndex };
    }

    enterPhase(state, "INTRO", this.at, ctx);
    const text = await composeNarration(
      ctx,
      state,
      {
        event: "round_intro",
        roundIndex,
        ...(round.narration.intro !== undefined ? { hint: round.narration.intro } : {}),
        context: { roundIndex, miniGame: round.miniGame },
      },
      this.at,
    );
    await sessionGateway.saveSession(state);

    logger?.info?.("Round introduced", {
      type: this.type,
      sessionId: this.sessionId,
      roundIndex,
      miniGame: round.miniGame,
    });

    await announcePhase(state, ctx);
    await bus.broadcastType("narration", {
      sessionId: this.sessionId,
      event: "round_intro",
      text,
      roundIndex,
    });
    await bus.broadcastType("prompt", {
      sessionId: this.sessionId,
      kind: "start_minigame",
      roundIndex,
      miniGame: round.miniGame,
      ...(round.theme !== undefined ? { theme: round.theme } : {}),
    });

    return { ok: true, done: false, phase: "INTRO", roundIndex, round };
  }
}
