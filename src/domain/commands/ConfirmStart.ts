import type { RoundControlRejection } from "./BeginNextRound.js";
import { Command, type CommandContext } from "./Command.js";
import { composeNarration } from "./Narration.js";
import { announcePhase, enterPhase } from "./PhaseTransitions.js";
import { isLegalTransition, planSoftTimer, roundAt } from "../entities/RoundRules.js";
import type { SessionId, TimePoint } from "../typedefs.js";

export type ConfirmStartResult =
  | RoundControlRejection
  | {
      readonly ok: true;
      readonly phase: "ACTIVE";
      readonly roundIndex: number;
      /** Soft limit of the round, or null when it runs untimed */
      readonly timerSeconds: number | null;
    };

/** The facilitator started the physical mini-game. */
export class ConfirmStart extends Command<ConfirmStartResult> {
  readonly type = "ConfirmStart" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<ConfirmStartResult> {
    const { sessionGateway, scheduler, bus, config, logger } = ctx;
    const state = await sessionGateway.loadSession(this.sessionId);
    const { phase, roundIndex } = state.round;

    if (!isLegalTransition("confirmStart", phase)) {
      return { ok: false, error: "illegal_transition", phase };
    }

    const round = roundAt(state.seed, roundIndex);
    enterPhase(state, "ACTIVE", this.at, ctx);
    const text = await composeNarration(
      ctx,
      state,
      {
        event: "round_start",
        roundIndex,
        ...(round ? { context: { roundIndex, miniGame: round.miniGame } } : {}),
      },
      this.at,
    );
    await sessionGateway.saveSession(state);

    const maxSeconds = round?.maxSeconds;
    const timerSeconds = maxSeconds !== undefined && maxSeconds > 0 ? maxSeconds : null;
    if (timerSeconds !== null) {
      await scheduler.startTimer(
        this.sessionId,
        planSoftTimer(timerSeconds, config.halfTimeThresholdSeconds),
        { roundIndex, ...(round ? { miniGame: round.miniGame } : {}) },
      );
    }

    logger?.info?.("Round started", {
      type: this.type,
      sessionId: this.sessionId,
      roundIndex,
      timerSeconds,
    });

    await announcePhase(state, ctx);
    await bus.broadcastType("narration", {
      sessionId: this.sessionId,
      event: "round_start",
      text,
      roundIndex,
    });

    return { ok: true, phase: "ACTIVE", roundIndex, timerSeconds };
  }
}
