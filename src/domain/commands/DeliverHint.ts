/* eslint-disable functional/immutable-data */
import { randomUUID } from "node:crypto";

import { Command, type CommandContext } from "./Command.js";
import { buildDeliveries, resolveOtherTier } from "../entities/HintRules.js";
import { recordEvent } from "../entities/SessionRules.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { HintDeliveryError } from "../errors/HintDeliveryError.js";
import type { HintRecord } from "../ports/SessionGateway.js";
import type { HintTier, PlayerId, SessionId, TimePoint } from "../typedefs.js";

/**
 * A player found a clue. Everyone gets a copy: the discoverer at the tier
 * they found, the others at the same tier when shared or at the degraded tier
 * the round's policy gives otherwise.
 */
export class DeliverHint extends Command<HintRecord> {
  readonly type = "DeliverHint" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly roundIndex: number,
    public readonly discovererId: PlayerId,
    public readonly tier: HintTier,
    public readonly share: boolean,
    public readonly at: TimePoint,
  ) {
    super();

    const issues: string[] = [];
    if (!Number.isInteger(roundIndex) || roundIndex < 1) {
      issues.push("Round index must be a positive integer");
    }
    if (discovererId.trim().length === 0) {
      issues.push("Discoverer id must not be empty");
    }
    if (tier.trim().length === 0) {
      issues.push("Tier must not be empty");
    }
    if (issues.length > 0) {
      throw GameCommandInputError.because(issues);
    }
  }

  async execute({
    sessionGateway,
    bus,
    config,
    logger,
  }: CommandContext): Promise<HintRecord> {
    const state = await sessionGateway.loadSession(this.sessionId);

    if (!state.players.some((player) => player.id === this.discovererId)) {
      throw new HintDeliveryError("unknown_discoverer");
    }

    const prepared = state.preparedRounds[String(this.roundIndex)];
    if (!prepared || Object.keys(prepared.hints).length === 0) {
      throw new HintDeliveryError("round_not_prepared");
    }
    if (!Object.hasOwn(prepared.hints, this.tier)) {
      throw new HintDeliveryError("tier_unavailable");
    }

    const otherTier = resolveOtherTier(
      this.tier,
      this.share,
      prepared.hints,
      prepared.sharingRules,
    );
    const record: HintRecord = {
      id: randomUUID(),
      roundIndex: this.roundIndex,
      discovererId: this.discovererId,
      sourceTier: this.tier,
      otherTier,
      shared: this.share,
      deliveries: buildDeliveries(
        state.players,
        this.discovererId,
        this.tier,
        otherTier,
        prepared.hints,
      ),
      createdAt: this.at,
      destroyed: false,
      destroyedBy: null,
      destroyedAt: null,
    };

    state.hintsHistory.push(record);
    for (const player of state.players) {
      player.receivedHints.push(record.id);
    }
    recordEvent(
      state,
      config,
      "hint_delivered",
      {
        hintId: record.id,
        roundIndex: record.roundIndex,
        discovererId: record.discovererId,
        shared: record.shared,
      },
      this.at,
    );
    await sessionGateway.saveSession(state);

    logger?.info?.("Hint delivered", {
      type: this.type,
      sessionId: this.sessionId,
      hintId: record.id,
      sourceTier: record.sourceTier,
      otherTier: record.otherTier,
      shared: record.shared,
    });

    await Promise.all(
      record.deliveries.map((delivery) =>
        bus.sendTypeToPlayer(delivery.playerId, "hint_delivered", {
          sessionId: this.sessionId,
          hintId: record.id,
          roundIndex: record.roundIndex,
          tier: delivery.tier,
          text: delivery.text,
          discovererId: record.discovererId,
          shared: record.shared,
        }),
      ),
    );
    await bus.broadcastType("event", {
      kind: "hint_delivered",
      sessionId: this.sessionId,
      hintId: record.id,
      roundIndex: record.roundIndex,
      discovererId: record.discovererId,
      shared: record.shared,
    });

    return record;
  }
}
