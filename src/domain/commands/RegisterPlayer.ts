/* eslint-disable functional/immutable-data */
import { Command, type CommandContext } from "./Command.js";
import { recordEvent } from "../entities/SessionRules.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { Player } from "../ports/SessionGateway.js";
import type { PlayerId, PlayerRole, SessionId, TimePoint } from "../typedefs.js";

const WHITESPACE_PATTERN = /\s/;

export type RegisterPlayerResult =
  | { readonly ok: true; readonly created: boolean; readonly player: Player }
  | { readonly ok: false; readonly error: "join_locked" };

/**
 * Adds a player to the session. Registering an existing id returns the
 * stored player unchanged.
 */
export class RegisterPlayer extends Command<RegisterPlayerResult> {
  readonly type = "RegisterPlayer" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly playerId: PlayerId,
    public readonly displayName: string,
    public readonly at: TimePoint,
    public readonly role: PlayerRole = "other",
    public readonly character?: string,
  ) {
    super();

    const issues: string[] = [];
    if (playerId.length === 0 || WHITESPACE_PATTERN.test(playerId)) {
      issues.push("Player id must be a non-empty string without whitespace");
    }
    if (displayName.trim().length === 0) {
      issues.push("Display name must not be empty");
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
  }: CommandContext): Promise<RegisterPlayerResult> {
    const state = await sessionGateway.loadSession(this.sessionId);

    const existing = state.players.find((player) => player.id === this.playerId);
    if (existing) {
      return { ok: true, created: false, player: existing };
    }

    if (state.flags.joinLocked) {
      logger?.warn?.("Join rejected: session locked", {
        sessionId: this.sessionId,
        playerId: this.playerId,
      });
      return { ok: false, error: "join_locked" };
    }

    const player: Player = {
      id: this.playerId,
      displayName: this.displayName.trim(),
      ...(this.character !== undefined ? { character: this.character } : {}),
      role: this.role,
      envelopes: [],
      receivedHints: [],
    };
    state.players.push(player);
    if (this.role === "culprit") {
      state.flags.culpritPlayerId = this.playerId;
    }
    recordEvent(
      state,
      config,
      "player_joined",
      { playerId: player.id, displayName: player.displayName },
      this.at,
    );
    await sessionGateway.saveSession(state);

    logger?.info?.("Player registered", {
      type: this.type,
      sessionId: this.sessionId,
      playerId: player.id,
    });

    await bus.broadcastType("event", {
      kind: "player_joined",
      sessionId: this.sessionId,
      playerId: player.id,
      displayName: player.displayName,
    });
    return { ok: true, created: true, player };
  }
}
