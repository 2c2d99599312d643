import type { EnvelopeSlot } from "./ports/SessionGateway.js";
import type {
  HintId,
  HintTier,
  PlayerId,
  RoundPhase,
  SessionId,
  TimerCheckpointKind,
} from "./typedefs.js";

export type NarrationEvent = "round_intro" | "round_start" | "round_end" | "session_end";

export type PromptKind = "start_minigame" | "next_round_ready";

/** Broadcast notices that never reveal hint contents. */
export type SessionNotice =
  | {
      readonly kind: "hint_delivered";
      readonly sessionId: SessionId;
      readonly hintId: HintId;
      readonly roundIndex: number;
      readonly discovererId: PlayerId;
      readonly shared: boolean;
    }
  | {
      readonly kind: "hint_destroyed";
      readonly sessionId: SessionId;
      readonly hintId: HintId;
      readonly killerId: PlayerId;
    }
  | {
      readonly kind: "envelopes_reset";
      readonly sessionId: SessionId;
      readonly resetCount: number;
    }
  | {
      readonly kind: "player_joined";
      readonly sessionId: SessionId;
      readonly playerId: PlayerId;
      readonly displayName: string;
    };

/** Payload shape of every server → client message, keyed by `type`. */
export interface ServerPayloads {
  readonly narration: {
    readonly sessionId: SessionId;
    readonly event: NarrationEvent;
    readonly text: string;
    readonly roundIndex: number;
  };
  readonly prompt: {
    readonly sessionId: SessionId;
    readonly kind: PromptKind;
    readonly roundIndex: number;
    readonly miniGame?: string;
    readonly theme?: string;
  };
  readonly phase: {
    readonly sessionId: SessionId;
    readonly phase: RoundPhase;
    readonly roundIndex: number;
  };
  readonly timer: {
    readonly sessionId: SessionId;
    readonly event: TimerCheckpointKind;
    readonly text: string;
    readonly roundIndex: number;
    readonly miniGame?: string;
  };
  readonly envelopes_update: {
    readonly sessionId: SessionId;
    readonly playerId: PlayerId;
    readonly envelopes: readonly EnvelopeSlot[];
  };
  readonly hint_delivered: {
    readonly sessionId: SessionId;
    readonly hintId: HintId;
    readonly roundIndex: number;
    readonly tier: HintTier;
    readonly text: string;
    readonly discovererId: PlayerId;
    readonly shared: boolean;
  };
  readonly event: SessionNotice;
  readonly identified: { readonly playerId: PlayerId };
  readonly pong: Readonly<Record<string, never>>;
  readonly ack: { readonly received: unknown };
  readonly error: { readonly error: string };
}

export type ServerMessageType = keyof ServerPayloads;

/** Wire envelope pushed to clients */
export interface ServerMessage<TType extends string = string, TPayload extends object = object> {
  readonly type: TType;
  readonly payload: TPayload;
}

export function serverMessage<K extends ServerMessageType>(
  type: K,
  payload: ServerPayloads[K],
): ServerMessage<K, ServerPayloads[K]> {
  return { type, payload };
}
