import type { CommandContext } from "./Command.js";
import { recordEvent } from "../entities/SessionRules.js";
import type { NarrationEvent } from "../messages.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { TimePoint } from "../typedefs.js";
import { withTimeout } from "../withTimeout.js";

export const FALLBACK_NARRATION: Readonly<Record<NarrationEvent, string>> = {
  round_intro: "Get ready: the next mini-game is about to begin.",
  round_start: "The mini-game begins.",
  round_end: "Silence falls again. Glances are exchanged.",
  session_end: "The fog lifts: the time for accusations draws near.",
};

export interface NarrationRequest {
  readonly event: NarrationEvent;
  readonly roundIndex: number;
  /** Configured mood for this moment; also the offline text */
  readonly hint?: string;
  readonly context?: Readonly<Record<string, unknown>>;
}

export function buildNarrationPrompt({ event, hint, context }: NarrationRequest): string {
  let prompt =
    "You are the voice of an immersive narrator for a murder-mystery party. " +
    "Answer in one to three short sentences, without spoilers and without revealing the culprit. " +
    `Event: ${event}. `;
  if (hint) {
    prompt += `Mood to respect: ${hint}. `;
  }
  if (context && Object.keys(context).length > 0) {
    prompt += `Context: ${JSON.stringify(context)}`;
  }
  return prompt.trim();
}

/**
 * Produces narration text for a transition. Never throws: generator failures,
 * timeouts and empty answers fall back to the configured hint or a fixed
 * sentence, and the failure is noted in the session's event log.
 */
export async function composeNarration(
  { narrator, config, logger }: CommandContext,
  state: SessionState,
  request: NarrationRequest,
  at: TimePoint,
): Promise<string> {
  const fallback = request.hint?.trim() || FALLBACK_NARRATION[request.event];
  if (!config.narrationEnabled) {
    return fallback;
  }

  let reason: string;
  try {
    const text = await withTimeout("narration", config.narrationTimeoutMs, (signal) =>
      narrator.generate(buildNarrationPrompt(request), { signal }),
    );
    const trimmed = text.trim();
    if (trimmed.length > 0) {
      return trimmed;
    }
    reason = "empty response";
  } catch (error) {
    reason = error instanceof Error ? error.message : String(error);
  }

  logger?.warn?.("Narration unavailable; using fallback", {
    sessionId: state.id,
    event: request.event,
    reason,
  });
  recordEvent(
    state,
    config,
    "narration_fallback",
    { event: request.event, roundIndex: request.roundIndex, reason },
    at,
  );
  return fallback;
}
