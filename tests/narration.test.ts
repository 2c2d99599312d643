import { describe, expect, it } from "vitest";

import { BeginNextRound } from "../src/domain/commands/BeginNextRound.js";
import { ConfirmStart } from "../src/domain/commands/ConfirmStart.js";
import { dispatchCommand } from "../src/domain/commands/dispatchCommand.js";
import { FALLBACK_NARRATION, buildNarrationPrompt } from "../src/domain/commands/Narration.js";
import { broadcasts, createCommandContext } from "./support/mocks.js";

const SESSION_ID = "party-1";

const narrationTexts = (context: ReturnType<typeof createCommandContext>) =>
  broadcasts(context.bus)
    .filter((message) => message.type === "narration")
    .map((message) => ("text" in message.payload ? message.payload.text : undefined));

describe("narration", () => {
  it("falls back to the round's mood when the generator fails", async () => {
    const context = createCommandContext();
    context.narrator.generate.mockRejectedValue(new Error("model offline"));

    await dispatchCommand(new BeginNextRound(SESSION_ID, 1_000), context);

    expect(narrationTexts(context)).toEqual(["Candles flicker in the library."]);
    const state = await context.sessionGateway.loadSession(SESSION_ID);
    const fallback = state.events.find((event) => event.kind === "narration_fallback");
    expect(fallback).toMatchObject({
      payload: { event: "round_intro", roundIndex: 1, reason: "model offline" },
      ts: 1_000,
    });
    expect(state.round.phase).toBe("INTRO");
  });

  it("falls back to the fixed sentence on an empty answer", async () => {
    const context = createCommandContext();
    await dispatchCommand(new BeginNextRound(SESSION_ID, 1_000), context);
    context.narrator.generate.mockResolvedValue("   ");

    await dispatchCommand(new ConfirmStart(SESSION_ID, 2_000), context);

    expect(narrationTexts(context)[1]).toBe(FALLBACK_NARRATION.round_start);
    const state = await context.sessionGateway.loadSession(SESSION_ID);
    expect(state.events.find((event) => event.kind === "narration_fallback")?.payload).toEqual({
      event: "round_start",
      roundIndex: 1,
      reason: "empty response",
    });
  });

  it("gives up on a generator that does not answer in time", async () => {
    const context = createCommandContext({ config: { narrationTimeoutMs: 10 } });
    context.narrator.generate.mockReturnValue(new Promise<string>(() => undefined));

    const result = await dispatchCommand(new BeginNextRound(SESSION_ID, 1_000), context);

    expect(result.ok).toBe(true);
    expect(narrationTexts(context)).toEqual(["Candles flicker in the library."]);
    const state = await context.sessionGateway.loadSession(SESSION_ID);
    expect(state.events.find((event) => event.kind === "narration_fallback")?.payload).toEqual({
      event: "round_intro",
      roundIndex: 1,
      reason: "narration timed out after 10ms",
    });
  });

  it("skips the generator entirely when narration is disabled", async () => {
    const context = createCommandContext({ config: { narrationEnabled: false } });

    await dispatchCommand(new BeginNextRound(SESSION_ID, 1_000), context);
    await dispatchCommand(new ConfirmStart(SESSION_ID, 2_000), context);

    expect(context.narrator.generate).not.toHaveBeenCalled();
    expect(narrationTexts(context)).toEqual([
      "Candles flicker in the library.",
      FALLBACK_NARRATION.round_start,
    ]);
    const state = await context.sessionGateway.loadSession(SESSION_ID);
    expect(state.events.some((event) => event.kind === "narration_fallback")).toBe(false);
  });
});

describe("buildNarrationPrompt", () => {
  it("includes the event, the mood and the context", () => {
    const prompt = buildNarrationPrompt({
      event: "round_end",
      roundIndex: 2,
      hint: "rain on the windows",
      context: { roundIndex: 2 },
    });

    expect(prompt).toContain("Event: round_end.");
    expect(prompt).toContain("Mood to respect: rain on the windows.");
    expect(prompt.endsWith('Context: {"roundIndex":2}')).toBe(true);
  });

  it("leaves out what was not given", () => {
    const prompt = buildNarrationPrompt({ event: "session_end", roundIndex: 3 });

    expect(prompt).not.toContain("Mood to respect");
    expect(prompt.endsWith("Event: session_end.")).toBe(true);
  });
});
