import { describe, expect, it } from "vitest";

import { DeliverHint } from "../src/domain/commands/DeliverHint.js";
import { DestroyHint } from "../src/domain/commands/DestroyHint.js";
import { dispatchCommand } from "../src/domain/commands/dispatchCommand.js";
import { PrepareRound } from "../src/domain/commands/PrepareRound.js";
import type { HintRecord } from "../src/domain/ports/SessionGateway.js";
import {
  createCommandContext,
  createTestSeed,
  registerPlayers,
  type CommandContextMock,
} from "./support/mocks.js";

const SESSION_ID = "party-1";

const setup = async (
  options: { destroyQuota?: number; culprit?: boolean } = {},
): Promise<{ context: CommandContextMock; hints: HintRecord[] }> => {
  const context = createCommandContext({
    seed: createTestSeed({ rules: { destroyQuota: options.destroyQuota ?? 2 } }),
  });
  await registerPlayers(
    context,
    SESSION_ID,
    ["ana", "bo", "cy"],
    options.culprit === false ? {} : { cy: "culprit" },
  );
  await dispatchCommand(new PrepareRound(SESSION_ID, 1, 2_000), context);

  const hints: HintRecord[] = [];
  for (const tier of ["major", "minor", "vague"]) {
    hints.push(
      await dispatchCommand(new DeliverHint(SESSION_ID, 1, "ana", tier, false, 3_000), context),
    );
  }
  context.bus.broadcast.mockClear();
  return { context, hints };
};

const destroy = (context: CommandContextMock, hintId: string, killerId: string, at = 9_000) =>
  dispatchCommand(new DestroyHint(SESSION_ID, hintId, killerId, at), context);

const idOf = (hints: readonly HintRecord[], index: number): string => hints[index]?.id ?? "";

describe("DestroyHint command", () => {
  it("marks the hint destroyed and announces it", async () => {
    const { context, hints } = await setup();

    const record = await destroy(context, idOf(hints, 0), "cy");

    expect(record).toMatchObject({
      id: idOf(hints, 0),
      destroyed: true,
      destroyedBy: "cy",
      destroyedAt: 9_000,
    });
    expect(context.bus.broadcast).toHaveBeenCalledWith({
      type: "event",
      payload: {
        kind: "hint_destroyed",
        sessionId: SESSION_ID,
        hintId: idOf(hints, 0),
        killerId: "cy",
      },
    });
    const state = await context.sessionGateway.loadSession(SESSION_ID);
    expect(state.killerActions.destroyUsed).toBe(1);
    expect(state.hintsHistory[0]?.destroyed).toBe(true);
  });

  it("stops at the quota", async () => {
    const { context, hints } = await setup();

    await destroy(context, idOf(hints, 0), "cy");
    await destroy(context, idOf(hints, 1), "cy");

    await expect(destroy(context, idOf(hints, 2), "cy")).rejects.toMatchObject({
      code: "quota_reached",
    });
    const state = await context.sessionGateway.loadSession(SESSION_ID);
    expect(state.killerActions.destroyUsed).toBe(2);
    expect(state.hintsHistory[2]?.destroyed).toBe(false);
  });

  it("has no limit when the quota is zero", async () => {
    const { context, hints } = await setup({ destroyQuota: 0 });

    for (const hint of hints) {
      await destroy(context, hint.id, "cy");
    }

    const state = await context.sessionGateway.loadSession(SESSION_ID);
    expect(state.killerActions.destroyUsed).toBe(3);
  });

  it("only lets the registered culprit destroy", async () => {
    const { context, hints } = await setup();

    await expect(destroy(context, idOf(hints, 0), "bo")).rejects.toMatchObject({
      code: "not_authorized",
    });
  });

  it("lets anyone destroy while no culprit is registered", async () => {
    const { context, hints } = await setup({ culprit: false });

    await expect(destroy(context, idOf(hints, 0), "bo")).resolves.toMatchObject({
      destroyedBy: "bo",
    });
  });

  it("refuses to destroy the same hint twice", async () => {
    const { context, hints } = await setup();
    await destroy(context, idOf(hints, 0), "cy");

    await expect(destroy(context, idOf(hints, 0), "cy")).rejects.toMatchObject({
      code: "already_destroyed",
    });
  });

  it("reports an unknown hint before anything else", async () => {
    const { context } = await setup();

    await expect(destroy(context, "missing-hint", "bo")).rejects.toMatchObject({
      code: "not_found",
    });
  });
});
