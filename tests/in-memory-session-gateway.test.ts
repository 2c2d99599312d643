import { describe, expect, it } from "vitest";

import { InMemorySessionGateway } from "../src/adapters/in-memory/InMemorySessionGateway.js";
import { GameCommandInputError } from "../src/domain/errors/GameCommandInputError.js";
import { createTestSeed } from "./support/mocks.js";

describe("InMemorySessionGateway", () => {
  it("creates unknown sessions from the seed", async () => {
    const gateway = new InMemorySessionGateway(() => createTestSeed());

    const state = await gateway.loadSession("party-1");

    expect(state.id).toBe("party-1");
    expect(state.envelopes.map((envelope) => envelope.id)).toEqual(["E1", "E2", "E3", "E4", "E5"]);
    expect(state.round.phase).toBe("IDLE");
  });

  it("hands out copies until a state is saved", async () => {
    const gateway = new InMemorySessionGateway(() => createTestSeed());
    const state = await gateway.loadSession("party-1");

    state.flags.joinLocked = true;
    expect((await gateway.loadSession("party-1")).flags.joinLocked).toBe(false);

    await gateway.saveSession(state);
    expect((await gateway.loadSession("party-1")).flags.joinLocked).toBe(true);
  });

  it("finds sessions by join code regardless of case", async () => {
    const gateway = new InMemorySessionGateway();
    const { joinCode } = await gateway.loadSession("party-1");

    await expect(gateway.findSessionIdByJoinCode(` ${joinCode.toLowerCase()} `)).resolves.toBe(
      "party-1",
    );
    await expect(gateway.findSessionIdByJoinCode("")).resolves.toBeUndefined();
  });

  it("recreates a session on reset", async () => {
    const gateway = new InMemorySessionGateway(() => createTestSeed());
    const state = await gateway.loadSession("party-1");
    state.killerActions.destroyUsed = 2;
    await gateway.saveSession(state);

    const fresh = await gateway.resetSession("party-1");

    expect(fresh.killerActions.destroyUsed).toBe(0);
    expect((await gateway.loadSession("party-1")).killerActions.destroyUsed).toBe(0);
  });

  it("rejects ids that are not url-safe", async () => {
    const gateway = new InMemorySessionGateway();

    await expect(gateway.loadSession("../escape")).rejects.toThrow(GameCommandInputError);
  });
});
