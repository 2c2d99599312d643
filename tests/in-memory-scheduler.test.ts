import { describe, it, expect } from "vitest";

import { InMemoryScheduler } from "../src/adapters/in-memory/InMemoryScheduler.js";
import type { TimerCheckpoint } from "../src/domain/commands/TimerCheckpoint.js";

const CONTEXT = { roundIndex: 1, miniGame: "card-duel" };

describe("InMemoryScheduler", () => {
  it("dispatches checkpoints once their offsets elapse", async () => {
    const dispatched: TimerCheckpoint[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command);
    });

    const timerId = await scheduler.startTimer(
      "party-1",
      [
        { checkpoint: "half_time", afterMs: 1_000 },
        { checkpoint: "timer_end", afterMs: 2_000 },
      ],
      CONTEXT,
    );

    await scheduler.runFor(999);
    expect(dispatched).toEqual([]);

    await scheduler.runFor(1);
    expect(dispatched.map((command) => command.checkpoint)).toEqual(["half_time"]);
    expect(scheduler.hasActiveTimer("party-1")).toBe(true);

    await scheduler.runFor(1_000);
    expect(dispatched.map((command) => [command.checkpoint, command.at])).toEqual([
      ["half_time", 1_000],
      ["timer_end", 2_000],
    ]);
    expect(dispatched[1]?.timerId).toBe(timerId);
    expect(dispatched[1]?.context).toEqual(CONTEXT);
  });

  it("forgets the timer after its final checkpoint", async () => {
    const scheduler = new InMemoryScheduler(() => undefined);
    await scheduler.startTimer("party-1", [{ checkpoint: "timer_end", afterMs: 500 }], CONTEXT);

    await scheduler.runFor(500);

    expect(scheduler.hasActiveTimer("party-1")).toBe(false);
    expect(scheduler.pending).toEqual([]);
  });

  it("replaces a running timer instead of stacking a second one", async () => {
    const dispatched: TimerCheckpoint[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command);
    });

    const first = await scheduler.startTimer(
      "party-1",
      [{ checkpoint: "timer_end", afterMs: 1_000 }],
      CONTEXT,
    );
    const second = await scheduler.startTimer(
      "party-1",
      [{ checkpoint: "timer_end", afterMs: 1_000 }],
      CONTEXT,
    );

    await scheduler.runFor(5_000);

    expect(first).not.toBe(second);
    expect(scheduler.isCurrentTimer("party-1", first)).toBe(false);
    expect(dispatched).toHaveLength(1);
    expect(dispatched[0]?.timerId).toBe(second);
  });

  it("aborts only the given session's timer", async () => {
    const dispatched: TimerCheckpoint[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command);
    });
    await scheduler.startTimer("party-1", [{ checkpoint: "timer_end", afterMs: 100 }], CONTEXT);
    await scheduler.startTimer("party-2", [{ checkpoint: "timer_end", afterMs: 100 }], CONTEXT);

    await expect(scheduler.abortTimer("party-1")).resolves.toBe(true);
    await expect(scheduler.abortTimer("party-1")).resolves.toBe(false);
    await scheduler.runFor(100);

    expect(dispatched.map((command) => command.sessionId)).toEqual(["party-2"]);
  });

  it("rejects an empty plan", async () => {
    const scheduler = new InMemoryScheduler(() => undefined);

    await expect(scheduler.startTimer("party-1", [], CONTEXT)).rejects.toThrow(
      "Timer plan must contain at least one checkpoint",
    );
  });
});
