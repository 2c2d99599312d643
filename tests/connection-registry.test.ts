import { afterEach, describe, expect, it, vi } from "vitest";

import { ConnectionRegistry } from "../src/adapters/registry/ConnectionRegistry.js";
import { serverMessage } from "../src/domain/messages.js";
import type { Connection } from "../src/domain/ports/Connection.js";
import { createLoggerMock } from "./support/mocks.js";

class FakeConnection implements Connection {
  readonly frames: string[] = [];
  closed = false;

  constructor(private readonly behaviour: "ok" | "fail" | "hang" = "ok") {}

  async send(data: string): Promise<void> {
    if (this.behaviour === "fail") {
      throw new Error("socket closed");
    }
    if (this.behaviour === "hang") {
      await new Promise<never>(() => undefined);
    }
    this.frames.push(data);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const PHASE = serverMessage("phase", { sessionId: "party-1", phase: "INTRO", roundIndex: 1 });

afterEach(() => {
  vi.useRealTimers();
});

describe("ConnectionRegistry", () => {
  it("keeps unidentified connections pending", async () => {
    const registry = new ConnectionRegistry();
    const connection = new FakeConnection();

    registry.connect(connection);

    expect(registry.isPending(connection)).toBe(true);
    expect(registry.stats()).toEqual({ pending: 1, identified: 0, players: 0 });
    await expect(registry.broadcast(PHASE)).resolves.toBe(0);
    await expect(registry.broadcastAll(PHASE)).resolves.toBe(1);
  });

  it("moves a connection to its player's bucket on identify", async () => {
    const registry = new ConnectionRegistry();
    const phone = new FakeConnection();
    const tablet = new FakeConnection();
    registry.connect(phone);
    registry.connect(tablet);

    registry.identify(phone, "ana");
    registry.identify(tablet, "ana");

    expect(registry.playerIdOf(phone)).toBe("ana");
    expect(registry.stats()).toEqual({ pending: 0, identified: 2, players: 1 });
    await expect(registry.sendToPlayer("ana", PHASE)).resolves.toBe(2);
    expect(phone.frames).toEqual([JSON.stringify(PHASE)]);
  });

  it("rebinds a connection that identifies as someone else", () => {
    const registry = new ConnectionRegistry();
    const connection = new FakeConnection();
    registry.connect(connection);

    registry.identify(connection, "ana");
    registry.identify(connection, "bo");

    expect(registry.playerIdOf(connection)).toBe("bo");
    expect(registry.connectedPlayerIds()).toEqual(["bo"]);
  });

  it("evicts a connection whose send fails and keeps serving the rest", async () => {
    const logger = createLoggerMock();
    const registry = new ConnectionRegistry({ logger });
    const healthy = [new FakeConnection(), new FakeConnection()];
    const broken = new FakeConnection("fail");
    for (const [index, connection] of [...healthy, broken].entries()) {
      registry.connect(connection);
      registry.identify(connection, `player-${index}`);
    }

    await expect(registry.broadcast(PHASE)).resolves.toBe(2);
    await expect(registry.broadcast(PHASE)).resolves.toBe(2);

    expect(registry.playerIdOf(broken)).toBeUndefined();
    expect(broken.closed).toBe(true);
    expect(healthy[0]?.frames).toHaveLength(2);
    expect(logger.warn).toHaveBeenCalledWith(
      "Evicting connection after failed send",
      expect.objectContaining({ playerId: "player-2" }),
    );
  });

  it("keeps delivering to a player's live connections after one of them dies", async () => {
    const registry = new ConnectionRegistry();
    const phone = new FakeConnection();
    const tablet = new FakeConnection();
    const dead = new FakeConnection("fail");
    for (const connection of [phone, dead, tablet]) {
      registry.connect(connection);
      registry.identify(connection, "ana");
    }

    await expect(registry.sendToPlayer("ana", PHASE)).resolves.toBe(2);
    await expect(registry.sendToPlayer("ana", PHASE)).resolves.toBe(2);

    expect(registry.stats()).toEqual({ pending: 0, identified: 2, players: 1 });
    expect(phone.frames).toHaveLength(2);
    expect(tablet.frames).toHaveLength(2);
    expect(dead.closed).toBe(true);
  });

  it("evicts a connection that does not accept a frame in time", async () => {
    vi.useFakeTimers();
    const registry = new ConnectionRegistry({ sendTimeoutMs: 100 });
    const stuck = new FakeConnection("hang");
    const fine = new FakeConnection();
    registry.connect(stuck);
    registry.identify(stuck, "ana");
    registry.connect(fine);
    registry.identify(fine, "bo");

    const delivered = registry.broadcast(PHASE);
    await vi.advanceTimersByTimeAsync(100);

    await expect(delivered).resolves.toBe(1);
    expect(registry.playerIdOf(stuck)).toBeUndefined();
  });

  it("closes and forgets a connection on disconnect", async () => {
    const registry = new ConnectionRegistry();
    const connection = new FakeConnection();
    registry.connect(connection);
    registry.identify(connection, "ana");

    await registry.disconnect(connection);

    expect(connection.closed).toBe(true);
    expect(registry.stats()).toEqual({ pending: 0, identified: 0, players: 0 });
    await expect(registry.sendToPlayer("ana", PHASE)).resolves.toBe(0);
  });

  it("ignores a repeated identify with the same player id", async () => {
    const logger = createLoggerMock();
    const registry = new ConnectionRegistry({ logger });
    const connection = new FakeConnection();
    registry.connect(connection);

    registry.identify(connection, "ana");
    registry.identify(connection, "ana");

    expect(registry.stats()).toEqual({ pending: 0, identified: 1, players: 1 });
    expect(logger.info).toHaveBeenCalledTimes(1);
    await expect(registry.sendToPlayer("ana", PHASE)).resolves.toBe(1);
  });

  it("tolerates disconnecting a connection it never saw", async () => {
    const registry = new ConnectionRegistry();
    const known = new FakeConnection();
    registry.connect(known);
    const stranger = new FakeConnection();

    await expect(registry.disconnect(stranger)).resolves.toBeUndefined();

    expect(stranger.closed).toBe(true);
    expect(registry.stats()).toEqual({ pending: 1, identified: 0, players: 0 });
  });

  it("logs instead of throwing when closing a connection fails", async () => {
    const logger = createLoggerMock();
    const registry = new ConnectionRegistry({ logger });
    const connection = new FakeConnection();
    connection.close = async () => {
      throw new Error("already gone");
    };
    registry.connect(connection);

    await expect(registry.disconnect(connection)).resolves.toBeUndefined();

    expect(registry.stats()).toEqual({ pending: 0, identified: 0, players: 0 });
    expect(logger.warn).toHaveBeenCalledWith(
      "Failed to close connection",
      expect.objectContaining({ error: expect.any(Error) }),
    );
  });

  it("serializes typed messages as type and payload", async () => {
    const registry = new ConnectionRegistry();
    const connection = new FakeConnection();
    registry.connect(connection);
    registry.identify(connection, "ana");

    await registry.sendTypeToPlayer("ana", "pong", {});

    expect(connection.frames).toEqual(['{"type":"pong","payload":{}}']);
  });
});
