import { describe, expect, it, vi } from "vitest";
import { WebSocket } from "ws";

import { WebSocketConnection } from "../src/adapters/WebSocketConnection.js";

interface FakeSocket {
  readyState: number;
  readonly send: ReturnType<typeof vi.fn>;
  readonly close: ReturnType<typeof vi.fn>;
}

function fakeSocket(readyState: number, sendError?: Error): FakeSocket {
  return {
    readyState,
    send: vi.fn((_data: string, callback: (error?: Error) => void) => callback(sendError)),
    close: vi.fn(),
  };
}

function connectionFor(socket: FakeSocket): WebSocketConnection {
  return new WebSocketConnection(socket as unknown as WebSocket);
}

describe("WebSocketConnection", () => {
  it("resolves once the socket has written the frame", async () => {
    const socket = fakeSocket(WebSocket.OPEN);

    await expect(connectionFor(socket).send('{"type":"pong"}')).resolves.toBeUndefined();
    expect(socket.send).toHaveBeenCalledWith('{"type":"pong"}', expect.any(Function));
  });

  it("rejects when the write fails", async () => {
    const socket = fakeSocket(WebSocket.OPEN, new Error("socket hang up"));

    await expect(connectionFor(socket).send("{}")).rejects.toThrow("socket hang up");
  });

  it("refuses to send on a socket that is not open", async () => {
    const socket = fakeSocket(WebSocket.CLOSED);

    await expect(connectionFor(socket).send("{}")).rejects.toThrow(
      "WebSocket is not open (readyState=3)",
    );
    expect(socket.send).not.toHaveBeenCalled();
  });

  it("closes open sockets once", async () => {
    const open = fakeSocket(WebSocket.OPEN);
    const closing = fakeSocket(WebSocket.CLOSING);

    await connectionFor(open).close();
    await connectionFor(closing).close();

    expect(open.close).toHaveBeenCalledTimes(1);
    expect(closing.close).not.toHaveBeenCalled();
  });
});
