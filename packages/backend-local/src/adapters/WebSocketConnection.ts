import { WebSocket } from "ws";

import type { Connection } from "../core.js";

/** Adapts a `ws` socket to the registry's connection contract. */
export class WebSocketConnection implements Connection {
  constructor(readonly socket: WebSocket) {}

  send(data: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error(`WebSocket is not open (readyState=${this.socket.readyState})`));
        return;
      }
      this.socket.send(data, (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    const { readyState } = this.socket;
    if (readyState === WebSocket.CLOSING || readyState === WebSocket.CLOSED) {
      return;
    }
    this.socket.close();
  }
}
