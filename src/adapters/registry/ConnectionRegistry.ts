/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import {
  serverMessage,
  type ServerMessage,
  type ServerMessageType,
  type ServerPayloads,
} from "../../domain/messages.js";
import type { Connection } from "../../domain/ports/Connection.js";
import type { Logger } from "../../domain/ports/Logger.js";
import type { MessageBus } from "../../domain/ports/MessageBus.js";
import type { PlayerId } from "../../domain/typedefs.js";
import { withTimeout } from "../../domain/withTimeout.js";

export interface ConnectionRegistryOptions {
  readonly sendTimeoutMs?: number;
  readonly logger?: Logger;
}

export interface ConnectionStats {
  readonly pending: number;
  readonly identified: number;
  readonly players: number;
}

/**
 * Live client connections and the players they belong to.
 *
 * A connection is either pending (connected, not yet identified) or sits in
 * exactly one player's bucket. Sends go out concurrently, each bounded by the
 * send timeout; a connection whose send fails or times out is evicted and the
 * others are unaffected.
 */
export class ConnectionRegistry implements MessageBus {
  #pending = new Set<Connection>();
  #byPlayer = new Map<PlayerId, Set<Connection>>();
  #owners = new Map<Connection, PlayerId>();
  readonly #sendTimeoutMs: number;
  readonly #logger: Logger | undefined;

  constructor({ sendTimeoutMs = 5_000, logger }: ConnectionRegistryOptions = {}) {
    this.#sendTimeoutMs = sendTimeoutMs;
    this.#logger = logger;
  }

  connect(connection: Connection): void {
    if (this.#owners.has(connection)) return;
    this.#pending.add(connection);
    this.#logger?.debug?.("Connection registered", this.stats());
  }

  identify(connection: Connection, playerId: PlayerId): void {
    const previous = this.#owners.get(connection);
    if (previous === playerId) return;

    this.#pending.delete(connection);
    if (previous !== undefined) {
      this.#leaveBucket(connection, previous);
    }

    let bucket = this.#byPlayer.get(playerId);
    if (!bucket) {
      bucket = new Set<Connection>();
      this.#byPlayer.set(playerId, bucket);
    }
    bucket.add(connection);
    this.#owners.set(connection, playerId);

    this.#logger?.info?.("Connection identified", {
      playerId,
      previous,
      connections: bucket.size,
    });
  }

  async disconnect(connection: Connection): Promise<void> {
    const playerId = this.#remove(connection);
    try {
      await connection.close();
    } catch (error) {
      this.#logger?.warn?.("Failed to close connection", { playerId, error });
    }
    this.#logger?.info?.("Connection removed", { playerId, ...this.stats() });
  }

  async sendToPlayer(playerId: PlayerId, message: ServerMessage): Promise<number> {
    return this.#deliver([...(this.#byPlayer.get(playerId) ?? [])], message);
  }

  async broadcast(message: ServerMessage): Promise<number> {
    return this.#deliver([...this.#owners.keys()], message);
  }

  async broadcastAll(message: ServerMessage): Promise<number> {
    return this.#deliver([...this.#owners.keys(), ...this.#pending], message);
  }

  async sendTypeToPlayer<K extends ServerMessageType>(
    playerId: PlayerId,
    type: K,
    payload: ServerPayloads[K],
  ): Promise<number> {
    return this.sendToPlayer(playerId, serverMessage(type, payload));
  }

  async broadcastType<K extends ServerMessageType>(
    type: K,
    payload: ServerPayloads[K],
  ): Promise<number> {
    return this.broadcast(serverMessage(type, payload));
  }

  async broadcastAllType<K extends ServerMessageType>(
    type: K,
    payload: ServerPayloads[K],
  ): Promise<number> {
    return this.broadcastAll(serverMessage(type, payload));
  }

  playerIdOf(connection: Connection): PlayerId | undefined {
    return this.#owners.get(connection);
  }

  isPending(connection: Connection): boolean {
    return this.#pending.has(connection);
  }

  connectedPlayerIds(): PlayerId[] {
    return [...this.#byPlayer.keys()];
  }

  stats(): ConnectionStats {
    return {
      pending: this.#pending.size,
      identified: this.#owners.size,
      players: this.#byPlayer.size,
    };
  }

  async #deliver(targets: readonly Connection[], message: ServerMessage): Promise<number> {
    if (targets.length === 0) return 0;

    const data = JSON.stringify(message);
    const outcomes = await Promise.all(
      targets.map(async (connection) => {
        try {
          await withTimeout("send", this.#sendTimeoutMs, () => connection.send(data));
          return true;
        } catch (error) {
          this.#evict(connection, error);
          return false;
        }
      }),
    );

    const delivered = outcomes.filter(Boolean).length;
    this.#logger?.debug?.("Message delivered", {
      type: message.type,
      delivered,
      failed: targets.length - delivered,
    });
    return delivered;
  }

  #evict(connection: Connection, reason: unknown): void {
    const playerId = this.#remove(connection);
    this.#logger?.warn?.("Evicting connection after failed send", { playerId, reason });
    void connection.close().catch((error: unknown) => {
      this.#logger?.debug?.("Close after eviction failed", { playerId, error });
    });
  }

  #remove(connection: Connection): PlayerId | undefined {
    this.#pending.delete(connection);
    const playerId = this.#owners.get(connection);
    if (playerId !== undefined) {
      this.#owners.delete(connection);
      this.#leaveBucket(connection, playerId);
    }
    return playerId;
  }

  #leaveBucket(connection: Connection, playerId: PlayerId): void {
    const bucket = this.#byPlayer.get(playerId);
    if (!bucket) return;
    bucket.delete(connection);
    if (bucket.size === 0) {
      this.#byPlayer.delete(playerId);
    }
  }
}
