import type { ServerMessage, ServerMessageType, ServerPayloads } from "../messages.js";
import type { PlayerId } from "../typedefs.js";

/**
 * Delivery to connected clients. Every method resolves with the number of
 * successful deliveries; transport failures are handled by the implementation
 * and never reach the caller.
 */
export interface MessageBus {
  sendToPlayer(playerId: PlayerId, message: ServerMessage): Promise<number>;

  /** Identified connections only */
  broadcast(message: ServerMessage): Promise<number>;

  /** Identified and pending connections */
  broadcastAll(message: ServerMessage): Promise<number>;

  sendTypeToPlayer<K extends ServerMessageType>(
    playerId: PlayerId,
    type: K,
    payload: ServerPayloads[K],
  ): Promise<number>;

  broadcastType<K extends ServerMessageType>(
    type: K,
    payload: ServerPayloads[K],
  ): Promise<number>;

  broadcastAllType<K extends ServerMessageType>(
    type: K,
    payload: ServerPayloads[K],
  ): Promise<number>;
}
