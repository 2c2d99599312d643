import { z } from "zod";

import {
  serverMessage,
  type Connection,
  type ConnectionRegistry,
  type Logger,
  type ServerMessage,
} from "./core.js";

const IdentifySchema = z.object({
  type: z.literal("identify"),
  playerId: z.string().trim().min(1),
});

/**
 * Client → server socket protocol. `identify` binds the connection to a
 * player, `ping` is answered with `pong`; any other JSON is acknowledged.
 */
export async function handleClientFrame(
  registry: ConnectionRegistry,
  connection: Connection,
  data: string,
  logger?: Logger,
): Promise<void> {
  let frame: unknown;
  try {
    frame = JSON.parse(data);
  } catch {
    await reply(connection, serverMessage("error", { error: "invalid_json" }), logger);
    return;
  }

  const type = typeof frame === "object" && frame !== null && "type" in frame
    ? frame.type
    : undefined;

  if (type === "identify") {
    const parsed = IdentifySchema.safeParse(frame);
    if (!parsed.success) {
      await reply(connection, serverMessage("error", { error: "playerId_required" }), logger);
      return;
    }
    registry.identify(connection, parsed.data.playerId);
    await reply(
      connection,
      serverMessage("identified", { playerId: parsed.data.playerId }),
      logger,
    );
    return;
  }

  if (type === "ping") {
    await reply(connection, serverMessage("pong", {}), logger);
    return;
  }

  await reply(connection, serverMessage("ack", { received: frame }), logger);
}

async function reply(
  connection: Connection,
  message: ServerMessage,
  logger: Logger | undefined,
): Promise<void> {
  try {
    await connection.send(JSON.stringify(message));
  } catch (error) {
    logger?.warn?.("Failed to answer client frame", { type: message.type, error });
  }
}
