import { vi, type Mock } from "vitest";

import { InMemoryScheduler } from "../../src/adapters/in-memory/InMemoryScheduler.js";
import { InMemorySessionGateway } from "../../src/adapters/in-memory/InMemorySessionGateway.js";
import { InMemorySessionLock } from "../../src/adapters/in-memory/InMemorySessionLock.js";
import type { CommandContext } from "../../src/domain/commands/Command.js";
import { dispatchCommand } from "../../src/domain/commands/dispatchCommand.js";
import { RegisterPlayer } from "../../src/domain/commands/RegisterPlayer.js";
import { createGameConfig, type GameConfigOverrides } from "../../src/domain/GameConfig.js";
import { serverMessage, type ServerMessage } from "../../src/domain/messages.js";
import type { Logger } from "../../src/domain/ports/Logger.js";
import type { MessageBus } from "../../src/domain/ports/MessageBus.js";
import type { NarrationGenerator } from "../../src/domain/ports/NarrationGenerator.js";
import { DEFAULT_HINT_TIERS, createStorySeed, type StorySeed } from "../../src/domain/StorySeed.js";
import type { PlayerId, PlayerRole, SessionId } from "../../src/domain/typedefs.js";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Fn<T extends (...args: any[]) => unknown> = Mock<T>;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
function createMock<T extends (...args: any[]) => unknown>(): Fn<T> {
  return vi.fn<T>();
}

export const NARRATED_TEXT = "A cold draught sweeps through the manor.";

export interface MessageBusMock extends MessageBus {
  readonly sendToPlayer: Fn<MessageBus["sendToPlayer"]>;
  readonly broadcast: Fn<MessageBus["broadcast"]>;
  readonly broadcastAll: Fn<MessageBus["broadcastAll"]>;
}

export interface NarrationGeneratorMock extends NarrationGenerator {
  readonly generate: Fn<NarrationGenerator["generate"]>;
}

export interface LoggerMock extends Logger {
  readonly info: Fn<Logger["info"]>;
  readonly warn: Fn<Logger["warn"]>;
  readonly error: Fn<Logger["error"]>;
  readonly debug: Fn<Logger["debug"]>;
}

/** Typed sends funnel into the three untyped spies. */
export function createMessageBusMock(): MessageBusMock {
  const sendToPlayer = createMock<MessageBus["sendToPlayer"]>().mockResolvedValue(1);
  const broadcast = createMock<MessageBus["broadcast"]>().mockResolvedValue(1);
  const broadcastAll = createMock<MessageBus["broadcastAll"]>().mockResolvedValue(1);

  return {
    sendToPlayer,
    broadcast,
    broadcastAll,
    sendTypeToPlayer: (playerId, type, payload) =>
      sendToPlayer(playerId, serverMessage(type, payload)),
    broadcastType: (type, payload) => broadcast(serverMessage(type, payload)),
    broadcastAllType: (type, payload) => broadcastAll(serverMessage(type, payload)),
  };
}

export function createNarrationGeneratorMock(): NarrationGeneratorMock {
  return {
    generate: createMock<NarrationGenerator["generate"]>().mockResolvedValue(NARRATED_TEXT),
  };
}

export function createLoggerMock(): LoggerMock {
  return {
    info: createMock<Logger["info"]>(),
    warn: createMock<Logger["warn"]>(),
    error: createMock<Logger["error"]>(),
    debug: createMock<Logger["debug"]>(),
  };
}

/** Two timed rounds and five envelopes of mixed importance. */
export function createTestSeed(overrides: Partial<StorySeed> = {}): StorySeed {
  return createStorySeed({
    title: "Murder at Blackwood Manor",
    rounds: [
      {
        id: 1,
        miniGame: "card-duel",
        theme: "library",
        maxSeconds: 120,
        narration: {
          intro: "Candles flicker in the library.",
          outro: "The library falls quiet.",
        },
        hintPolicy: {
          tiers: DEFAULT_HINT_TIERS,
          sharingRules: { major: "vague", minor: "misleading" },
        },
        hints: {
          major: "The letter opener is missing.",
          minor: "Someone smelled of lavender.",
          vague: "Something sharp was moved.",
        },
      },
      {
        id: 2,
        miniGame: "blind-test",
        maxSeconds: 30,
        narration: {},
        hintPolicy: { tiers: DEFAULT_HINT_TIERS, sharingRules: {} },
        hints: {
          major: "The gardener lied about the greenhouse.",
          misleading: "The butler was seen outside at midnight.",
        },
      },
    ],
    envelopes: [
      { id: "E1", importance: "high" },
      { id: "E2", importance: "medium" },
      { id: "E3", importance: "low" },
      { id: "E4", importance: "high" },
      { id: "E5", importance: "medium" },
    ],
    rules: { destroyQuota: 2 },
    ...overrides,
  });
}

export interface CommandContextOptions {
  readonly seed?: StorySeed;
  readonly config?: GameConfigOverrides;
}

export interface CommandContextMock extends CommandContext {
  readonly sessionGateway: InMemorySessionGateway;
  readonly bus: MessageBusMock;
  readonly narrator: NarrationGeneratorMock;
  readonly scheduler: InMemoryScheduler;
  readonly locks: InMemorySessionLock;
  readonly logger: LoggerMock;
}

/**
 * Real in-memory storage, lock and virtual-clock scheduler; spies for the bus,
 * the narrator and the logger. Timer checkpoints go back through
 * `dispatchCommand` with this same context.
 */
export function createCommandContext(options: CommandContextOptions = {}): CommandContextMock {
  const seed = options.seed ?? createTestSeed();

  let context: CommandContextMock;
  const scheduler = new InMemoryScheduler((command) => dispatchCommand(command, context));

  context = {
    sessionGateway: new InMemorySessionGateway(() => seed),
    bus: createMessageBusMock(),
    narrator: createNarrationGeneratorMock(),
    scheduler,
    locks: new InMemorySessionLock(),
    config: createGameConfig(options.config),
    logger: createLoggerMock(),
  } satisfies CommandContextMock;

  return context;
}

export async function registerPlayers(
  context: CommandContext,
  sessionId: SessionId,
  playerIds: readonly PlayerId[],
  roles: Readonly<Record<PlayerId, PlayerRole>> = {},
): Promise<void> {
  for (const playerId of playerIds) {
    await dispatchCommand(
      new RegisterPlayer(sessionId, playerId, `Guest ${playerId}`, 1_000, roles[playerId]),
      context,
    );
  }
}

/** Messages handed to `broadcast`, in call order. */
export function broadcasts(bus: MessageBusMock): ServerMessage[] {
  return bus.broadcast.mock.calls.map(([message]) => message);
}

export function broadcastTypes(bus: MessageBusMock): string[] {
  return broadcasts(bus).map((message) => message.type);
}
