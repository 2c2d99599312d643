import type { GameConfig } from "../GameConfig.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { NarrationGenerator } from "../ports/NarrationGenerator.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { SessionGateway } from "../ports/SessionGateway.js";
import type { SessionLock } from "../ports/SessionLock.js";
import type { SessionId, TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly sessionGateway: SessionGateway;
  readonly bus: MessageBus;
  readonly narrator: NarrationGenerator;
  readonly scheduler: Scheduler;
  readonly locks: SessionLock;
  readonly config: GameConfig;
  readonly logger?: Logger;
}

/**
 * A mutation of one session. Commands only run through `dispatchCommand`,
 * which serializes them per session.
 */
export abstract class Command<TResult = void> {
  abstract readonly type: string;
  abstract readonly sessionId: SessionId;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<TResult>;
}
