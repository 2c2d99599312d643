export type {
  Command,
  CommandContext,
} from "@murder-party/core/domain/commands/Command.js";
export { AbortTimer } from "@murder-party/core/domain/commands/AbortTimer.js";
export { AssignEnvelope } from "@murder-party/core/domain/commands/AssignEnvelope.js";
export { BeginNextRound } from "@murder-party/core/domain/commands/BeginNextRound.js";
export { ConfirmStart } from "@murder-party/core/domain/commands/ConfirmStart.js";
export { DeliverHint } from "@murder-party/core/domain/commands/DeliverHint.js";
export { DestroyHint } from "@murder-party/core/domain/commands/DestroyHint.js";
export { DistributeEnvelopes } from "@murder-party/core/domain/commands/DistributeEnvelopes.js";
export { FinishCurrentRound } from "@murder-party/core/domain/commands/FinishCurrentRound.js";
export { LockCanon } from "@murder-party/core/domain/commands/LockCanon.js";
export { PrepareRound } from "@murder-party/core/domain/commands/PrepareRound.js";
export { RegisterPlayer } from "@murder-party/core/domain/commands/RegisterPlayer.js";
export { ResetEnvelopes } from "@murder-party/core/domain/commands/ResetEnvelopes.js";
export { ResetSession } from "@murder-party/core/domain/commands/ResetSession.js";
export { SetJoinLock } from "@murder-party/core/domain/commands/SetJoinLock.js";
export { TimerCheckpoint } from "@murder-party/core/domain/commands/TimerCheckpoint.js";
export { dispatchCommand } from "@murder-party/core/domain/commands/dispatchCommand.js";
export {
  envelopeSummaryOf,
  listHints,
  playerEnvelopes,
  roundStatus,
} from "@murder-party/core/domain/queries/SessionQueries.js";
export type { GameConfig } from "@murder-party/core/domain/GameConfig.js";
export { createGameConfig } from "@murder-party/core/domain/GameConfig.js";
export {
  GameCommandInputError,
  HintDeliveryError,
  HintDestroyError,
  SessionNotFoundError,
  TimeoutError,
  type HintDeliveryFailure,
  type HintDestroyFailure,
} from "@murder-party/core/domain/errors/index.js";
export {
  createSessionState,
  isValidSessionId,
  normalizeJoinCode,
} from "@murder-party/core/domain/entities/SessionRules.js";
export { serverMessage } from "@murder-party/core/domain/messages.js";
export type { ServerMessage } from "@murder-party/core/domain/messages.js";
export type { Connection } from "@murder-party/core/domain/ports/Connection.js";
export type { Logger } from "@murder-party/core/domain/ports/Logger.js";
export type { MessageBus } from "@murder-party/core/domain/ports/MessageBus.js";
export type {
  NarrationGenerator,
  NarrationOptions,
} from "@murder-party/core/domain/ports/NarrationGenerator.js";
export type {
  Scheduler,
  TimerCheckpointPlan,
  TimerContext,
} from "@murder-party/core/domain/ports/Scheduler.js";
export type {
  SessionGateway,
  SessionState,
} from "@murder-party/core/domain/ports/SessionGateway.js";
export type { SessionLock } from "@murder-party/core/domain/ports/SessionLock.js";
export {
  DEFAULT_HINT_TIERS,
  createStorySeed,
  type EnvelopeDefinition,
  type RoundDefinition,
  type StorySeed,
} from "@murder-party/core/domain/StorySeed.js";
export type {
  HintTier,
  Importance,
  PlayerId,
  PlayerRole,
  SessionId,
  TimePoint,
  TimerId,
} from "@murder-party/core/domain/typedefs.js";
export { InMemorySessionGateway } from "@murder-party/core/adapters/in-memory/InMemorySessionGateway.js";
export { InMemorySessionLock } from "@murder-party/core/adapters/in-memory/InMemorySessionLock.js";
export { ConnectionRegistry } from "@murder-party/core/adapters/registry/ConnectionRegistry.js";
