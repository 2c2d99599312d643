export interface GameConfig {
  readonly narrationEnabled: boolean;
  readonly narrationTimeoutMs: number;
  readonly halfTimeThresholdSeconds: number;
  readonly maxSessionEvents: number;
  readonly sendTimeoutMs: number;
}

export type GameConfigOverrides = Partial<GameConfig>;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    narrationEnabled: overrides.narrationEnabled ?? true,
    narrationTimeoutMs: overrides.narrationTimeoutMs ?? 8_000,
    halfTimeThresholdSeconds: overrides.halfTimeThresholdSeconds ?? 60,
    maxSessionEvents: overrides.maxSessionEvents ?? 2_000,
    sendTimeoutMs: overrides.sendTimeoutMs ?? 5_000,
  };
}
