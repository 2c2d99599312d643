import type { EnvelopeId, HintTier, Importance } from "./typedefs.js";

export interface RoundNarration {
  /** Mood hint for the intro narration, also used as its offline fallback */
  readonly intro?: string;
  readonly outro?: string;
}

export interface HintPolicy {
  readonly tiers: readonly HintTier[];
  /**
   * Tier handed to the other players when the discoverer keeps a clue to
   * themselves, keyed by the discoverer's tier (e.g. `{ major: "vague" }`).
   */
  readonly sharingRules: Readonly<Record<HintTier, HintTier>>;
}

export interface RoundDefinition {
  readonly id?: number | string;
  readonly code?: string;
  readonly miniGame: string;
  readonly theme?: string;
  /** Soft time limit in seconds; absent means no timer */
  readonly maxSeconds?: number;
  readonly narration: RoundNarration;
  readonly hintPolicy: HintPolicy;
  /** Static hint texts by tier, used when a round is prepared without its own */
  readonly hints?: Readonly<Record<HintTier, string>>;
}

export interface EnvelopeDefinition {
  readonly id: EnvelopeId;
  readonly importance: Importance;
  readonly description?: string;
}

export interface StoryRules {
  /** Number of hints the culprit may destroy; 0 disables the limit */
  readonly destroyQuota: number;
}

/** Declarative scenario a session is created from. */
export interface StorySeed {
  readonly title?: string;
  readonly rounds: readonly RoundDefinition[];
  readonly envelopes: readonly EnvelopeDefinition[];
  readonly rules: StoryRules;
}

export const DEFAULT_HINT_TIERS: readonly HintTier[] = [
  "major",
  "minor",
  "vague",
  "misleading",
];

export function createStorySeed(overrides: Partial<StorySeed> = {}): StorySeed {
  return {
    ...(overrides.title !== undefined ? { title: overrides.title } : {}),
    rounds: overrides.rounds ?? [],
    envelopes: overrides.envelopes ?? [],
    rules: overrides.rules ?? { destroyQuota: 2 },
  };
}
