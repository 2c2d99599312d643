import { readFile } from "node:fs/promises";
import { z } from "zod";

import { isMissingFile } from "./fsErrors.js";
import {
  DEFAULT_HINT_TIERS,
  createStorySeed,
  type HintTier,
  type Logger,
  type RoundDefinition,
  type StorySeed,
} from "../core.js";

const LEGACY_SHARING_KEY = /^discoverer_(.+)_others$/;

/** Longest delay `setTimeout` honours, in whole seconds */
export const MAX_TIMER_SECONDS = 2_147_483;

const NarrationSchema = z
  .object({
    intro: z.string().optional(),
    intro_seed: z.string().optional(),
    outro: z.string().optional(),
    outro_seed: z.string().optional(),
  })
  .default({});

const HintPolicySchema = z
  .object({
    tiers: z.array(z.string().min(1)).optional(),
    sharing_rules: z.record(z.string().nullish()).default({}),
  })
  .default({});

const RoundSchema = z.object({
  id: z.union([z.number(), z.string()]).optional(),
  code: z.string().optional(),
  mini_game: z.string().optional(),
  theme: z.string().optional(),
  max_seconds: z.number().nonnegative().max(MAX_TIMER_SECONDS).nullish(),
  duration_seconds: z.number().nonnegative().max(MAX_TIMER_SECONDS).nullish(),
  narration: NarrationSchema,
  hint_policy: HintPolicySchema.optional(),
  llm: z.object({ hint_policy: HintPolicySchema.optional() }).optional(),
  hints: z.record(z.string()).optional(),
});

const EnvelopeSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  importance: z
    .string()
    .default("medium")
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["high", "medium", "low"]).catch("medium")),
  description: z.string().optional(),
});

const StorySeedSchema = z.object({
  meta: z.object({ title: z.string().optional() }).optional(),
  title: z.string().optional(),
  rounds: z.array(RoundSchema).default([]),
  envelopes: z.array(EnvelopeSchema).default([]),
  rules: z
    .object({
      destroy_quota: z.number().int().nonnegative().optional(),
      killer: z.object({ destroy_quota: z.number().int().nonnegative().optional() }).optional(),
    })
    .default({}),
});

type RawRound = z.infer<typeof RoundSchema>;

/** Accepts both `{ major: "vague" }` and `{ discoverer_major_others: "vague" }`. */
export function normalizeSharingRules(
  raw: Readonly<Record<string, string | null | undefined>>,
): Record<HintTier, HintTier> {
  const rules: Record<HintTier, HintTier> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== "string" || value.length === 0) continue;
    const tier = LEGACY_SHARING_KEY.exec(key)?.[1] ?? key;
    rules[tier] = value;
  }
  return rules;
}

function toRound(raw: RawRound, position: number): RoundDefinition {
  const policy = raw.hint_policy ?? raw.llm?.hint_policy;
  const maxSeconds = raw.max_seconds ?? raw.duration_seconds ?? undefined;
  const intro = raw.narration.intro ?? raw.narration.intro_seed;
  const outro = raw.narration.outro ?? raw.narration.outro_seed;

  return {
    ...(raw.id !== undefined ? { id: raw.id } : {}),
    ...(raw.code !== undefined ? { code: raw.code } : {}),
    miniGame: raw.mini_game ?? raw.code ?? raw.theme ?? `round-${position + 1}`,
    ...(raw.theme !== undefined ? { theme: raw.theme } : {}),
    ...(maxSeconds !== undefined ? { maxSeconds } : {}),
    narration: {
      ...(intro !== undefined ? { intro } : {}),
      ...(outro !== undefined ? { outro } : {}),
    },
    hintPolicy: {
      tiers: policy?.tiers ?? DEFAULT_HINT_TIERS,
      sharingRules: normalizeSharingRules(policy?.sharing_rules ?? {}),
    },
    ...(raw.hints !== undefined ? { hints: raw.hints } : {}),
  };
}

/** Validates a story seed document and maps it to the domain shape. */
export function parseStorySeed(raw: unknown): StorySeed {
  const parsed = StorySeedSchema.parse(raw);
  const title = parsed.title ?? parsed.meta?.title;

  return createStorySeed({
    ...(title !== undefined ? { title } : {}),
    rounds: parsed.rounds.map(toRound),
    envelopes: parsed.envelopes.map((envelope) => ({
      id: envelope.id,
      importance: envelope.importance,
      ...(envelope.description !== undefined ? { description: envelope.description } : {}),
    })),
    rules: {
      destroyQuota: parsed.rules.destroy_quota ?? parsed.rules.killer?.destroy_quota ?? 2,
    },
  });
}

/**
 * Loads the seed file. A missing file yields an empty seed; an unreadable or
 * invalid one throws.
 */
export async function loadStorySeed(path: string, logger?: Logger): Promise<StorySeed> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      logger?.warn?.("Story seed not found; starting with an empty plan", { path });
      return createStorySeed();
    }
    throw error;
  }

  const seed = parseStorySeed(JSON.parse(text));
  logger?.info?.("Story seed loaded", {
    path,
    rounds: seed.rounds.length,
    envelopes: seed.envelopes.length,
  });
  return seed;
}
