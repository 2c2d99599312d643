import { z } from "zod";

import type { SessionState } from "../core.js";

const ImportanceSchema = z.enum(["high", "medium", "low"]);
const TextMapSchema = z.record(z.string());

const RoundDefinitionSchema = z.object({
  id: z.union([z.number(), z.string()]).optional(),
  code: z.string().optional(),
  miniGame: z.string(),
  theme: z.string().optional(),
  maxSeconds: z.number().nonnegative().optional(),
  narration: z
    .object({ intro: z.string().optional(), outro: z.string().optional() })
    .default({}),
  hintPolicy: z
    .object({
      tiers: z.array(z.string()).default(["major", "minor", "vague", "misleading"]),
      sharingRules: TextMapSchema.default({}),
    })
    .default({}),
  hints: TextMapSchema.optional(),
});

const StorySeedSchema = z.object({
  title: z.string().optional(),
  rounds: z.array(RoundDefinitionSchema).default([]),
  envelopes: z
    .array(
      z.object({
        id: z.string(),
        importance: ImportanceSchema,
        description: z.string().optional(),
      }),
    )
    .default([]),
  rules: z.object({ destroyQuota: z.number().int().nonnegative() }).default({ destroyQuota: 2 }),
});

const PlayerSchema = z.object({
  id: z.string(),
  displayName: z.string(),
  character: z.string().optional(),
  role: z.enum(["culprit", "other"]).default("other"),
  envelopes: z.array(z.object({ num: z.number().int(), id: z.string() })).default([]),
  receivedHints: z.array(z.string()).default([]),
});

const HintRecordSchema = z.object({
  id: z.string(),
  roundIndex: z.number().int(),
  discovererId: z.string(),
  sourceTier: z.string(),
  otherTier: z.string(),
  shared: z.boolean(),
  deliveries: z.array(z.object({ playerId: z.string(), tier: z.string(), text: z.string() })),
  createdAt: z.number(),
  destroyed: z.boolean().default(false),
  destroyedBy: z.string().nullable().default(null),
  destroyedAt: z.number().nullable().default(null),
});

/**
 * Stored session document. Collections and counters missing from older files
 * start out empty.
 */
const SessionDocumentSchema = z.object({
  id: z.string(),
  joinCode: z.string(),
  players: z.array(PlayerSchema).default([]),
  flags: z
    .object({
      phaseLabel: z.string().default("WAITING_START"),
      joinLocked: z.boolean().default(false),
      culpritPlayerId: z.string().nullable().default(null),
      canon: TextMapSchema.default({}),
    })
    .default({}),
  events: z
    .array(
      z.object({
        id: z.string(),
        kind: z.string(),
        scope: z.string(),
        payload: z.record(z.unknown()),
        ts: z.number(),
      }),
    )
    .default([]),
  preparedRounds: z
    .record(
      z.object({
        roundIndex: z.number().int(),
        preparedAt: z.number(),
        hints: TextMapSchema,
        sharingRules: TextMapSchema.default({}),
      }),
    )
    .default({}),
  envelopes: z
    .array(
      z.object({
        id: z.string(),
        importance: ImportanceSchema,
        description: z.string().optional(),
        assignedPlayerId: z.string().nullable().default(null),
      }),
    )
    .default([]),
  round: z
    .object({
      phase: z.enum(["IDLE", "INTRO", "ACTIVE", "COOLDOWN"]),
      roundIndex: z.number().int().nonnegative(),
      results: z
        .record(
          z.object({
            winners: z.array(z.string()),
            metadata: z.record(z.unknown()),
            finishedAt: z.number(),
          }),
        )
        .default({}),
    })
    .default({ phase: "IDLE", roundIndex: 0 }),
  hintsHistory: z.array(HintRecordSchema).default([]),
  killerActions: z
    .object({ destroyUsed: z.number().int().nonnegative().default(0) })
    .default({}),
  seed: StorySeedSchema.default({}),
});

/** Validates a stored session document; throws a `ZodError` when it is unusable. */
export function parseSessionDocument(raw: unknown): SessionState {
  return SessionDocumentSchema.parse(raw);
}
