import { Hono } from "hono";
import type { Context, Next } from "hono";
import { z } from "zod";

import {
  AbortTimer,
  AssignEnvelope,
  BeginNextRound,
  ConfirmStart,
  DeliverHint,
  DestroyHint,
  DistributeEnvelopes,
  FinishCurrentRound,
  GameCommandInputError,
  HintDeliveryError,
  HintDestroyError,
  LockCanon,
  PrepareRound,
  RegisterPlayer,
  ResetEnvelopes,
  ResetSession,
  SessionNotFoundError,
  SetJoinLock,
  envelopeSummaryOf,
  listHints,
  playerEnvelopes,
  roundStatus,
  type HintDeliveryFailure,
  type HintDestroyFailure,
} from "./core.js";
import type { Command, CommandContext, Logger } from "./core.js";

export type DispatchCommand = <TResult>(
  command: Command<TResult>,
  context: CommandContext,
) => Promise<TResult>;

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
}

type ErrorStatus = 400 | 403 | 404 | 409 | 500;

const DELIVERY_STATUS: Readonly<Record<HintDeliveryFailure, ErrorStatus>> = {
  unknown_discoverer: 404,
  round_not_prepared: 409,
  tier_unavailable: 400,
};

const DESTROY_STATUS: Readonly<Record<HintDestroyFailure, ErrorStatus>> = {
  not_found: 404,
  already_destroyed: 409,
  not_authorized: 403,
  quota_reached: 409,
};

const RegisterPlayerBody = z.object({
  playerId: z.string().min(1),
  displayName: z.string().min(1),
  role: z.enum(["culprit", "other"]).optional(),
  character: z.string().optional(),
});

const JoinLockBody = z.object({ locked: z.boolean() });

const CanonBody = z.object({ facts: z.record(z.string()) });

const FinishRoundBody = z
  .object({
    winners: z.array(z.string()).default([]),
    metadata: z.record(z.unknown()).default({}),
  })
  .default({});

const PrepareRoundBody = z
  .object({ hints: z.record(z.string()).optional() })
  .default({});

const AssignEnvelopeBody = z.object({
  envelopeId: z.union([z.string().min(1), z.number()]).transform(String),
  playerId: z.string().min(1),
});

const DeliverHintBody = z.object({
  roundIndex: z.number().int().positive(),
  discovererId: z.string().min(1),
  tier: z.string().min(1),
  share: z.boolean().default(false),
});

const DestroyHintBody = z.object({ killerId: z.string().min(1) });

const SESSION = "/api/sessions/:sessionId";

export function createBackendApp({
  port,
  logger,
  createContext,
  dispatch,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.onError((error: Error, c: Context) => {
    if (error instanceof GameCommandInputError) {
      return c.json({ error: error.message, issues: error.issues }, 400);
    }
    if (error instanceof HintDeliveryError) {
      return c.json({ error: error.code, message: error.message }, DELIVERY_STATUS[error.code]);
    }
    if (error instanceof HintDestroyError) {
      return c.json({ error: error.code, message: error.message }, DESTROY_STATUS[error.code]);
    }
    if (error instanceof SessionNotFoundError) {
      return c.json({ error: error.message }, 404);
    }
    if (error instanceof z.ZodError) {
      return c.json({ error: "invalid_body", issues: error.issues.map(formatIssue) }, 400);
    }

    logger.error("Request failed", { path: c.req.path, error });
    return c.json({ error: getErrorMessage(error) }, 500);
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: Date.now(), config: { port } }),
  );

  app.get("/api/join/:joinCode", async (c: Context) => {
    const joinCode = paramOf(c, "joinCode");
    const sessionId = await createContext().sessionGateway.findSessionIdByJoinCode(joinCode);
    if (sessionId === undefined) {
      throw new SessionNotFoundError(joinCode);
    }
    return c.json({ sessionId });
  });

  app.post(`${SESSION}/players`, async (c: Context) => {
    const body = RegisterPlayerBody.parse(await readJson(c));
    const result = await dispatch(
      new RegisterPlayer(
        sessionIdOf(c),
        body.playerId,
        body.displayName,
        Date.now(),
        body.role,
        body.character,
      ),
      createContext(),
    );
    return result.ok ? c.json(result) : c.json(result, 409);
  });

  app.post(`${SESSION}/join-lock`, async (c: Context) => {
    const body = JoinLockBody.parse(await readJson(c));
    return c.json(
      await dispatch(new SetJoinLock(sessionIdOf(c), body.locked, Date.now()), createContext()),
    );
  });

  app.post(`${SESSION}/canon`, async (c: Context) => {
    const body = CanonBody.parse(await readJson(c));
    const result = await dispatch(
      new LockCanon(sessionIdOf(c), body.facts, Date.now()),
      createContext(),
    );
    return result.ok ? c.json(result) : c.json(result, 409);
  });

  app.get(`${SESSION}/round`, async (c: Context) =>
    c.json(await roundStatus(createContext(), sessionIdOf(c))),
  );

  app.post(`${SESSION}/round/next`, async (c: Context) => {
    const result = await dispatch(new BeginNextRound(sessionIdOf(c), Date.now()), createContext());
    return result.ok ? c.json(result) : c.json(result, 409);
  });

  app.post(`${SESSION}/round/confirm`, async (c: Context) => {
    const result = await dispatch(new ConfirmStart(sessionIdOf(c), Date.now()), createContext());
    return result.ok ? c.json(result) : c.json(result, 409);
  });

  app.post(`${SESSION}/round/finish`, async (c: Context) => {
    const body = FinishRoundBody.parse(await readJson(c));
    const result = await dispatch(
      new FinishCurrentRound(sessionIdOf(c), body.winners, body.metadata, Date.now()),
      createContext(),
    );
    return result.ok ? c.json(result) : c.json(result, 409);
  });

  app.post(`${SESSION}/round/abort-timer`, async (c: Context) =>
    c.json(await dispatch(new AbortTimer(sessionIdOf(c), Date.now()), createContext())),
  );

  app.post(`${SESSION}/rounds/:roundIndex/prepare`, async (c: Context) => {
    const body = PrepareRoundBody.parse(await readJson(c));
    const result = await dispatch(
      new PrepareRound(sessionIdOf(c), Number(paramOf(c, "roundIndex")), Date.now(), body.hints),
      createContext(),
    );
    return result.ok ? c.json(result) : c.json(result, 404);
  });

  app.post(`${SESSION}/envelopes/distribute`, async (c: Context) =>
    c.json(await dispatch(new DistributeEnvelopes(sessionIdOf(c), Date.now()), createContext())),
  );

  app.post(`${SESSION}/envelopes/reset`, async (c: Context) =>
    c.json(await dispatch(new ResetEnvelopes(sessionIdOf(c), Date.now()), createContext())),
  );

  app.post(`${SESSION}/envelopes/assign`, async (c: Context) => {
    const body = AssignEnvelopeBody.parse(await readJson(c));
    const result = await dispatch(
      new AssignEnvelope(sessionIdOf(c), body.envelopeId, body.playerId, Date.now()),
      createContext(),
    );
    return result.ok ? c.json(result) : c.json(result, 404);
  });

  app.get(`${SESSION}/envelopes/summary`, async (c: Context) =>
    c.json(await envelopeSummaryOf(createContext().sessionGateway, sessionIdOf(c))),
  );

  app.get(`${SESSION}/players/:playerId/envelopes`, async (c: Context) => {
    const playerId = paramOf(c, "playerId");
    const envelopes = await playerEnvelopes(
      createContext().sessionGateway,
      sessionIdOf(c),
      playerId,
    );
    if (!envelopes) {
      return c.json({ error: "unknown_player" }, 404);
    }
    return c.json({ playerId, envelopes });
  });

  app.post(`${SESSION}/hints/deliver`, async (c: Context) => {
    const body = DeliverHintBody.parse(await readJson(c));
    const record = await dispatch(
      new DeliverHint(
        sessionIdOf(c),
        body.roundIndex,
        body.discovererId,
        body.tier,
        body.share,
        Date.now(),
      ),
      createContext(),
    );
    return c.json({ ok: true, hint: record });
  });

  app.post(`${SESSION}/hints/:hintId/destroy`, async (c: Context) => {
    const body = DestroyHintBody.parse(await readJson(c));
    const record = await dispatch(
      new DestroyHint(sessionIdOf(c), paramOf(c, "hintId"), body.killerId, Date.now()),
      createContext(),
    );
    return c.json({ ok: true, hint: record });
  });

  app.get(`${SESSION}/hints`, async (c: Context) => {
    const { sessionGateway } = createContext();
    const playerId = c.req.query("playerId");
    const hints =
      playerId === undefined
        ? await listHints(sessionGateway, sessionIdOf(c))
        : await listHints(sessionGateway, sessionIdOf(c), playerId);
    return c.json({ hints });
  });

  app.post(`${SESSION}/reset`, async (c: Context) =>
    c.json(await dispatch(new ResetSession(sessionIdOf(c), Date.now()), createContext())),
  );

  return app;
}

function paramOf(c: Context, name: string): string {
  return c.req.param(name) ?? "";
}

function sessionIdOf(c: Context): string {
  return paramOf(c, "sessionId");
}

async function readJson(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim().length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    throw GameCommandInputError.because(["Request body must be valid JSON"]);
  }
}

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
