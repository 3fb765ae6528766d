import express from "express";
import type { NextFunction, Request, Response } from "express";
import pino from "pino";
import { pinoHttp } from "pino-http";
import { z } from "zod";

import { env } from "./env.js";
import { ConfigError, InvalidProviderError, UpstreamError } from "./errors.js";
import type { BookingConsolidator } from "./bookings/consolidator.js";
import type { OutreachDispatcher } from "./calls/dispatcher.js";
import { EXTERNAL_CALL_STATUSES, type CallSessionHandle } from "./calls/types.js";
import { DirectoryError, type ProviderDirectory } from "./providers/directory.js";
import { filterByPreferences, rank } from "./providers/ranking.js";
import { startSolo, startSwarm, type OutreachDeps } from "./outreach/campaign.js";
import type { ServiceStatus } from "./status.js";
import { twilioValidateMiddleware } from "./twilio/verify.js";

const log = pino({ level: env.LOG_LEVEL });

export type AppDeps = {
  dispatcher: OutreachDispatcher;
  consolidator: BookingConsolidator;
  directory: ProviderDirectory;
  /** Throws ConfigError while call placement is not configured. */
  outreach: () => OutreachDeps;
  status: () => ServiceStatus;
  twilio: { authToken: string | undefined; validateSignature: boolean; publicBaseUrl: string | undefined };
};

// ─── Request bodies ──────────────────────────────────────────────────────────

const startCallBody = z.object({
  phone_number: z.string().trim().min(1),
  task: z.string().trim().min(1)
});

const startSwarmBody = z.object({
  user_phone: z.string().trim().min(1),
  objective: z.string().trim().min(1),
  preferences: z
    .object({
      max_distance: z.number().nonnegative().optional(),
      min_rating: z.number().min(0).max(5).optional()
    })
    .nullish()
});

const providersQuery = z.object({
  min_rating: z.coerce.number().min(0).max(5).optional(),
  max_distance: z.coerce.number().nonnegative().optional(),
  limit: z.coerce.number().int().positive().optional()
});

const callStatusBody = z.object({
  call_ref: z.string().trim().min(1),
  status: z.enum(EXTERNAL_CALL_STATUSES)
});

const twilioStatusBody = z.object({
  CallSid: z.string().min(1),
  CallStatus: z.enum(EXTERNAL_CALL_STATUSES)
});

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

function parseBody<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new BadRequestError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ")
    );
  }
  return parsed.data;
}

// body-parser rejects unreadable bodies with an http-errors style `status` and `type`.
function bodyRejection(err: unknown): { status: number; message: string } | null {
  if (typeof err !== "object" || err === null) return null;
  if (!("type" in err) || typeof err.type !== "string") return null;
  if (!("status" in err) || typeof err.status !== "number" || err.status < 400 || err.status >= 500) return null;
  const message = err.type === "entity.parse.failed" ? "request body is not valid JSON" : `request body rejected: ${err.type}`;
  return { status: err.status, message };
}

type Handler = (req: Request, res: Response) => Promise<unknown> | unknown;

function route(fn: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch(next);
  };
}

function deployedAgent(session: CallSessionHandle) {
  const provider = session.target.kind === "provider" ? session.target.provider : null;
  return {
    session_id: session.id,
    provider_id: provider?.id ?? null,
    name: provider?.name ?? null,
    rank: provider?.rank ?? null,
    score: provider?.score ?? null,
    phone: session.target.phone,
    state: session.state,
    conversation_id: session.callRef?.conversationId ?? null,
    call_sid: session.callRef?.callSid ?? null,
    success: session.state !== "failed",
    error: session.state === "failed" ? session.failureReason : null
  };
}

export function createApp(deps: AppDeps) {
  const app = express();

  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());
  app.use(pinoHttp({ logger: log }));

  // ── Health & status ───────────────────────────────────────────────────────

  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.get("/status", (_req, res) => res.json(deps.status()));

  // ── Ranking query ─────────────────────────────────────────────────────────

  app.get(
    "/providers",
    route(async (req, res) => {
      const q = parseBody(providersQuery, req.query);
      const providers = await deps.directory.load();
      const pool =
        q.min_rating !== undefined || q.max_distance !== undefined
          ? filterByPreferences(providers, {
              minRating: q.min_rating ?? 0,
              maxDistance: q.max_distance ?? Number.POSITIVE_INFINITY
            })
          : providers;
      const ranked = rank(pool);
      res.json({ providers: q.limit ? ranked.slice(0, q.limit) : ranked });
    })
  );

  // ── Dispatch ──────────────────────────────────────────────────────────────

  app.post(
    "/start-call",
    route(async (req, res) => {
      const body = parseBody(startCallBody, req.body);
      const campaign = await startSolo(deps.outreach(), { phoneNumber: body.phone_number, task: body.task });
      const session = campaign.sessions[0];
      res.json({
        campaign_id: campaign.id,
        success: session.state !== "failed",
        session: deployedAgent(session)
      });
    })
  );

  app.post(
    "/start-swarm",
    route(async (req, res) => {
      const body = parseBody(startSwarmBody, req.body);
      const launch = await startSwarm(deps.outreach(), {
        userPhone: body.user_phone,
        objective: body.objective,
        preferences: {
          maxDistance: body.preferences?.max_distance,
          minRating: body.preferences?.min_rating
        }
      });
      res.json({
        campaign_id: launch.campaign.id,
        free_slots: launch.freeSlots,
        deployed_agents: launch.campaign.sessions.map(deployedAgent)
      });
    })
  );

  // ── Session progress ──────────────────────────────────────────────────────

  app.get("/sessions", (req, res) => {
    const campaignId = typeof req.query.campaign_id === "string" ? req.query.campaign_id : undefined;
    res.json({ sessions: deps.dispatcher.list(campaignId) });
  });

  app.get("/sessions/:id", (req, res) => {
    const id = deps.dispatcher.resolve(req.params.id);
    const session = id ? deps.dispatcher.get(id) : null;
    if (!session) return res.status(404).json({ error: "session not found" });
    res.json({ session });
  });

  // ── Call-state notifications ──────────────────────────────────────────────

  app.post(
    "/calls/status",
    route((req, res) => {
      const body = parseBody(callStatusBody, req.body);
      const applied = deps.dispatcher.onCallState(body.call_ref, body.status);
      res.json({ applied });
    })
  );

  const twilioVerify = twilioValidateMiddleware({
    authToken: deps.twilio.authToken,
    enabled: deps.twilio.validateSignature,
    publicBaseUrl: deps.twilio.publicBaseUrl
  });

  app.post("/twilio/voice/status", twilioVerify, (req, res) => {
    const parsed = twilioStatusBody.safeParse(req.body);
    if (parsed.success) {
      deps.dispatcher.onCallState(parsed.data.CallSid, parsed.data.CallStatus);
    } else {
      log.debug({ issues: parsed.error.issues }, "ignoring unrecognised Twilio status callback");
    }
    res.sendStatus(200);
  });

  // ── Confirmation ingestion & telemetry ────────────────────────────────────

  app.post("/confirm-booking", (req, res) => {
    const result = deps.consolidator.onConfirmation(req.body);
    if (result.status === "malformed") {
      return res.status(400).json({ status: "malformed", error: result.reason });
    }
    res.json(result);
  });

  app.get("/telemetry", (_req, res) => {
    res.json({ bookings: deps.consolidator.history() });
  });

  // ── Errors ────────────────────────────────────────────────────────────────

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const rejected = bodyRejection(err);
    if (rejected) {
      if (req.path === "/confirm-booking") {
        return res.status(rejected.status).json({ status: "malformed", error: rejected.message });
      }
      return res.status(rejected.status).json({ error: rejected.message });
    }
    if (err instanceof BadRequestError) return res.status(400).json({ error: err.message });
    if (err instanceof InvalidProviderError) {
      return res.status(422).json({ error: err.message, provider_id: err.providerId, field: err.field });
    }
    if (err instanceof ConfigError) return res.status(500).json({ error: err.message, missing: err.missing });
    if (err instanceof UpstreamError) return res.status(err.status).json({ error: err.message });
    if (err instanceof DirectoryError) return res.status(500).json({ error: err.message });
    log.error({ err }, "unhandled request error");
    res.status(500).json({ error: "internal error" });
  });

  return app;
}
