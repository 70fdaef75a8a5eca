import Fastify, { type FastifyReply, type FastifyRequest } from "fastify";
import {
  CALLER_IDENTITY_HEADER,
  EngineError,
  NULL_HANDLE,
  SERVICE_AUTH_HEADER,
  engineErrorStatus,
  isCiphertextHandle,
  isServiceAuthAuthorized,
  parseCallerIdentityHeader,
  parseIdentity,
  type EncryptionEngine,
  type GetCapabilitiesResponse,
  type Identity,
  type ListAuditEventsResponse,
  type MakeTotalPublicResponse,
  type ShareTotalRequest,
  type ShareTotalResponse,
  type SubmitContributionRequest,
  type SubmitContributionResponse,
  type TotalHandleResponse,
  type TrackerInfoResponse,
} from "@cxt/shared";
import { HttpEncryptionEngine } from "./engine-client.js";
import { TrackerError, trackerErrorStatus } from "./errors.js";
import { buildOpenApiSpec } from "./openapi.js";
import { SqliteTrackerStore, type TrackerStore } from "./storage/tracker-store.js";
import { ExpenseTracker } from "./tracker.js";

const DEFAULT_TRACKER_DB_PATH = "data/expense-tracker.db";
const MAX_EVENT_LIMIT = 500;

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseSubmitContributionRequest(body: unknown): SubmitContributionRequest | null {
  if (!isObject(body)) return null;
  if (!isCiphertextHandle(body.contribution)) return null;
  if (typeof body.proof !== "string") return null;
  return { contribution: body.contribution, proof: body.proof };
}

function parseShareTotalRequest(body: unknown): ShareTotalRequest | null {
  if (!isObject(body)) return null;
  if (typeof body.viewer !== "string") return null;
  return { viewer: body.viewer };
}

function parseEventLimit(value: unknown): number | null {
  if (value === undefined) return MAX_EVENT_LIMIT;
  if (typeof value !== "string" || !/^\d+$/.test(value)) return null;
  const limit = Number(value);
  if (limit < 1 || limit > MAX_EVENT_LIMIT) return null;
  return limit;
}

function sendDomainError(reply: FastifyReply, error: unknown) {
  if (error instanceof TrackerError) {
    return reply.code(trackerErrorStatus(error)).send({
      error: error.code,
      message: error.message,
    });
  }
  if (error instanceof EngineError) {
    return reply.code(engineErrorStatus(error)).send({
      error: error.code,
      message: error.message,
    });
  }
  throw error;
}

interface BuildServerOptions {
  engine?: EncryptionEngine;
  trackerStore?: TrackerStore;
  dbPath?: string;
  processor?: string;
  coprocessorUrl?: string;
  serviceAuthToken?: string;
  serviceBaseUrl?: string;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: true });
  const processor = parseIdentity(options.processor ?? process.env.TRACKER_ADDRESS);
  if (!processor) {
    throw new Error(
      "TRACKER_ADDRESS must be a valid address (or pass processor in buildServer options)",
    );
  }
  const serviceAuthToken = options.serviceAuthToken ?? process.env.SERVICE_AUTH_TOKEN;
  const coprocessorUrl = options.coprocessorUrl ?? process.env.COPROCESSOR_URL;
  let engine = options.engine;
  if (!engine) {
    if (!coprocessorUrl) {
      throw new Error("COPROCESSOR_URL is required (or pass engine in buildServer options)");
    }
    engine = new HttpEncryptionEngine({ baseUrl: coprocessorUrl, processor, serviceAuthToken });
  }
  const trackerStore =
    options.trackerStore ||
    new SqliteTrackerStore(options.dbPath || process.env.TRACKER_DB_PATH || DEFAULT_TRACKER_DB_PATH);
  const ownStore = !options.trackerStore;
  const serviceBaseUrl =
    options.serviceBaseUrl ||
    process.env.SERVICE_BASE_URL ||
    `http://127.0.0.1:${process.env.PORT || 4201}`;

  const tracker = new ExpenseTracker({
    engine,
    store: trackerStore,
    processor,
    logger: app.log.child({ component: "expense-tracker" }),
  });

  function requireServiceAuth(req: FastifyRequest, reply: FastifyReply): boolean {
    if (isServiceAuthAuthorized(req.headers[SERVICE_AUTH_HEADER], serviceAuthToken)) {
      return true;
    }
    reply.code(401).send({
      error: "unauthorized_service",
      message: `Missing or invalid '${SERVICE_AUTH_HEADER}' header`,
    });
    return false;
  }

  function requireCaller(req: FastifyRequest, reply: FastifyReply): Identity | null {
    const caller = parseCallerIdentityHeader(req.headers[CALLER_IDENTITY_HEADER]);
    if (caller) {
      return caller;
    }
    reply.code(401).send({
      error: "missing_caller",
      message: `Missing or invalid '${CALLER_IDENTITY_HEADER}' header`,
    });
    return null;
  }

  function totalHandleResponse(identity: Identity): TotalHandleResponse {
    return {
      identity,
      handle: tracker.getTotalHandleOf(identity),
      hasTotal: tracker.account(identity) !== null,
    };
  }

  app.get("/health", async () => ({ ok: true, service: "expense-tracker" }));
  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));

  app.get("/tracker/info", async () => {
    const response: TrackerInfoResponse = {
      service: "expense-tracker",
      processor,
      nullHandle: NULL_HANDLE,
    };
    return response;
  });

  app.post("/contributions", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) {
      return;
    }
    const caller = requireCaller(req, reply);
    if (!caller) {
      return;
    }

    const parsed = parseSubmitContributionRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected contribution (32-byte handle) and proof",
      });
    }

    try {
      const receipt = await tracker.submitContribution(caller, parsed.contribution, parsed.proof);
      const response: SubmitContributionResponse = {
        identity: caller,
        handle: receipt.handle,
        event: receipt.event,
      };
      return reply.code(201).send(response);
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  app.get("/totals/me", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) {
      return;
    }
    return totalHandleResponse(caller);
  });

  app.get<{ Params: { identity: string } }>("/totals/:identity", async (req, reply) => {
    const identity = parseIdentity(req.params.identity);
    if (!identity) {
      return reply.code(400).send({ error: "invalid_identity" });
    }
    return totalHandleResponse(identity);
  });

  app.post("/totals/me/public", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) {
      return;
    }
    const caller = requireCaller(req, reply);
    if (!caller) {
      return;
    }

    try {
      const receipt = await tracker.makeTotalPublic(caller);
      const response: MakeTotalPublicResponse = {
        identity: caller,
        handle: receipt.handle,
        event: receipt.event,
      };
      return response;
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  app.post("/totals/me/share", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) {
      return;
    }
    const caller = requireCaller(req, reply);
    if (!caller) {
      return;
    }

    const parsed = parseShareTotalRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected viewer address",
      });
    }

    try {
      const receipt = await tracker.shareTotal(caller, parsed.viewer);
      const response: ShareTotalResponse = {
        owner: caller,
        viewer: receipt.viewer,
        handle: receipt.handle,
        event: receipt.event,
      };
      return response;
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  app.get<{ Querystring: { identity?: string; limit?: string } }>("/events", async (req, reply) => {
    const limit = parseEventLimit(req.query.limit);
    if (limit === null) {
      return reply.code(400).send({ error: "invalid_limit" });
    }
    let identity: Identity | undefined;
    if (req.query.identity !== undefined) {
      const parsed = parseIdentity(req.query.identity);
      if (!parsed) {
        return reply.code(400).send({ error: "invalid_identity" });
      }
      identity = parsed;
    }

    const response: ListAuditEventsResponse = {
      events: tracker.listEvents({ identity, limit }),
    };
    return response;
  });

  app.get<{ Params: { handle: string } }>("/capabilities/:handle", async (req, reply) => {
    if (!isCiphertextHandle(req.params.handle)) {
      return reply.code(400).send({ error: "invalid_handle" });
    }
    const grants = tracker.capabilitiesOf(req.params.handle);
    const response: GetCapabilitiesResponse = {
      handle: req.params.handle.toLowerCase(),
      public: grants.some((grant) => grant.grantee.kind === "public"),
      grants,
    };
    return response;
  });

  app.addHook("onClose", async () => {
    if (ownStore) {
      trackerStore.close();
    }
  });

  return app;
}
