import Fastify, { type FastifyReply, type FastifyRequest } from "fastify";
import {
  CALLER_IDENTITY_HEADER,
  EngineError,
  SERVICE_AUTH_HEADER,
  engineErrorStatus,
  isCiphertextHandle,
  isServiceAuthAuthorized,
  parseCallerIdentityHeader,
  parseIdentity,
  type AclResponse,
  type AddCiphertextsRequest,
  type CiphertextResponse,
  type DecryptRequest,
  type DecryptResponse,
  type EncryptInputResponse,
  type EncryptZeroRequest,
  type GrantAccessRequest,
  type GrantPublicRequest,
  type Identity,
  type VerifyInputRequest,
} from "@cxt/shared";
import { Coprocessor, isOverflowPolicy, isU64, type OverflowPolicy } from "./coprocessor.js";
import { SqliteCiphertextStore } from "./storage/ciphertext-store.js";

const DEFAULT_COPROCESSOR_DB_PATH = "data/coprocessor.db";

interface ParsedEncryptInput {
  value: bigint;
  owner: Identity;
  verifier: Identity;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseU64(value: unknown): bigint | null {
  if (typeof value !== "string" || !/^\d{1,20}$/.test(value)) return null;
  const parsed = BigInt(value);
  return isU64(parsed) ? parsed : null;
}

function parseEncryptInputRequest(body: unknown): ParsedEncryptInput | null {
  if (!isObject(body)) return null;
  const value = parseU64(body.value);
  const owner = parseIdentity(body.owner);
  const verifier = parseIdentity(body.verifier);
  if (value === null || !owner || !verifier) return null;
  return { value, owner, verifier };
}

function parseVerifyInputRequest(body: unknown): VerifyInputRequest | null {
  if (!isObject(body)) return null;
  if (!isCiphertextHandle(body.handle)) return null;
  if (typeof body.proof !== "string") return null;
  const owner = parseIdentity(body.owner);
  const processor = parseIdentity(body.processor);
  if (!owner || !processor) return null;
  return { handle: body.handle, proof: body.proof, owner, processor };
}

function parseEncryptZeroRequest(body: unknown): EncryptZeroRequest | null {
  if (!isObject(body)) return null;
  const processor = parseIdentity(body.processor);
  return processor ? { processor } : null;
}

function parseAddRequest(body: unknown): AddCiphertextsRequest | null {
  if (!isObject(body)) return null;
  if (!isCiphertextHandle(body.a) || !isCiphertextHandle(body.b)) return null;
  const processor = parseIdentity(body.processor);
  if (!processor) return null;
  return { a: body.a, b: body.b, processor };
}

function parseGrantAccessRequest(body: unknown): GrantAccessRequest | null {
  if (!isObject(body)) return null;
  if (!isCiphertextHandle(body.handle)) return null;
  const grantee = parseIdentity(body.grantee);
  const processor = parseIdentity(body.processor);
  if (!grantee || !processor) return null;
  return { handle: body.handle, grantee, processor };
}

function parseGrantPublicRequest(body: unknown): GrantPublicRequest | null {
  if (!isObject(body)) return null;
  if (!isCiphertextHandle(body.handle)) return null;
  const processor = parseIdentity(body.processor);
  if (!processor) return null;
  return { handle: body.handle, processor };
}

function parseDecryptRequest(body: unknown): DecryptRequest | null {
  if (!isObject(body)) return null;
  if (!isCiphertextHandle(body.handle)) return null;
  return { handle: body.handle };
}

function sendEngineError(reply: FastifyReply, error: unknown) {
  if (error instanceof EngineError) {
    return reply.code(engineErrorStatus(error)).send({
      error: error.code,
      message: error.message,
    });
  }
  throw error;
}

interface BuildServerOptions {
  coprocessor?: Coprocessor;
  dbPath?: string;
  signingKeyHex?: string;
  overflowPolicy?: OverflowPolicy;
  serviceAuthToken?: string;
}

async function resolveCoprocessor(options: BuildServerOptions): Promise<Coprocessor> {
  if (options.coprocessor) return options.coprocessor;

  const signingKeyHex = options.signingKeyHex || process.env.COPROCESSOR_SIGNING_KEY_HEX;
  if (!signingKeyHex) {
    throw new Error(
      "COPROCESSOR_SIGNING_KEY_HEX is required (or pass signingKeyHex in buildServer options)",
    );
  }
  const envPolicy = process.env.COPROCESSOR_OVERFLOW_POLICY;
  if (envPolicy !== undefined && !isOverflowPolicy(envPolicy)) {
    throw new Error(`COPROCESSOR_OVERFLOW_POLICY must be 'trap' or 'wrap', got '${envPolicy}'`);
  }
  return Coprocessor.create({
    store: new SqliteCiphertextStore(
      options.dbPath || process.env.COPROCESSOR_DB_PATH || DEFAULT_COPROCESSOR_DB_PATH,
    ),
    signingKeyHex,
    overflowPolicy: options.overflowPolicy ?? envPolicy,
  });
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: true });
  const coprocessor = await resolveCoprocessor(options);
  const ownCoprocessor = !options.coprocessor;
  const serviceAuthToken = options.serviceAuthToken ?? process.env.SERVICE_AUTH_TOKEN;

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

  app.get("/health", async () => ({
    ok: true,
    service: "coprocessor",
    overflowPolicy: coprocessor.overflowPolicy,
    inputSigner: coprocessor.publicKeyHex,
  }));

  app.post("/inputs/encrypt", async (req, reply) => {
    const parsed = parseEncryptInputRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected value (decimal u64), owner and verifier addresses",
      });
    }

    const response: EncryptInputResponse = await coprocessor.encryptInput(parsed.value, {
      owner: parsed.owner,
      verifier: parsed.verifier,
    });
    return reply.code(201).send(response);
  });

  app.post("/inputs/verify", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) {
      return;
    }

    const parsed = parseVerifyInputRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected handle, proof, owner and processor",
      });
    }

    try {
      const handle = await coprocessor.verifyInput(parsed.handle, parsed.proof, {
        owner: parsed.owner,
        verifier: parsed.processor,
      });
      const response: CiphertextResponse = { handle };
      return response;
    } catch (error) {
      return sendEngineError(reply, error);
    }
  });

  app.post("/ciphertexts/zero", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) {
      return;
    }

    const parsed = parseEncryptZeroRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({ error: "invalid_request", message: "Expected processor" });
    }

    const response: CiphertextResponse = { handle: coprocessor.encryptZero(parsed.processor) };
    return reply.code(201).send(response);
  });

  app.post("/ciphertexts/add", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) {
      return;
    }

    const parsed = parseAddRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected operand handles a, b and processor",
      });
    }

    try {
      const response: CiphertextResponse = {
        handle: coprocessor.add(parsed.a, parsed.b, parsed.processor),
      };
      return reply.code(201).send(response);
    } catch (error) {
      return sendEngineError(reply, error);
    }
  });

  app.post("/acl/grant", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) {
      return;
    }

    const parsed = parseGrantAccessRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected handle, grantee and processor",
      });
    }

    try {
      coprocessor.allow(parsed.handle, parsed.grantee, parsed.processor);
      const response: AclResponse = { acl: coprocessor.acl(parsed.handle) };
      return response;
    } catch (error) {
      return sendEngineError(reply, error);
    }
  });

  app.post("/acl/public", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) {
      return;
    }

    const parsed = parseGrantPublicRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected handle and processor",
      });
    }

    try {
      coprocessor.allowPublic(parsed.handle, parsed.processor);
      const response: AclResponse = { acl: coprocessor.acl(parsed.handle) };
      return response;
    } catch (error) {
      return sendEngineError(reply, error);
    }
  });

  app.get<{ Params: { handle: string } }>("/acl/:handle", async (req, reply) => {
    if (!isCiphertextHandle(req.params.handle)) {
      return reply.code(400).send({ error: "invalid_handle" });
    }

    try {
      const response: AclResponse = { acl: coprocessor.acl(req.params.handle) };
      return response;
    } catch (error) {
      return sendEngineError(reply, error);
    }
  });

  app.post("/decrypt/user", async (req, reply) => {
    const requester = parseCallerIdentityHeader(req.headers[CALLER_IDENTITY_HEADER]);
    if (!requester) {
      return reply.code(401).send({
        error: "missing_caller",
        message: `Missing or invalid '${CALLER_IDENTITY_HEADER}' header`,
      });
    }

    const parsed = parseDecryptRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({ error: "invalid_request", message: "Expected handle" });
    }

    try {
      const value = coprocessor.userDecrypt(parsed.handle, requester);
      const response: DecryptResponse = { handle: parsed.handle, value: value.toString() };
      return response;
    } catch (error) {
      return sendEngineError(reply, error);
    }
  });

  app.post("/decrypt/public", async (req, reply) => {
    const parsed = parseDecryptRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({ error: "invalid_request", message: "Expected handle" });
    }

    try {
      const value = coprocessor.publicDecrypt(parsed.handle);
      const response: DecryptResponse = { handle: parsed.handle, value: value.toString() };
      return response;
    } catch (error) {
      return sendEngineError(reply, error);
    }
  });

  app.addHook("onClose", async () => {
    if (ownCoprocessor) {
      coprocessor.close();
    }
  });

  return app;
}
