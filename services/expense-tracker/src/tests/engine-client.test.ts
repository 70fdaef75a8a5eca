import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import type { FastifyInstance } from "fastify";
import { Coprocessor, SqliteCiphertextStore, buildServer } from "@cxt/coprocessor";
import {
  AccessDeniedError,
  EngineUnavailableError,
  InvalidProofError,
  internalCiphertext,
} from "@cxt/shared";
import { HttpEncryptionEngine } from "../engine-client.js";
import { SqliteTrackerStore } from "../storage/tracker-store.js";
import { ExpenseTracker } from "../tracker.js";
import { ALICE, BOB, SIGNING_KEY_HEX, TRACKER } from "./harness.js";

const COPROCESSOR_URL = "http://coprocessor.test";
const SERVICE_TOKEN = "test-secret";

/** Routes fetch calls into the coprocessor app without opening a socket. */
function injectFetch(app: FastifyInstance): typeof fetch {
  return async (input, init) => {
    const target = new URL(
      typeof input === "string" ? input : input instanceof URL ? input.href : input.url,
    );
    const res = await app.inject({
      method: init?.method === "GET" ? "GET" : "POST",
      url: `${target.pathname}${target.search}`,
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      payload: typeof init?.body === "string" ? init.body : undefined,
    });
    return new Response(res.body, {
      status: res.statusCode,
      headers: { "content-type": "application/json" },
    });
  };
}

async function createRemote() {
  const dir = mkdtempSync(join(tmpdir(), "cxt-engine-client-"));
  const coprocessor = await Coprocessor.create({
    store: new SqliteCiphertextStore(join(dir, "coprocessor.db")),
    signingKeyHex: SIGNING_KEY_HEX,
  });
  const app = await buildServer({ coprocessor, serviceAuthToken: SERVICE_TOKEN });
  return {
    dir,
    coprocessor,
    app,
    engine(serviceAuthToken = SERVICE_TOKEN) {
      return new HttpEncryptionEngine({
        baseUrl: `${COPROCESSOR_URL}/`,
        processor: TRACKER,
        serviceAuthToken,
        fetchImpl: injectFetch(app),
      });
    },
    async cleanup() {
      await app.close();
      coprocessor.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

test("tracker accumulates through the HTTP engine", async () => {
  const remote = await createRemote();
  const store = new SqliteTrackerStore(join(remote.dir, "tracker.db"));
  try {
    const tracker = new ExpenseTracker({ engine: remote.engine(), store, processor: TRACKER });

    for (const value of [40n, 2n]) {
      const input = await remote.coprocessor.encryptInput(value, { owner: ALICE, verifier: TRACKER });
      await tracker.submitContribution(ALICE, input.handle, input.proof);
    }

    const handle = tracker.getMyTotalHandle(ALICE);
    assert.equal(remote.coprocessor.userDecrypt(handle, ALICE), 42n);
    assert.deepEqual([...remote.coprocessor.acl(handle).grantees].sort(), [ALICE, TRACKER]);
    assert.equal(remote.coprocessor.acl(handle).public, false);
  } finally {
    store.close();
    await remote.cleanup();
  }
});

test("maps coprocessor error codes back to engine errors", async () => {
  const remote = await createRemote();
  try {
    const engine = remote.engine();
    const bobsInput = await remote.coprocessor.encryptInput(7n, { owner: BOB, verifier: TRACKER });

    await assert.rejects(
      engine.verifyAndDecode(bobsInput.handle, bobsInput.proof, ALICE),
      InvalidProofError,
    );
    await assert.rejects(
      engine.add(internalCiphertext(bobsInput.handle), internalCiphertext(bobsInput.handle)),
      AccessDeniedError,
    );
  } finally {
    await remote.cleanup();
  }
});

test("a rejected service token surfaces as an unavailable engine", async () => {
  const remote = await createRemote();
  try {
    await assert.rejects(remote.engine("wrong-secret").encryptZero(), EngineUnavailableError);
  } finally {
    await remote.cleanup();
  }
});

test("a failing transport surfaces as an unavailable engine", async () => {
  const engine = new HttpEncryptionEngine({
    baseUrl: COPROCESSOR_URL,
    processor: TRACKER,
    fetchImpl: async () => {
      throw new TypeError("fetch failed");
    },
  });

  await assert.rejects(engine.encryptZero(), (error: unknown) => {
    assert.ok(error instanceof EngineUnavailableError);
    assert.equal(error.message, "Coprocessor /ciphertexts/zero unreachable: fetch failed");
    return true;
  });
});
