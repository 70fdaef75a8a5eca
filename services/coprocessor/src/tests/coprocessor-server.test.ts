import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { buildServer } from "../server.js";

const SIGNING_KEY_HEX = "01".repeat(32);
const PROCESSOR = "0x9999999999999999999999999999999999999999";
const ALICE = "0x1111111111111111111111111111111111111111";
const BOB = "0x2222222222222222222222222222222222222222";

function createTempDbPath() {
  const dir = mkdtempSync(join(tmpdir(), "cxt-coprocessor-server-"));
  return {
    dir,
    dbPath: join(dir, "coprocessor.db"),
  };
}

test("health endpoint reports overflow policy", async () => {
  const temp = createTempDbPath();
  const app = await buildServer({ dbPath: temp.dbPath, signingKeyHex: SIGNING_KEY_HEX });
  try {
    const res = await app.inject({ method: "GET", url: "/health" });
    assert.equal(res.statusCode, 200);
    const body = res.json() as { ok: boolean; service: string; overflowPolicy: string };
    assert.equal(body.ok, true);
    assert.equal(body.service, "coprocessor");
    assert.equal(body.overflowPolicy, "trap");
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("requires a signing key", async () => {
  const temp = createTempDbPath();
  const previous = process.env.COPROCESSOR_SIGNING_KEY_HEX;
  delete process.env.COPROCESSOR_SIGNING_KEY_HEX;
  try {
    await assert.rejects(buildServer({ dbPath: temp.dbPath }), /COPROCESSOR_SIGNING_KEY_HEX/);
  } finally {
    if (previous !== undefined) process.env.COPROCESSOR_SIGNING_KEY_HEX = previous;
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("encrypts, verifies, grants and decrypts over HTTP", async () => {
  const temp = createTempDbPath();
  const app = await buildServer({ dbPath: temp.dbPath, signingKeyHex: SIGNING_KEY_HEX });
  try {
    const encryptRes = await app.inject({
      method: "POST",
      url: "/inputs/encrypt",
      payload: { value: "42", owner: ALICE, verifier: PROCESSOR },
    });
    assert.equal(encryptRes.statusCode, 201);
    const input = encryptRes.json() as { handle: string; proof: string };

    const verifyRes = await app.inject({
      method: "POST",
      url: "/inputs/verify",
      payload: { handle: input.handle, proof: input.proof, owner: ALICE, processor: PROCESSOR },
    });
    assert.equal(verifyRes.statusCode, 200);
    assert.equal((verifyRes.json() as { handle: string }).handle, input.handle);

    const grantRes = await app.inject({
      method: "POST",
      url: "/acl/grant",
      payload: { handle: input.handle, grantee: ALICE, processor: PROCESSOR },
    });
    assert.equal(grantRes.statusCode, 200);
    const grantBody = grantRes.json() as { acl: { grantees: string[]; public: boolean } };
    assert.deepEqual(grantBody.acl.grantees, [ALICE]);
    assert.equal(grantBody.acl.public, false);

    const aliceRes = await app.inject({
      method: "POST",
      url: "/decrypt/user",
      headers: { "x-caller-identity": ALICE },
      payload: { handle: input.handle },
    });
    assert.equal(aliceRes.statusCode, 200);
    assert.equal((aliceRes.json() as { value: string }).value, "42");

    const bobRes = await app.inject({
      method: "POST",
      url: "/decrypt/user",
      headers: { "x-caller-identity": BOB },
      payload: { handle: input.handle },
    });
    assert.equal(bobRes.statusCode, 403);
    assert.equal((bobRes.json() as { error: string }).error, "access_denied");

    const anonymousRes = await app.inject({
      method: "POST",
      url: "/decrypt/user",
      payload: { handle: input.handle },
    });
    assert.equal(anonymousRes.statusCode, 401);
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("rejects malformed inputs and forged proofs", async () => {
  const temp = createTempDbPath();
  const app = await buildServer({ dbPath: temp.dbPath, signingKeyHex: SIGNING_KEY_HEX });
  try {
    const negativeRes = await app.inject({
      method: "POST",
      url: "/inputs/encrypt",
      payload: { value: "-1", owner: ALICE, verifier: PROCESSOR },
    });
    assert.equal(negativeRes.statusCode, 400);

    const tooLargeRes = await app.inject({
      method: "POST",
      url: "/inputs/encrypt",
      payload: { value: "18446744073709551616", owner: ALICE, verifier: PROCESSOR },
    });
    assert.equal(tooLargeRes.statusCode, 400);

    const encryptRes = await app.inject({
      method: "POST",
      url: "/inputs/encrypt",
      payload: { value: "7", owner: ALICE, verifier: PROCESSOR },
    });
    const input = encryptRes.json() as { handle: string; proof: string };

    const forgedRes = await app.inject({
      method: "POST",
      url: "/inputs/verify",
      payload: { handle: input.handle, proof: input.proof, owner: BOB, processor: PROCESSOR },
    });
    assert.equal(forgedRes.statusCode, 400);
    assert.equal((forgedRes.json() as { error: string }).error, "invalid_proof");
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("publishes a handle for public decryption", async () => {
  const temp = createTempDbPath();
  const app = await buildServer({ dbPath: temp.dbPath, signingKeyHex: SIGNING_KEY_HEX });
  try {
    const zeroRes = await app.inject({
      method: "POST",
      url: "/ciphertexts/zero",
      payload: { processor: PROCESSOR },
    });
    assert.equal(zeroRes.statusCode, 201);
    const zero = (zeroRes.json() as { handle: string }).handle;

    const beforeRes = await app.inject({
      method: "POST",
      url: "/decrypt/public",
      payload: { handle: zero },
    });
    assert.equal(beforeRes.statusCode, 403);

    const publishRes = await app.inject({
      method: "POST",
      url: "/acl/public",
      payload: { handle: zero, processor: PROCESSOR },
    });
    assert.equal(publishRes.statusCode, 200);

    const afterRes = await app.inject({
      method: "POST",
      url: "/decrypt/public",
      payload: { handle: zero },
    });
    assert.equal(afterRes.statusCode, 200);
    assert.equal((afterRes.json() as { value: string }).value, "0");

    const aclRes = await app.inject({ method: "GET", url: `/acl/${zero}` });
    assert.equal(aclRes.statusCode, 200);
    assert.equal((aclRes.json() as { acl: { public: boolean } }).acl.public, true);
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("engine endpoints require the service token when configured", async () => {
  const temp = createTempDbPath();
  const app = await buildServer({
    dbPath: temp.dbPath,
    signingKeyHex: SIGNING_KEY_HEX,
    serviceAuthToken: "test-secret",
  });
  try {
    const deniedRes = await app.inject({
      method: "POST",
      url: "/ciphertexts/zero",
      payload: { processor: PROCESSOR },
    });
    assert.equal(deniedRes.statusCode, 401);
    assert.equal((deniedRes.json() as { error: string }).error, "unauthorized_service");

    const allowedRes = await app.inject({
      method: "POST",
      url: "/ciphertexts/zero",
      headers: { "x-service-token": "test-secret" },
      payload: { processor: PROCESSOR },
    });
    assert.equal(allowedRes.statusCode, 201);

    const encryptRes = await app.inject({
      method: "POST",
      url: "/inputs/encrypt",
      payload: { value: "1", owner: ALICE, verifier: PROCESSOR },
    });
    assert.equal(encryptRes.statusCode, 201);
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});
