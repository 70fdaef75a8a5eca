import assert from "node:assert/strict";
import test from "node:test";
import { KeyedLock } from "../keyed-lock.js";

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

test("runs work for one key in admission order", async () => {
  const lock = new KeyedLock();
  const order: string[] = [];

  await Promise.all([
    lock.run("alice", async () => {
      await tick();
      order.push("a1");
    }),
    lock.run("alice", async () => {
      order.push("a2");
    }),
    lock.run("bob", async () => {
      order.push("b1");
    }),
  ]);

  assert.deepEqual(order, ["b1", "a1", "a2"]);
  assert.equal(lock.pendingKeys, 0);
});

test("a failing task does not block the next one for the same key", async () => {
  const lock = new KeyedLock();

  const failed = lock.run("alice", async () => {
    throw new Error("boom");
  });
  const next = lock.run("alice", async () => "done");

  await assert.rejects(failed, /boom/);
  assert.equal(await next, "done");
  assert.equal(lock.pendingKeys, 0);
});
