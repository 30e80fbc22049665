import test from "node:test";
import assert from "node:assert/strict";
import { createMutex } from "./mutex.js";
import { sleep } from "./helpers.js";

test("runs critical sections one at a time in call order", async () => {
  const mutex = createMutex();
  const events: string[] = [];

  const first = mutex.runExclusive(async () => {
    events.push("a:start");
    await sleep(20);
    events.push("a:end");
    return 1;
  });
  const second = mutex.runExclusive(() => {
    events.push("b:start");
    events.push("b:end");
    return 2;
  });

  assert.deepEqual(await Promise.all([first, second]), [1, 2]);
  assert.deepEqual(events, ["a:start", "a:end", "b:start", "b:end"]);
});

test("a failing section rejects its caller and releases the lock", async () => {
  const mutex = createMutex();

  await assert.rejects(
    mutex.runExclusive(() => {
      throw new Error("boom");
    }),
    /boom/
  );

  const value = await mutex.runExclusive(() => "after");
  assert.equal(value, "after");
  assert.equal(mutex.isLocked(), false);
});

test("reports locked while a section is pending", async () => {
  const mutex = createMutex();
  const running = mutex.runExclusive(() => sleep(10));

  assert.equal(mutex.isLocked(), true);
  await running;
  assert.equal(mutex.isLocked(), false);
});
