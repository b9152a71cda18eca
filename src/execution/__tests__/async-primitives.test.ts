import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import test from "node:test";
import { drain } from "../../__tests__/helpers/fakes.js";
import { AsyncChannel } from "../async-channel.js";
import { Semaphore } from "../semaphore.js";

test("channel delivers buffered and later values in order", async () => {
  const channel = new AsyncChannel<number>();
  channel.push(1);

  const consumed = drain(channel);
  channel.push(2);
  await delay(1);
  channel.push(3);
  channel.close();
  channel.push(4);

  assert.deepEqual(await consumed, [1, 2, 3]);
  assert.equal(channel.isClosed, true);
});

test("channel failure rejects the reader after buffered values", async () => {
  const channel = new AsyncChannel<string>();
  const seen: string[] = [];
  channel.push("a");
  channel.fail(new Error("producer crashed"));

  await assert.rejects(async () => {
    for await (const value of channel) {
      seen.push(value);
    }
  }, /producer crashed/);
  assert.deepEqual(seen, ["a"]);
});

test("breaking out of iteration closes the channel", async () => {
  const channel = new AsyncChannel<number>();
  channel.push(1);
  channel.push(2);

  for await (const value of channel) {
    assert.equal(value, 1);
    break;
  }

  assert.equal(channel.isClosed, true);
  assert.deepEqual(await drain(channel), []);
});

test("semaphore caps concurrent holders and hands permits over in order", async () => {
  const semaphore = new Semaphore(2);
  const order: string[] = [];

  await Promise.all(
    ["a", "b", "c", "d"].map((label, index) =>
      semaphore.use(async () => {
        order.push(`start:${label}`);
        await delay(5 * (4 - index));
        order.push(`end:${label}`);
      })
    )
  );

  assert.equal(semaphore.peakActive, 2);
  assert.equal(semaphore.active, 0);
  assert.deepEqual(order.slice(0, 2), ["start:a", "start:b"]);
  assert.equal(order.indexOf("start:c") > order.indexOf("end:b"), true);
});

test("semaphore rejects a non-positive capacity", () => {
  assert.throws(() => new Semaphore(0), /positive integer/);
});
