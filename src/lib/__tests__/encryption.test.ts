import assert from "node:assert/strict";
import test from "node:test";
import { CacheDecryptError, deriveKey, StateCipher } from "../encryption.js";

test("encrypts and decrypts browser state with a passphrase key", () => {
  const cipher = new StateCipher("test-secret");
  const plain = JSON.stringify({ cookies: [{ name: "sid", value: "abc" }], origins: [] });

  const payload = cipher.encrypt(plain);

  assert.equal(payload.startsWith("v1."), true);
  assert.equal(payload.split(".").length, 4);
  assert.equal(payload.includes(plain), false);
  assert.equal(cipher.decrypt(payload), plain);
});

test("uses a fresh iv for every payload", () => {
  const cipher = new StateCipher("test-secret");
  assert.notEqual(cipher.encrypt("same"), cipher.encrypt("same"));
});

test("rejects payloads sealed with another key", () => {
  const payload = new StateCipher("test-secret").encrypt("state");
  const other = new StateCipher("another-test-secret");

  assert.throws(() => other.decrypt(payload), CacheDecryptError);
});

test("rejects malformed payloads", () => {
  const cipher = new StateCipher("test-secret");

  assert.throws(() => cipher.decrypt("not-a-payload"), CacheDecryptError);
  assert.throws(() => cipher.decrypt("v2.a.b.c"), CacheDecryptError);
});

test("derives raw keys from hex and hashes passphrases", () => {
  const hex = "00".repeat(32);

  assert.deepEqual(deriveKey(hex), Buffer.alloc(32));
  assert.equal(deriveKey("test-secret").length, 32);
  assert.throws(() => deriveKey("   "), /must not be empty/);
});
