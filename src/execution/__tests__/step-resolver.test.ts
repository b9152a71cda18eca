import assert from "node:assert/strict";
import test from "node:test";
import { MASKED_VALUE, maskSensitiveSteps, PassthroughStepResolver } from "../step-resolver.js";

test("masks typed values aimed at password fields", () => {
  const masked = maskSensitiveSteps([
    { action: "type", target: "Password input", value: "test-secret" },
    { action: "type", target: "Email input", value: "user@example.test" }
  ]);

  assert.equal(masked[0]?.value, MASKED_VALUE);
  assert.equal(masked[1]?.value, "user@example.test");
});

test("masks password keys inside fill_form payloads", () => {
  const [masked] = maskSensitiveSteps([
    {
      action: "fill_form",
      target: "Signup form",
      value: JSON.stringify({ email: "user@example.test", Password: "test-secret", confirmPassword: "test-secret" })
    }
  ]);

  assert.deepEqual(JSON.parse(masked?.value ?? "{}"), {
    email: "user@example.test",
    Password: MASKED_VALUE,
    confirmPassword: MASKED_VALUE
  });
});

test("leaves unparseable form values and other actions untouched", () => {
  const steps = [
    { action: "fill_form", target: "Form", value: "{not json" },
    { action: "click", target: "Password reset link", value: "ignored" },
    { action: "navigate", target: "/", value: null }
  ];

  assert.deepEqual(maskSensitiveSteps(steps), steps);
});

test("passthrough resolver keeps executable values and masks the display copy", async () => {
  const resolver = new PassthroughStepResolver();
  const steps = [
    { action: "navigate", target: "/login" },
    { action: "type", target: "password", value: "test-secret" }
  ];

  const resolved = await resolver.resolve("project-1", steps);

  assert.equal(resolved.executable[1]?.value, "test-secret");
  assert.equal(resolved.display[1]?.value, MASKED_VALUE);
  assert.equal(resolved.display.length, resolved.executable.length);
  assert.equal(steps[1]?.value, "test-secret");
});
