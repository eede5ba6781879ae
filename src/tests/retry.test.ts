import test from "node:test";
import assert from "node:assert/strict";

import { DEFAULT_RETRY_POLICY, backoffDelayMs } from "../application/services/retry";

test("Backoff exponencial con jitter: mitad fija, mitad aleatoria", () => {
  const p = DEFAULT_RETRY_POLICY;

  assert.equal(backoffDelayMs(1, p, () => 0), 250);
  assert.equal(backoffDelayMs(1, p, () => 1), 500);
  assert.equal(backoffDelayMs(2, p, () => 0), 500);
  assert.equal(backoffDelayMs(3, p, () => 0.5), 1500);
});

test("Backoff se topa en maxDelayMs", () => {
  const p = DEFAULT_RETRY_POLICY;
  assert.equal(backoffDelayMs(10, p, () => 0), 4000);
  assert.equal(backoffDelayMs(10, p, () => 1), 8000);
});
