import assert from "node:assert/strict";
import test from "node:test";
import { createCoreRuntime, createSettlementDecision } from "../lib/runtime.js";
import type { SettlementRequest } from "../lib/settlement.js";
import { withEnv } from "./helpers/fakes.js";

const request: SettlementRequest = {
  paymentId: 11,
  engagementId: 7,
  amount: 150,
  paymentMethod: "pix",
  status: "Pending"
};

test("the core runtime builds only a logger and a database", () => {
  const runtime = createCoreRuntime("tutors");

  assert.deepEqual(Object.keys(runtime).sort(), ["database", "logger"]);
});

test("a forced outcome pins the settlement decision", async () => {
  await withEnv({ SETTLEMENT_FORCED_OUTCOME: "cancelled" }, async () => {
    const decide = createSettlementDecision();
    assert.equal(await decide(request), "Cancelled");
  });
});
