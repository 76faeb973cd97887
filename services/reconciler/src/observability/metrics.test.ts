import { register } from "prom-client";
import { beforeEach, describe, expect, it } from "vitest";

import { ACTIONS_TOTAL_NAME, recordAction, resetMetrics } from "./metrics.js";

describe("recordAction", () => {
  beforeEach(() => {
    resetMetrics();
  });

  it("counts actions by kind and outcome", async () => {
    recordAction("role", "success");
    recordAction("role", "success");
    recordAction("folder", "suppressed", 3);
    recordAction("connection", "failure", 0);

    const metric = await register.getSingleMetric(ACTIONS_TOTAL_NAME)?.get();

    expect(metric?.values).toEqual([
      expect.objectContaining({ labels: { kind: "role", outcome: "success" }, value: 2 }),
      expect.objectContaining({ labels: { kind: "folder", outcome: "suppressed" }, value: 3 }),
    ]);
  });
});
