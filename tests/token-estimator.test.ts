import { describe, it, expect } from "vitest";
import { MESSAGE_OVERHEAD, TokenEstimator } from "../src/context/token-estimator.js";
import { makeMessage } from "../src/llm/types.js";

describe("TokenEstimator", () => {
  it("weights characters by class", () => {
    const estimator = new TokenEstimator();
    // 10 word chars × 0.25 + 1 space × 0.05
    expect(estimator.raw("hello world")).toBeCloseTo(2.55);
    expect(estimator.estimate("hello world")).toBe(3);
    expect(estimator.estimate("")).toBe(0);
  });

  it("counts CJK characters as one token each", () => {
    expect(new TokenEstimator().estimate("日本語")).toBe(3);
  });

  it("adds a fixed overhead per message", () => {
    const estimator = new TokenEstimator();
    const message = makeMessage("user", "hello world");
    expect(estimator.estimateMessage(message)).toBe(MESSAGE_OVERHEAD + 3);
    expect(estimator.estimateMessages([message, message])).toBe(2 * (MESSAGE_OVERHEAD + 3));
  });

  // ── Calibration ────────────────────────────────────────

  it("moves toward observed usage", () => {
    const estimator = new TokenEstimator();
    estimator.observe(100, 200);

    expect(estimator.calibration.factor).toBeCloseTo(1.2);
    expect(estimator.calibration.samples).toBe(1);
    // 2.55 × 1.2 = 3.06
    expect(estimator.estimate("hello world")).toBe(4);
  });

  it("clamps the correction factor", () => {
    const estimator = new TokenEstimator();
    estimator.observe(10, 10_000);
    expect(estimator.calibration.factor).toBe(2);

    const low = new TokenEstimator();
    for (let i = 0; i < 50; i++) low.observe(1000, 1);
    expect(low.calibration.factor).toBe(0.5);
  });

  it("ignores empty observations", () => {
    const estimator = new TokenEstimator();
    estimator.observe(0, 50);
    estimator.observe(50, 0);
    expect(estimator.calibration).toEqual({ factor: 1, samples: 0 });
  });
});
