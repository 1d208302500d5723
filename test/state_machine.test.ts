import { describe, expect, it } from "vitest";
import {
  ALL_STAGES,
  canRetryAnchor,
  failedStage,
  isFailed,
  nextStage,
  nextState,
} from "../src/core/state-machine.js";

describe("state machine", () => {
  it("orders the stages from INIT to VERIFIABLE", () => {
    expect(ALL_STAGES).toEqual(["INIT", "FINGERPRINTED", "MANIFESTED", "CERTIFIED", "ANCHORED", "VERIFIABLE"]);
    expect(nextStage("INIT")).toBe("FINGERPRINTED");
    expect(nextStage("VERIFIABLE")).toBeNull();
  });

  it("advances on success and names the failed stage on failure", () => {
    expect(nextState("MANIFESTED", "success")).toBe("CERTIFIED");
    expect(nextState("MANIFESTED", "failure")).toBe("failed_CERTIFIED");
    expect(nextState("INIT", "failure")).toBe("failed_FINGERPRINTED");
  });

  it("stays put at the end of the pipeline", () => {
    expect(nextState("VERIFIABLE", "success")).toBe("VERIFIABLE");
    expect(nextState("VERIFIABLE", "failure")).toBe("VERIFIABLE");
  });

  it("recognises failed statuses", () => {
    expect(isFailed("failed_ANCHORED")).toBe(true);
    expect(isFailed("ANCHORED")).toBe(false);
    expect(failedStage("failed_MANIFESTED")).toBe("MANIFESTED");
    expect(failedStage("CERTIFIED")).toBeNull();
  });

  it("allows anchoring to be retried only once a receipt exists", () => {
    expect(canRetryAnchor("CERTIFIED")).toBe(true);
    expect(canRetryAnchor("failed_ANCHORED")).toBe(true);
    expect(canRetryAnchor("ANCHORED")).toBe(true);
    expect(canRetryAnchor("MANIFESTED")).toBe(false);
    expect(canRetryAnchor("failed_CERTIFIED")).toBe(false);
    expect(canRetryAnchor("VERIFIABLE")).toBe(false);
  });
});
