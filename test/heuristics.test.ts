import { describe, it, expect } from "vitest";
import {
  countAgents,
  countFirstPresent,
  countStages,
  hasContractTerms,
  hasTestGateTerms,
} from "../src/heuristics.js";

describe("countStages", () => {
  it("counts sequence entries", () => {
    expect(countStages({ stages: ["a", "b", "c"] })).toBe(3);
  });

  it("counts mapping keys", () => {
    expect(countStages({ phases: { plan: {}, build: {} } })).toBe(2);
  });

  it("prefers stages over pipeline over phases", () => {
    expect(countStages({ phases: [1], pipeline: [1, 2], stages: [1, 2, 3] })).toBe(3);
    expect(countStages({ phases: [1], pipeline: [1, 2] })).toBe(2);
  });

  it("uses a present field even when it is not countable", () => {
    expect(countStages({ stages: null, pipeline: [1, 2, 3, 4, 5, 6] })).toBe(0);
    expect(countStages({ stages: "five", pipeline: [1, 2, 3, 4, 5, 6] })).toBe(0);
  });

  it("returns 0 when no stage field exists", () => {
    expect(countStages({ steps: [1, 2, 3, 4, 5] })).toBe(0);
  });

  it("returns 0 for documents that are not mappings", () => {
    expect(countStages(["stages", "pipeline"])).toBe(0);
    expect(countStages(null)).toBe(0);
    expect(countStages("stages")).toBe(0);
  });
});

describe("countAgents", () => {
  it("reads agents, roles, workers in priority order", () => {
    expect(countAgents({ workers: [1], roles: [1, 2], agents: [1, 2, 3] })).toBe(3);
    expect(countAgents({ workers: [1], roles: [1, 2] })).toBe(2);
    expect(countAgents({ workers: { w1: "x" } })).toBe(1);
  });

  it("returns 0 when absent", () => {
    expect(countAgents({})).toBe(0);
  });
});

describe("countFirstPresent", () => {
  it("ignores inherited properties", () => {
    expect(countFirstPresent({}, ["toString"])).toBe(0);
  });
});

describe("presence checks", () => {
  it("finds contract terms case-insensitively", () => {
    expect(hasContractTerms("uses a Typed_Interface")).toBe(true);
    expect(hasContractTerms("ComponentContract")).toBe(true);
    expect(hasContractTerms("interfaces only")).toBe(false);
  });

  it("finds test gate terms", () => {
    expect(hasTestGateTerms("MECHANICAL_GATE before merge")).toBe(true);
    expect(hasTestGateTerms("pass_fail")).toBe(true);
    expect(hasTestGateTerms("tests run nightly")).toBe(false);
  });
});
