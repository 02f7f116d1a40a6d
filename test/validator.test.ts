import { describe, it, expect } from "vitest";
import { validate } from "../src/validator.js";
import type { ArchitectureValue } from "../src/types.js";

// Satisfies both presence checks and matches no keyword
const HEALTHY = { contract: "api.ts", test_suite: "unit" };

function names(n: number, prefix: string): string[] {
  return Array.from({ length: n }, (_, i) => `${prefix}${i + 1}`);
}

function withHealthy(extra: Record<string, ArchitectureValue>): ArchitectureValue {
  return { ...HEALTHY, ...extra };
}

describe("validate", () => {
  it("passes a contract-first architecture", () => {
    const doc = {
      agents: ["a1"],
      stages: ["decompose", "contract", "implement", "integrate"],
      contract: true,
      test_suite: true,
    };
    expect(validate(doc)).toEqual([]);
  });

  it("flags a review-heavy pipeline", () => {
    const doc = {
      roles: ["reviewer", "implementer"],
      pipeline: ["s1", "s2", "s3", "s4", "s5"],
    };
    const findings = validate(doc);

    expect(findings.map((f) => f.pattern)).toEqual([
      "review_chain",
      "excessive_pipeline",
      "missing_contracts",
      "missing_test_gates",
    ]);
    expect(findings[0].evidence).toBe("Keywords found: reviewer");
    expect(findings[1].evidence).toBe("Found 5 stages (max recommended: 4)");
    expect(findings.every((f) => f.severity === "HIGH")).toBe(true);
  });

  it("does not flag exactly 4 stages", () => {
    const findings = validate(withHealthy({ stages: names(4, "s") }));
    expect(findings.find((f) => f.pattern === "excessive_pipeline")).toBeUndefined();
  });

  it("flags 5 stages", () => {
    const findings = validate(withHealthy({ stages: names(5, "s") }));
    expect(findings).toEqual([
      {
        pattern: "excessive_pipeline",
        severity: "HIGH",
        description: "Pipelines with >4 stages spend more on coordination than production",
        fix: "Reduce to: decompose -> contract+test -> implement -> integrate",
        evidence: "Found 5 stages (max recommended: 4)",
      },
    ]);
  });

  it("does not flag exactly 7 agents", () => {
    expect(validate(withHealthy({ agents: names(7, "a") }))).toEqual([]);
  });

  it("flags 8 agents with a MEDIUM finding", () => {
    const findings = validate(withHealthy({ agents: names(8, "a") }));
    expect(findings).toHaveLength(1);
    expect(findings[0]).toEqual({
      pattern: "excessive_agents",
      severity: "MEDIUM",
      description: "Architecture has 8 agents. More agents = more coordination overhead.",
      fix: "Reduce to minimum viable agent count. Start with 1, justify each addition.",
      evidence: "Agent count: 8",
    });
  });

  it("counts agents given as a mapping", () => {
    const agents = Object.fromEntries(names(9, "a").map((n) => [n, "x"]));
    const findings = validate(withHealthy({ agents }));
    expect(findings[0].evidence).toBe("Agent count: 9");
  });

  it("matches keywords in keys as well as values", () => {
    const findings = validate(withHealthy({ Supervisor: { escalate: "always" } }));
    expect(findings).toHaveLength(1);
    expect(findings[0].pattern).toBe("escalation_hierarchy");
    expect(findings[0].evidence).toBe("Keywords found: escalate, supervisor");
  });

  it("matches keywords embedded in longer words", () => {
    const findings = validate(withHealthy({ docs: "see reviewers_guide" }));
    expect(findings.map((f) => f.pattern)).toEqual(["review_chain"]);
    expect(findings[0].evidence).toBe("Keywords found: reviewer");
  });

  it("reports the missing presence checks", () => {
    const findings = validate({ agents: ["a1"] });
    expect(findings.map((f) => [f.pattern, f.severity])).toEqual([
      ["missing_contracts", "HIGH"],
      ["missing_test_gates", "HIGH"],
    ]);
  });

  it("orders findings by registry, then agents, then presence checks", () => {
    const doc = {
      agents: Object.fromEntries(names(8, "a").map((n) => [n, "x"])),
      stages: names(5, "s"),
      notes: "vote",
    };
    expect(validate(doc).map((f) => f.pattern)).toEqual([
      "consensus_protocol",
      "excessive_pipeline",
      "excessive_agents",
      "missing_contracts",
      "missing_test_gates",
    ]);
  });

  it("reports each matching pattern separately", () => {
    const findings = validate(withHealthy({ loop: "debate then review_output" }));
    expect(findings.map((f) => f.pattern)).toEqual(["consensus_protocol", "agent_evaluates_agent"]);
  });

  it("is idempotent", () => {
    const doc = { roles: ["judge_agent", "arbiter"], phases: { a: 1, b: 2, c: 3, d: 4, e: 5 } };
    expect(validate(doc)).toEqual(validate(doc));
  });

  it("treats a non-mapping document as having no fields", () => {
    expect(validate(["contract", "test_suite"])).toEqual([]);
  });

  it("ignores keywords nested deeper than the flatten cap", () => {
    let deep: ArchitectureValue = "reviewer";
    for (let i = 0; i < 12; i++) deep = [deep];
    expect(validate(withHealthy({ deep }))).toEqual([]);
  });

  describe("options", () => {
    it("applies a custom stage limit", () => {
      expect(validate(withHealthy({ stages: names(5, "s") }), { maxStages: 5 })).toEqual([]);
      const findings = validate(withHealthy({ stages: names(3, "s") }), { maxStages: 2 });
      expect(findings[0].evidence).toBe("Found 3 stages (max recommended: 2)");
    });

    it("describes the pipeline finding with the configured limit", () => {
      const findings = validate(withHealthy({ stages: names(3, "s") }), { maxStages: 2 });
      expect(findings[0].description).toBe(
        "Pipelines with >2 stages spend more on coordination than production",
      );
    });

    it("applies a custom agent limit", () => {
      const findings = validate(withHealthy({ agents: names(3, "a") }), { maxAgents: 2 });
      expect(findings[0].evidence).toBe("Agent count: 3");
    });

    it("suppresses disabled patterns", () => {
      const doc = { roles: ["reviewer"], pipeline: names(5, "s") };
      const findings = validate(doc, {
        disable: ["review_chain", "missing_contracts", "missing_test_gates"],
      });
      expect(findings.map((f) => f.pattern)).toEqual(["excessive_pipeline"]);
    });
  });
});
