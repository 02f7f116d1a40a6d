// src/patterns.ts — Pattern Registry
// Known coordination anti-patterns in multi-agent architectures.

import type { DysfunctionPattern } from "./types.js";

/** Registry entry evaluated by stage count rather than keywords. */
export const EXCESSIVE_PIPELINE = "excessive_pipeline";

// Order matters: findings are reported in registry order.
export const DYSFUNCTION_PATTERNS: readonly DysfunctionPattern[] = [
  {
    name: "review_chain",
    keywords: [
      "reviewer", "review_agent", "code_review", "approval_gate",
      "quality_check", "evaluator", "assessor", "judge_agent",
    ],
    severity: "HIGH",
    description: "Subjective review agents create Crawford-Sobel degradation",
    fix: "Replace with mechanical test verification against contracts",
  },
  {
    name: "escalation_hierarchy",
    keywords: [
      "escalate", "arbiter", "escalation", "override",
      "force_approve", "supervisor", "manager_agent",
    ],
    severity: "HIGH",
    description: "Escalation hierarchies recreate middle management",
    fix: "Remove escalation layers; use contract tests as the sole arbiter",
  },
  {
    name: "confidence_scoring",
    keywords: [
      "confidence_score", "confidence_threshold", "quality_score",
      "rating", "score_gate", "confidence_gate",
    ],
    severity: "MEDIUM",
    description: "Confidence scores are Goodhart-vulnerable proxies",
    fix: "Replace with binary pass/fail mechanical gates (tests pass or not)",
  },
  {
    name: "consensus_protocol",
    keywords: [
      "vote", "consensus", "debate", "deliberation",
      "majority", "agreement", "negotiate",
    ],
    severity: "MEDIUM",
    description: "Agent consensus shifts correct answers to incorrect more often than reverse",
    fix: "Define truth via contracts; verify via tests; no voting",
  },
  {
    name: EXCESSIVE_PIPELINE,
    keywords: [],
    severity: "HIGH",
    description: "Pipelines with >4 stages spend more on coordination than production",
    fix: "Reduce to: decompose -> contract+test -> implement -> integrate",
  },
  {
    name: "agent_evaluates_agent",
    keywords: [
      "review_output", "check_work", "validate_code",
      "assess_quality", "grade_output", "feedback_loop",
    ],
    severity: "HIGH",
    description: "Agents evaluating other agents' output is the core dysfunction",
    fix: "Only tests evaluate output; agents only produce output",
  },
];

// Findings produced outside the registry walk
export const EXCESSIVE_AGENTS = "excessive_agents";
export const MISSING_CONTRACTS = "missing_contracts";
export const MISSING_TEST_GATES = "missing_test_gates";

export const CONTRACT_TERMS = [
  "contract", "interface_spec", "typed_interface", "componentcontract",
] as const;

export const TEST_GATE_TERMS = [
  "test_suite", "contract_test", "mechanical_gate", "pass_fail",
] as const;

/** Every name a finding can carry, in report order. */
export const ALL_FINDING_NAMES: readonly string[] = [
  ...DYSFUNCTION_PATTERNS.map((p) => p.name),
  EXCESSIVE_AGENTS,
  MISSING_CONTRACTS,
  MISSING_TEST_GATES,
];

/**
 * Keywords from `keywords` that occur anywhere in `text`, case-insensitive.
 * Substring match: "reviewers_guide" still matches "reviewer".
 */
export function matchKeywords(text: string, keywords: readonly string[]): string[] {
  const lower = text.toLowerCase();
  return keywords.filter((kw) => lower.includes(kw.toLowerCase()));
}
