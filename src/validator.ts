// src/validator.ts — Validation Pass
// Runs every dysfunction check over one document and collects findings.

import { DEFAULT_MAX_AGENTS, DEFAULT_MAX_STAGES } from "./types.js";
import type { ArchitectureDocument, Finding, ValidateOptions } from "./types.js";
import { flattenToText } from "./flatten.js";
import {
  DYSFUNCTION_PATTERNS,
  EXCESSIVE_AGENTS,
  EXCESSIVE_PIPELINE,
  MISSING_CONTRACTS,
  MISSING_TEST_GATES,
  matchKeywords,
} from "./patterns.js";
import {
  countAgents,
  countStages,
  hasContractTerms,
  hasTestGateTerms,
} from "./heuristics.js";

/**
 * Validate an architecture document. Findings follow registry order,
 * then agent count, contracts, and test gates.
 */
export function validate(
  doc: ArchitectureDocument,
  options: ValidateOptions = {},
): Finding[] {
  const maxStages = options.maxStages ?? DEFAULT_MAX_STAGES;
  const maxAgents = options.maxAgents ?? DEFAULT_MAX_AGENTS;
  const disabled = new Set(options.disable ?? []);

  const findings: Finding[] = [];
  const fullText = flattenToText(doc);

  for (const pattern of DYSFUNCTION_PATTERNS) {
    if (disabled.has(pattern.name)) continue;

    if (pattern.name === EXCESSIVE_PIPELINE) {
      const stageCount = countStages(doc);
      if (stageCount > maxStages) {
        findings.push({
          pattern: pattern.name,
          severity: pattern.severity,
          description: `Pipelines with >${maxStages} stages spend more on coordination than production`,
          fix: pattern.fix,
          evidence: `Found ${stageCount} stages (max recommended: ${maxStages})`,
        });
      }
      continue;
    }

    const matched = matchKeywords(fullText, pattern.keywords);
    if (matched.length > 0) {
      findings.push({
        pattern: pattern.name,
        severity: pattern.severity,
        description: pattern.description,
        fix: pattern.fix,
        evidence: `Keywords found: ${matched.join(", ")}`,
      });
    }
  }

  const agentCount = countAgents(doc);
  if (agentCount > maxAgents && !disabled.has(EXCESSIVE_AGENTS)) {
    findings.push({
      pattern: EXCESSIVE_AGENTS,
      severity: "MEDIUM",
      description: `Architecture has ${agentCount} agents. More agents = more coordination overhead.`,
      fix: "Reduce to minimum viable agent count. Start with 1, justify each addition.",
      evidence: `Agent count: ${agentCount}`,
    });
  }

  // Positive signals: their absence is the finding
  if (!hasContractTerms(fullText) && !disabled.has(MISSING_CONTRACTS)) {
    findings.push({
      pattern: MISSING_CONTRACTS,
      severity: "HIGH",
      description: "No contract definitions found. Agents will produce incompatible interfaces.",
      fix: "Define typed interface contracts BEFORE implementation begins.",
      evidence: "No contract-related keywords in architecture description",
    });
  }

  if (!hasTestGateTerms(fullText) && !disabled.has(MISSING_TEST_GATES)) {
    findings.push({
      pattern: MISSING_TEST_GATES,
      severity: "HIGH",
      description: "No mechanical test gates found. Acceptance will rely on subjective evaluation.",
      fix: "Generate executable tests from contracts. Tests are the only acceptance criterion.",
      evidence: "No test-gate-related keywords in architecture description",
    });
  }

  return findings;
}
