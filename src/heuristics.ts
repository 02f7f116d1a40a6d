// src/heuristics.ts — Structural and presence checks

import { AGENT_FIELDS, STAGE_FIELDS } from "./types.js";
import type { ArchitectureDocument, ArchitectureValue } from "./types.js";
import { CONTRACT_TERMS, TEST_GATE_TERMS } from "./patterns.js";

type Mapping = { [key: string]: ArchitectureValue };

function asMapping(doc: ArchitectureDocument): Mapping {
  if (doc !== null && typeof doc === "object" && !Array.isArray(doc)) return doc;
  return {};
}

/**
 * Size of the first field in `fields` that the document defines.
 * A present field wins even when its value is not countable (it counts 0).
 */
export function countFirstPresent(
  doc: ArchitectureDocument,
  fields: readonly string[],
): number {
  const map = asMapping(doc);
  const field = fields.find((f) => Object.hasOwn(map, f));
  if (field === undefined) return 0;

  const value = map[field];
  if (Array.isArray(value)) return value.length;
  if (value !== null && typeof value === "object") return Object.keys(value).length;
  return 0;
}

/** Stages from `stages`, `pipeline` or `phases`, in that priority. */
export function countStages(doc: ArchitectureDocument): number {
  return countFirstPresent(doc, STAGE_FIELDS);
}

/** Agents from `agents`, `roles` or `workers`, in that priority. */
export function countAgents(doc: ArchitectureDocument): number {
  return countFirstPresent(doc, AGENT_FIELDS);
}

export function hasContractTerms(text: string): boolean {
  return containsAny(text, CONTRACT_TERMS);
}

export function hasTestGateTerms(text: string): boolean {
  return containsAny(text, TEST_GATE_TERMS);
}

function containsAny(text: string, terms: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return terms.some((t) => lower.includes(t));
}
