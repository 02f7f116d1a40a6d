// src/index.ts — Library API
// Entry point lintFile() plus the building blocks it is made of.

import type { Finding, LoadedDocumentInfo, Report, ValidateOptions, YamlParser } from "./types.js";
import { detectYamlParser, loadDocument } from "./document-loader.js";
import { validate } from "./validator.js";
import { buildReport } from "./reporter.js";

export type {
  ArchitectureDocument,
  ArchitectureValue,
  DocumentFormat,
  DysfunctionPattern,
  FileConfig,
  Finding,
  LoadedDocumentInfo,
  Report,
  ResolvedConfig,
  Severity,
  ValidateOptions,
  Verdict,
  Warning,
  YamlParser,
} from "./types.js";

export {
  UsageError,
  FileNotFoundError,
  FormatError,
  UnsupportedFormatError,
  ParseError,
  LINT_VERSION,
} from "./types.js";

export { detectYamlParser, loadDocument, parseDocument, formatFromExtension } from "./document-loader.js";
export type { LoadOptions, LoadedDocument } from "./document-loader.js";
export { flattenToText } from "./flatten.js";
export { DYSFUNCTION_PATTERNS, matchKeywords } from "./patterns.js";
export { countStages, countAgents, hasContractTerms, hasTestGateTerms } from "./heuristics.js";
export { validate } from "./validator.js";
export { buildReport, formatReport, countHighSeverity } from "./reporter.js";

export interface LintOptions extends ValidateOptions {
  /**
   * YAML parser to use. Defaults to the `yaml` package when installed;
   * pass null to lint without YAML support.
   */
  yaml?: YamlParser | null;
}

export interface LintResult {
  findings: Finding[];
  report: Report;
  document: LoadedDocumentInfo;
}

/**
 * Load, validate, and report on one architecture file.
 * Throws FileNotFoundError or a FormatError when the file cannot be read.
 */
export async function lintFile(filePath: string, options: LintOptions = {}): Promise<LintResult> {
  const yaml = options.yaml === undefined ? await detectYamlParser() : options.yaml;
  const { document, format } = loadDocument(filePath, { yaml });
  const findings = validate(document, options);
  return {
    findings,
    report: buildReport(findings),
    document: { path: filePath, format },
  };
}
