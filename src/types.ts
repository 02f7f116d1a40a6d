// src/types.ts — Core type definitions for agent-org-lint

// ─── Document ────────────────────────────────────────────────────────────────

export type ArchitectureValue =
  | string
  | number
  | boolean
  | null
  | ArchitectureValue[]
  | { [key: string]: ArchitectureValue };

/** Parsed input. No schema is enforced; any JSON/YAML value is accepted. */
export type ArchitectureDocument = ArchitectureValue;

export type DocumentFormat = "json" | "yaml";

export interface LoadedDocumentInfo {
  path: string;
  format: DocumentFormat;
}

/** Parses YAML text into a document. Throws on malformed input. */
export type YamlParser = (content: string) => ArchitectureDocument | undefined;

// ─── Patterns & Findings ─────────────────────────────────────────────────────

export type Severity = "HIGH" | "MEDIUM";

export interface DysfunctionPattern {
  readonly name: string;
  /** Empty means the pattern is evaluated structurally, not by keyword. */
  readonly keywords: readonly string[];
  readonly severity: Severity;
  readonly description: string;
  readonly fix: string;
}

export interface Finding {
  pattern: string;
  severity: Severity;
  description: string;
  fix: string;
  evidence: string;
}

export interface ValidateOptions {
  maxStages?: number;
  maxAgents?: number;
  /** Pattern names whose findings are suppressed. */
  disable?: readonly string[];
}

// ─── Report ──────────────────────────────────────────────────────────────────

export type Verdict = "pass" | "warn" | "fail";

export interface Report {
  lines: string[];
  findingCount: number;
  highCount: number;
  verdict: Verdict;
  exitCode: 0 | 1;
}

// ─── Config ──────────────────────────────────────────────────────────────────

export interface ResolvedConfig {
  file?: string;
  maxStages: number;
  maxAgents: number;
  disable: string[];
  quiet: boolean;
  verbose: boolean;
}

/** Shape accepted from agent-org-lint.config.json or package.json#agentOrgLint. */
export interface FileConfig {
  maxStages?: number;
  maxAgents?: number;
  disable?: string[];
}

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class UsageError extends Error {
  constructor(message = "Missing architecture file argument") {
    super(message);
    this.name = "UsageError";
  }
}

export class FileNotFoundError extends Error {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(`File not found: ${filePath}`);
    this.name = "FileNotFoundError";
    if (cause) this.cause = cause;
  }
}

/** Base class for failures to turn file content into a document. */
export class FormatError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = "FormatError";
  }
}

export class UnsupportedFormatError extends FormatError {
  constructor(filePath: string) {
    super(
      `YAML support is required for ${filePath}. Install: npm install yaml`,
      filePath,
    );
    this.name = "UnsupportedFormatError";
  }
}

export class ParseError extends FormatError {
  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, filePath);
    this.name = "ParseError";
    if (cause !== undefined) this.cause = cause;
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const LINT_VERSION = "0.1.0";

export const MAX_FLATTEN_DEPTH = 10;
export const DEFAULT_MAX_STAGES = 4;
export const DEFAULT_MAX_AGENTS = 7;

export const STAGE_FIELDS = ["stages", "pipeline", "phases"] as const;
export const AGENT_FIELDS = ["agents", "roles", "workers"] as const;
