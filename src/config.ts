// src/config.ts — Config Resolver
// Merge order: defaults ← config file ← CLI args

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import { DEFAULT_MAX_AGENTS, DEFAULT_MAX_STAGES } from "./types.js";
import type { FileConfig, ResolvedConfig, Warning } from "./types.js";
import { ALL_FINDING_NAMES } from "./patterns.js";

export const CONFIG_FILENAME = "agent-org-lint.config.json";
export const PACKAGE_JSON_KEY = "agentOrgLint";

export interface ParsedArgs {
  files: string[];
  config?: string;
  maxStages?: string;
  maxAgents?: string;
  disable?: string;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

const DEFAULTS: Omit<ResolvedConfig, "file"> = {
  maxStages: DEFAULT_MAX_STAGES,
  maxAgents: DEFAULT_MAX_AGENTS,
  disable: [],
  quiet: false,
  verbose: false,
};

/**
 * Resolve config from CLI args, config file, and defaults.
 * Problems are reported through `warnings`; resolution never throws.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, warnings, cwd) ?? {};

  const config: ResolvedConfig = {
    file: args.files[0] ? resolve(cwd, args.files[0]) : undefined,
    maxStages:
      parseThreshold(args.maxStages, "--max-stages", warnings) ??
      fileConfig.maxStages ??
      DEFAULTS.maxStages,
    maxAgents:
      parseThreshold(args.maxAgents, "--max-agents", warnings) ??
      fileConfig.maxAgents ??
      DEFAULTS.maxAgents,
    disable:
      args.disable !== undefined
        ? splitList(args.disable)
        : fileConfig.disable ?? DEFAULTS.disable,
    quiet: args.quiet,
    verbose: args.verbose,
  };

  const unknown = config.disable.filter((name) => !ALL_FINDING_NAMES.includes(name));
  if (unknown.length > 0) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Unknown pattern name(s) in disable list: ${unknown.join(", ")}`,
    });
  }

  return config;
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
  cwd: string,
): FileConfig | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  // agentOrgLint key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (isRecord(pkg) && PACKAGE_JSON_KEY in pkg) {
        return toFileConfig(pkg[PACKAGE_JSON_KEY], pkgJson, warnings);
      }
    } catch {
      // A broken package.json belongs to someone else's tooling
      return null;
    }
  }

  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): FileConfig | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    return toFileConfig(parsed, filePath, warnings);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

/**
 * Keep only well-typed fields. Anything else is dropped with a warning.
 */
export function toFileConfig(
  raw: unknown,
  source: string,
  warnings: Warning[],
): FileConfig | null {
  if (!isRecord(raw)) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Config in ${source} must be an object; ignoring it`,
    });
    return null;
  }

  const config: FileConfig = {};

  for (const key of ["maxStages", "maxAgents"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (isPositiveInteger(value)) {
      config[key] = value;
    } else {
      warnings.push({
        level: "warn",
        module: "config",
        message: `${key} in ${source} must be a positive integer; using default`,
      });
    }
  }

  if (raw.disable !== undefined) {
    const list = raw.disable;
    if (Array.isArray(list) && list.every((v): v is string => typeof v === "string")) {
      config.disable = list;
    } else {
      warnings.push({
        level: "warn",
        module: "config",
        message: `disable in ${source} must be an array of pattern names; ignoring it`,
      });
    }
  }

  return config;
}

function parseThreshold(
  raw: string | undefined,
  flag: string,
  warnings: Warning[],
): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (isPositiveInteger(n)) return n;
  warnings.push({
    level: "warn",
    module: "config",
    message: `${flag} expects a positive integer, got "${raw}"; ignoring it`,
  });
  return undefined;
}

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function lastString(value: unknown): string | undefined {
  if (Array.isArray(value)) return lastString(value[value.length - 1]);
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["quiet", "verbose", "help", "version"],
    string: ["config", "max-stages", "max-agents", "disable"],
  });

  const files = args._.map(String);
  // "run" is an optional verb: `agent-org-lint run arch.yaml`
  if (files[0] === "run") files.shift();

  return {
    files,
    config: lastString(args.config),
    maxStages: lastString(args["max-stages"]),
    maxAgents: lastString(args["max-agents"]),
    disable: lastString(args.disable),
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    help: args.help === true,
    version: args.version === true,
  };
}
