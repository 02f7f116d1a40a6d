// src/bin/run.ts — Lint one architecture file and decide the exit code

import { CONFIG_FILENAME, parseCliArgs, resolveConfig } from "../config.js";
import { detectYamlParser, loadDocument } from "../document-loader.js";
import { countAgents, countStages } from "../heuristics.js";
import { validate } from "../validator.js";
import { buildReport, formatReport } from "../reporter.js";
import {
  FileNotFoundError,
  FormatError,
  LINT_VERSION,
  UsageError,
} from "../types.js";
import type { Warning, YamlParser } from "../types.js";

export const HELP_TEXT = `
agent-org-lint v${LINT_VERSION}

Usage:
  agent-org-lint [run] <architecture_file.yaml|json> [options]

Validates a multi-agent architecture for dysfunction patterns.

Options:
  --config, -c         Path to config file (default: ${CONFIG_FILENAME})
  --max-stages <n>     Stage count above which a pipeline is excessive (default: 4)
  --max-agents <n>     Agent count above which a team is excessive (default: 7)
  --disable <a,b>      Comma-separated pattern names to skip
  --quiet, -q          Suppress warnings
  --verbose, -v        Print detected format and counts
  --version            Print version
  --help, -h           Show this help text

Exit codes:
  0  No findings, or only MEDIUM findings
  1  At least one HIGH finding, or the file could not be read
`.trim();

export interface RunIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd?: string;
  /** Override YAML detection; null simulates a missing `yaml` package. */
  yaml?: YamlParser | null;
}

const processIO: RunIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Run the linter for CLI arguments. Returns the process exit code.
 */
export async function runLint(argv: string[], io: RunIO = processIO): Promise<number> {
  const args = await parseCliArgs(argv);
  const cwd = io.cwd ?? process.cwd();

  if (args.help) {
    io.stdout(HELP_TEXT + "\n");
    return 0;
  }
  if (args.version) {
    io.stdout(`${LINT_VERSION}\n`);
    return 0;
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings, cwd);

  const printWarnings = (): void => {
    if (config.quiet) return;
    for (const w of warnings) io.stderr(`[${w.level}] ${w.module}: ${w.message}\n`);
    warnings.length = 0;
  };

  try {
    if (!config.file) throw new UsageError();
    printWarnings();

    const yaml = io.yaml === undefined ? await detectYamlParser() : io.yaml;
    const { document, format } = loadDocument(config.file, { yaml });

    const findings = validate(document, config);

    if (config.verbose) {
      io.stderr(`[INFO] ${config.file} parsed as ${format}\n`);
      io.stderr(`[INFO]   Stages: ${countStages(document)}, agents: ${countAgents(document)}\n`);
    }

    const report = buildReport(findings);
    io.stdout(formatReport(report));
    return report.exitCode;
  } catch (err: unknown) {
    printWarnings();
    if (err instanceof UsageError) {
      io.stdout(HELP_TEXT + "\n");
      return 1;
    }
    if (err instanceof FileNotFoundError || err instanceof FormatError) {
      io.stderr(`[error] ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}
