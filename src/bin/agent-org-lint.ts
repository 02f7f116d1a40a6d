#!/usr/bin/env node
// CLI entry point for agent-org-lint

import { runLint } from "./run.js";

async function main() {
  const code = await runLint(process.argv.slice(2));
  process.exit(code);
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Fatal error: ${msg}\n`);
  process.exit(1);
});
