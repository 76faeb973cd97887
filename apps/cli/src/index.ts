#!/usr/bin/env node
import { parseCommand } from "./args.js";
import { runReconcile } from "./commands/reconcile.js";
import { logger } from "./logger.js";
import { printErrorLine, printLine } from "./output.js";

function usage() {
  printLine(
    `acl-sync CLI
Usage:
  acl-sync check [--config-dir <dir>]   Show the changes needed to reach the desired state
  acl-sync apply [--config-dir <dir>]   Apply those changes to the directory

Options:
  --metrics                             Print action counters in Prometheus text format after an apply

Environment:
  DIRECTORY_URL, DIRECTORY_TOKEN        Directory API endpoint and bearer token
  ACL_SYNC_STRICT_PRINCIPALS            Reject folder principals that do not exist
`
  );
}

async function main() {
  const command = parseCommand(process.argv.slice(2));
  if (command.kind === "help") {
    usage();
    return;
  }
  process.exitCode = await runReconcile({
    mode: command.mode,
    configDir: command.configDir,
    metrics: command.metrics,
  });
}

main().catch(error => {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error(err);
  printErrorLine("Error:", err.message);
  process.exit(1);
});
