import type { ReconcileMode } from "./commands/reconcile.js";

export const DEFAULT_CONFIG_DIR = "config";

export type CliCommand =
  | { kind: "reconcile"; mode: ReconcileMode; configDir: string; metrics: boolean }
  | { kind: "help" };

/**
 * Accepts `check` / `apply` as a subcommand or as `--check` / `--apply`
 * flags, plus `--config-dir <dir>` (or `--config-dir=<dir>`) and `--metrics`.
 */
export function parseCommand(argv: string[]): CliCommand {
  let mode: ReconcileMode | undefined;
  let configDir = DEFAULT_CONFIG_DIR;
  let metrics = false;

  const setMode = (next: ReconcileMode) => {
    if (mode && mode !== next) {
      throw new Error("Specify either check or apply, not both");
    }
    mode = next;
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "check" || arg === "--check") {
      setMode("check");
    } else if (arg === "apply" || arg === "--apply") {
      setMode("apply");
    } else if (arg === "--config-dir") {
      const value = argv[index + 1];
      if (!value || value.startsWith("--")) {
        throw new Error("--config-dir requires a directory");
      }
      configDir = value;
      index += 1;
    } else if (arg?.startsWith("--config-dir=")) {
      const value = arg.slice("--config-dir=".length);
      if (!value) {
        throw new Error("--config-dir requires a directory");
      }
      configDir = value;
    } else if (arg === "--metrics") {
      metrics = true;
    } else if (arg === "help" || arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (!mode) {
    return { kind: "help" };
  }
  return { kind: "reconcile", mode, configDir, metrics };
}
