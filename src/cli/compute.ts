import path from "node:path";

import { Command } from "commander";

import { logScopeEvent } from "../core/logger.js";
import { listChangedFiles } from "../git/git.js";
import { formatShellAssignments } from "../scope/integration/environment.js";
import { computeScope, type ScopeResult } from "../scope/integration/resolve.js";
import { resolvePlatform } from "../scope/platform.js";

import {
  createCliLogger,
  createProcessIo,
  loadModelForCli,
  registerModelOptions,
  splitLines,
  type CliIo,
  type ModelOptions,
} from "./context.js";

export type ComputeOptions = ModelOptions & {
  diff?: string;
  repo?: string;
  json?: boolean;
  strictPlatform?: boolean;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerComputeCommand(program: Command, io: CliIo = createProcessIo()): void {
  const command = program
    .command("compute")
    .description("Print the projects, runtimes and check targets to build for changed files")
    .argument("[platform]", "Linux, Windows or Darwin (default: host platform)")
    .option("--diff <range>", "Read changed files from git diff --name-only <range>")
    .option("--repo <path>", "Repository used with --diff (default: cwd)")
    .option("--json", "Print a JSON object instead of shell assignments", false)
    .option("--strict-platform", "Reject platforms without exclusion tables", false);

  registerModelOptions(command).action(async (platform: string | undefined, opts: ComputeOptions) => {
    await computeCommand(platform, opts, io);
  });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function computeCommand(
  platformArg: string | undefined,
  opts: ComputeOptions,
  io: CliIo,
): Promise<ScopeResult> {
  const { platform, recognized } = resolvePlatform(platformArg, {
    strict: opts.strictPlatform ?? false,
  });
  if (!recognized) {
    io.stderr(`Warning: unknown platform "${platform}"; no platform exclusions applied.`);
  }

  const { model, configPath } = loadModelForCli(opts, io);
  const logger = createCliLogger(opts, { command: "compute" });
  logScopeEvent(logger, "config.loaded", { path: configPath });

  const changedFiles = opts.diff
    ? await listChangedFiles(path.resolve(opts.repo ?? process.cwd()), opts.diff)
    : splitLines(await io.readInput());

  const result = computeScope({ changedFiles, platform, model, logger });

  if (opts.json) {
    io.stdout(JSON.stringify(result.environment, null, 2));
  } else {
    formatShellAssignments(result.environment).forEach((line) => io.stdout(line));
  }

  return result;
}
