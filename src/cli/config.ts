import { Command } from "commander";

import { PLATFORMS } from "../scope/model/schema.js";

import {
  createProcessIo,
  loadModelForCli,
  registerConfigOption,
  type CliIo,
  type ModelOptions,
} from "./context.js";

export type ConfigSummary = {
  configPath: string;
  source: string;
  projects: number;
  runtimes: number;
  checkTargets: number;
  metaProjects: number;
  exclusions: Record<string, number>;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerConfigCommand(program: Command, io: CliIo = createProcessIo()): void {
  const config = program.command("config").description("Inspect the selection tables");

  registerConfigOption(
    config.command("check").description("Validate the selection tables and print a summary"),
  ).action((opts: ModelOptions) => {
    configCheckCommand(opts, io);
  });
}

// =============================================================================
// COMMANDS
// =============================================================================

export function configCheckCommand(opts: ModelOptions, io: CliIo): ConfigSummary {
  const { model, configPath, source } = loadModelForCli(opts, io);

  const summary: ConfigSummary = {
    configPath,
    source,
    projects: model.projects.size,
    runtimes: model.runtimes.size,
    checkTargets: model.checkTargets.size,
    metaProjects: model.metaProjects.length,
    exclusions: Object.fromEntries(
      PLATFORMS.map((platform) => [platform, model.exclusions.get(platform)?.size ?? 0]),
    ),
  };

  io.stdout(`Selection config OK: ${configPath} (${source})`);
  io.stdout(
    `  ${summary.projects} projects, ${summary.runtimes} runtimes, ` +
      `${summary.checkTargets} check targets, ${summary.metaProjects} meta-project rules`,
  );
  for (const platform of PLATFORMS) {
    io.stdout(`  ${platform}: ${summary.exclusions[platform]} excluded`);
  }

  return summary;
}
