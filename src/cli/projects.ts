import { Command } from "commander";

import { normalizeChangedFiles } from "../scope/integration/resolve.js";
import { resolveTouchedProjects } from "../scope/policy/path-matcher.js";

import {
  createProcessIo,
  loadModelForCli,
  registerConfigOption,
  splitLines,
  type CliIo,
  type ModelOptions,
} from "./context.js";

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerProjectsCommand(program: Command, io: CliIo = createProcessIo()): void {
  registerConfigOption(
    program
      .command("projects")
      .description("List the projects changed files belong to")
      .argument("[files...]", "Changed files (default: read from stdin)"),
  ).action(async (files: string[], opts: ModelOptions) => {
    await projectsCommand(files, opts, io);
  });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function projectsCommand(
  files: string[],
  opts: ModelOptions,
  io: CliIo,
): Promise<string[]> {
  const { model } = loadModelForCli(opts, io);
  const input = files.length > 0 ? files : splitLines(await io.readInput());

  const projects = Array.from(resolveTouchedProjects(normalizeChangedFiles(input), model)).sort();
  projects.forEach((project) => io.stdout(project));
  return projects;
}
