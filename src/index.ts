import { Command } from "commander";

import { registerComputeCommand } from "./cli/compute.js";
import { registerConfigCommand } from "./cli/config.js";
import { createProcessIo, type CliIo } from "./cli/context.js";
import { registerProjectsCommand } from "./cli/projects.js";
import { renderError, resolveColorEnabled } from "./core/error-format.js";

export { computeScope, normalizeChangedFiles } from "./scope/integration/resolve.js";
export { formatShellAssignments, renderEnvironment } from "./scope/integration/environment.js";
export { buildScopeModel, loadScopeModel } from "./scope/model/load.js";
export { resolveFileProjects, resolveTouchedProjects } from "./scope/policy/path-matcher.js";
export { closeOverDependencies, selectProjects } from "./scope/policy/selection.js";

export function buildProgram(io: CliIo = createProcessIo()): Command {
  const program = new Command();

  program
    .name("premerge-scope")
    .description("Select what a pre-merge CI run builds and tests for a change")
    .option("--debug", "Show error codes, causes and stack traces", false);

  registerComputeCommand(program, io);
  registerProjectsCommand(program, io);
  registerConfigCommand(program, io);

  return program;
}

export async function main(argv: string[], io: CliIo = createProcessIo()): Promise<void> {
  const program = buildProgram(io);

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const debug = Boolean(program.opts<{ debug?: boolean }>().debug);
    io.stderr(
      renderError(err, {
        mode: debug ? "debug" : "short",
        color: resolveColorEnabled({ stream: process.stderr }),
      }),
    );
    process.exitCode = 1;
  }
}
