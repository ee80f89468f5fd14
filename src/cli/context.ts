import { Command } from "commander";

import { JsonlLogger } from "../core/logger.js";
import { loadScopeModel, resolveScopeConfigPath, type ScopeConfigSource } from "../scope/model/load.js";
import type { ScopeModel } from "../scope/model/schema.js";

// =============================================================================
// IO
// =============================================================================

export type CliIo = {
  readInput: () => Promise<string>;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
};

export function createProcessIo(): CliIo {
  return {
    readInput: () => readStream(process.stdin),
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
    env: process.env,
  };
}

export async function readStream(stream: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
  }
  return chunks.join("");
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

// =============================================================================
// SHARED OPTIONS
// =============================================================================

export type ModelOptions = {
  config?: string;
  logFile?: string;
};

export type LoadedModel = {
  model: ScopeModel;
  configPath: string;
  source: ScopeConfigSource;
};

export function registerConfigOption(command: Command): Command {
  return command.option("--config <path>", "Selection tables (YAML); defaults to the bundled tables");
}

export function registerModelOptions(command: Command): Command {
  return registerConfigOption(command).option("--log-file <path>", "Append JSONL events to this file");
}

export function loadModelForCli(opts: ModelOptions, io: CliIo): LoadedModel {
  const resolved = resolveScopeConfigPath({ explicitPath: opts.config, env: io.env });
  return {
    model: loadScopeModel(resolved.configPath),
    configPath: resolved.configPath,
    source: resolved.source,
  };
}

export function createCliLogger(opts: ModelOptions, context: { command: string }): JsonlLogger | undefined {
  const filePath = opts.logFile?.trim();
  return filePath ? new JsonlLogger(filePath, { command: context.command }) : undefined;
}
