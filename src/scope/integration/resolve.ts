// Scope resolution entry point.
// Purpose: turn a list of changed files into touched projects, a selection and the CI environment.
// Assumes changed files are repo-relative paths (git diff --name-only output).

import { logScopeEvent, type JsonlLogger } from "../../core/logger.js";
import type { ScopeModel } from "../model/schema.js";
import { resolveTouchedProjects } from "../policy/path-matcher.js";
import { selectProjects, type ProjectSelection } from "../policy/selection.js";

import { renderEnvironment, type ScopeEnvironment } from "./environment.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScopeInput = {
  changedFiles: string[];
  platform: string;
  model: ScopeModel;
  logger?: JsonlLogger;
};

export type ScopeResult = {
  changedFiles: string[];
  touchedProjects: string[];
  selection: ProjectSelection;
  environment: ScopeEnvironment;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function computeScope(input: ScopeInput): ScopeResult {
  const changedFiles = normalizeChangedFiles(input.changedFiles);
  logScopeEvent(input.logger, "scope.start", {
    platform: input.platform,
    file_count: changedFiles.length,
  });

  const touched = resolveTouchedProjects(changedFiles, input.model);
  const touchedProjects = Array.from(touched).sort();
  logScopeEvent(input.logger, "scope.touched", { projects: touchedProjects });

  const selection = selectProjects(touched, input.platform, input.model);
  const environment = renderEnvironment(selection, input.model);
  logScopeEvent(input.logger, "scope.complete", { ...environment });

  return { changedFiles, touchedProjects, selection, environment };
}

export function normalizeChangedFiles(changedFiles: string[]): string[] {
  const normalized = new Set<string>();

  for (const changedFile of changedFiles) {
    const normalizedPath = normalizeRepoPath(changedFile.trim());
    if (normalizedPath.length > 0) {
      normalized.add(normalizedPath);
    }
  }

  return Array.from(normalized).sort();
}

// =============================================================================
// HELPERS
// =============================================================================

// Drops empty and "." segments, so leading "./", leading or trailing "/" and "a/./b" all collapse.
function normalizeRepoPath(inputPath: string): string {
  return inputPath
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment.length > 0 && segment !== ".")
    .join("/");
}
