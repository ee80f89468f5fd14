// CI environment rendering.
// Purpose: flatten a project selection into the variables the monolithic build scripts read.
// Assumes output must be byte-stable for a given selection.

import type { ProjectSet, ScopeModel } from "../model/schema.js";
import type { ProjectSelection } from "../policy/selection.js";

// =============================================================================
// TYPES
// =============================================================================

export const SCOPE_ENVIRONMENT_KEYS = [
  "projects_to_build",
  "project_check_targets",
  "runtimes_to_build",
  "runtimes_check_targets",
  "runtimes_check_targets_needs_reconfig",
  "enable_cir",
] as const;

export type ScopeEnvironmentKey = (typeof SCOPE_ENVIRONMENT_KEYS)[number];

export type ScopeEnvironment = Record<ScopeEnvironmentKey, string>;

const LIST_SEPARATOR = ";";
const TARGET_SEPARATOR = " ";

// =============================================================================
// PUBLIC API
// =============================================================================

export function renderEnvironment(
  selection: ProjectSelection,
  model: Pick<ScopeModel, "checkTargets">,
): ScopeEnvironment {
  return {
    projects_to_build: joinSorted(selection.projectsToBuild),
    project_check_targets: joinCheckTargets(selection.projectsToTest, model),
    runtimes_to_build: joinSorted(selection.runtimesToBuild),
    runtimes_check_targets: joinCheckTargets(selection.runtimesToTest, model),
    runtimes_check_targets_needs_reconfig: joinCheckTargets(
      selection.runtimesToTestNeedsReconfig,
      model,
    ),
    enable_cir: selection.cirEnabled ? "ON" : "OFF",
  };
}

export function formatShellAssignments(env: ScopeEnvironment): string[] {
  return SCOPE_ENVIRONMENT_KEYS.map((key) => `${key}='${env[key]}'`);
}

// =============================================================================
// HELPERS
// =============================================================================

function sortedNames(values: ProjectSet): string[] {
  return [...values].sort(compareNames);
}

function joinSorted(values: ProjectSet): string {
  return sortedNames(values).join(LIST_SEPARATOR);
}

// Targets follow the order of their project names, not of the target names.
function joinCheckTargets(
  projects: ProjectSet,
  model: Pick<ScopeModel, "checkTargets">,
): string {
  const targets: string[] = [];
  for (const project of sortedNames(projects)) {
    const target = model.checkTargets.get(project);
    if (target !== undefined) {
      targets.push(target);
    }
  }
  return targets.join(TARGET_SEPARATOR);
}

// Code-unit order, independent of the host locale.
function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
