// Project selection.
// Purpose: derive the projects and runtimes to test and build for a set of touched projects.
// Assumes the model passed validation; unknown names simply match no table.

import {
  EMPTY_PROJECT_SET,
  isPlatform,
  type ProjectSet,
  type ProjectTableModel,
  type ScopeModel,
} from "../model/schema.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProjectSelection = {
  projectsToTest: ProjectSet;
  projectsToBuild: ProjectSet;
  runtimesToTest: ProjectSet;
  runtimesToTestNeedsReconfig: ProjectSet;
  runtimesToBuild: ProjectSet;
  cirEnabled: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Computes everything a change needs built and tested on `platform`.
 *
 * An unrecognized platform has no exclusions; callers that want it rejected
 * should check with `isPlatform` first.
 */
export function selectProjects(
  modifiedProjects: ProjectSet,
  platform: string,
  model: ScopeModel,
): ProjectSelection {
  const excluded = platformSet(model.exclusions, platform);

  const projectsToTest = without(
    collectProjectsToTest(modifiedProjects, platform, model),
    excluded,
  );
  const runtimesToTest = without(
    unionOf(model.runtimesToTest, modifiedProjects),
    excluded,
  );
  const runtimesToTestNeedsReconfig = without(
    unionOf(model.runtimesToTestNeedsReconfig, modifiedProjects),
    excluded,
  );

  const runtimesToBuild = without(
    [
      ...runtimesToTest,
      ...runtimesToTestNeedsReconfig,
      ...unionOf(model.runtimesToBuild, modifiedProjects),
    ],
    excluded,
  );

  // Runtime dependencies are added directly, without expanding them further.
  const buildClosure = closeOverDependencies(projectsToTest, model.dependencies);
  for (const runtime of runtimesToBuild) {
    for (const dependency of model.dependencies.get(runtime) ?? EMPTY_PROJECT_SET) {
      buildClosure.add(dependency);
    }
  }

  // The CIR sentinel is only an enable switch; it is read before the skip list drops it.
  const cirEnabled = model.cirProject !== null && buildClosure.has(model.cirProject);

  return {
    projectsToTest,
    projectsToBuild: without(buildClosure, model.skipBuildProjects),
    runtimesToTest,
    runtimesToTestNeedsReconfig,
    runtimesToBuild,
    cirEnabled,
  };
}

/**
 * Expands `roots` with every project reachable through `dependencies`.
 * Cycles are fine: each project enters the frontier at most once.
 */
export function closeOverDependencies(
  roots: Iterable<string>,
  dependencies: ProjectTableModel,
): Set<string> {
  const closed = new Set(roots);
  let frontier = [...closed];

  while (frontier.length > 0) {
    const next: string[] = [];
    for (const project of frontier) {
      for (const dependency of dependencies.get(project) ?? EMPTY_PROJECT_SET) {
        if (!closed.has(dependency)) {
          closed.add(dependency);
          next.push(dependency);
        }
      }
    }
    frontier = next;
  }

  return closed;
}

// =============================================================================
// HELPERS
// =============================================================================

function collectProjectsToTest(
  modifiedProjects: ProjectSet,
  platform: string,
  model: ScopeModel,
): Set<string> {
  const dependentExclusions = platformSet(model.dependentExclusions, platform);
  const selected = new Set<string>();

  for (const project of modifiedProjects) {
    if (model.runtimes.has(project)) {
      continue;
    }
    if (model.checkTargets.has(project)) {
      selected.add(project);
    }
    for (const dependent of model.dependentsToTest.get(project) ?? EMPTY_PROJECT_SET) {
      if (!dependentExclusions.has(dependent)) {
        selected.add(dependent);
      }
    }
  }

  return selected;
}

function unionOf(table: ProjectTableModel, keys: ProjectSet): Set<string> {
  const result = new Set<string>();
  for (const key of keys) {
    for (const value of table.get(key) ?? EMPTY_PROJECT_SET) {
      result.add(value);
    }
  }
  return result;
}

function without(values: Iterable<string>, removed: ProjectSet): Set<string> {
  const result = new Set<string>();
  for (const value of values) {
    if (!removed.has(value)) {
      result.add(value);
    }
  }
  return result;
}

function platformSet(
  table: ScopeModel["exclusions"],
  platform: string,
): ProjectSet {
  return isPlatform(platform) ? (table.get(platform) ?? EMPTY_PROJECT_SET) : EMPTY_PROJECT_SET;
}
