// Scope model schema definitions.
// Purpose: describe the YAML selection tables and the frozen in-memory model built from them.
// Assumes the loader has validated referential integrity before a model reaches the resolver.

import { z } from "zod";

// =============================================================================
// PLATFORMS
// =============================================================================

export const PLATFORMS = ["Linux", "Windows", "Darwin"] as const;

export type Platform = (typeof PLATFORMS)[number];

export const META_PATH_WILDCARD = "*";

// =============================================================================
// FILE SCHEMA
// =============================================================================

const ProjectName = z.string().trim().min(1);

const ProjectList = z.array(ProjectName);

const ProjectTable = z.record(ProjectName, ProjectList).default({});

const PlatformTable = z
  .object({
    Linux: ProjectList.default([]),
    Windows: ProjectList.default([]),
    Darwin: ProjectList.default([]),
  })
  .strict();

export const MetaProjectRuleSchema = z
  .object({
    path: z.array(z.string().min(1)).min(1),
    project: ProjectName,
  })
  .strict();

export const ScopeConfigSchema = z
  .object({
    projects: ProjectList.min(1),
    runtimes: ProjectList.default([]),
    dependencies: ProjectTable,
    dependents_to_test: ProjectTable,
    runtimes_to_build: ProjectTable,
    runtimes_to_test: ProjectTable,
    runtimes_to_test_needs_reconfig: ProjectTable,
    check_targets: z.record(ProjectName, z.string().trim().min(1)).default({}),
    exclusions: PlatformTable.default({}),
    dependent_exclusions: PlatformTable.default({}),
    meta_projects: z.array(MetaProjectRuleSchema).default([]),
    skip_projects: ProjectList.default([]),
    skip_build_projects: ProjectList.default([]),
    cir_project: ProjectName.optional(),
  })
  .strict();

export type ScopeConfigFile = z.infer<typeof ScopeConfigSchema>;

export type MetaProjectRule = z.infer<typeof MetaProjectRuleSchema>;

// =============================================================================
// MODEL TYPES
// =============================================================================

export type ProjectSet = ReadonlySet<string>;

export type ProjectTableModel = ReadonlyMap<string, ProjectSet>;

export type MetaProjectEntry = {
  readonly segments: readonly string[];
  readonly project: string;
};

export type ScopeModel = {
  readonly projects: ProjectSet;
  readonly runtimes: ProjectSet;
  readonly dependencies: ProjectTableModel;
  readonly dependentsToTest: ProjectTableModel;
  readonly runtimesToBuild: ProjectTableModel;
  readonly runtimesToTest: ProjectTableModel;
  readonly runtimesToTestNeedsReconfig: ProjectTableModel;
  readonly checkTargets: ReadonlyMap<string, string>;
  readonly exclusions: ReadonlyMap<Platform, ProjectSet>;
  readonly dependentExclusions: ReadonlyMap<Platform, ProjectSet>;
  readonly metaProjects: readonly MetaProjectEntry[];
  readonly skipProjects: ProjectSet;
  readonly skipBuildProjects: ProjectSet;
  readonly cirProject: string | null;
};

export const EMPTY_PROJECT_SET: ProjectSet = new Set<string>();

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}
