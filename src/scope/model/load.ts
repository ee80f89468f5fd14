// Scope model loading.
// Purpose: read the YAML selection tables, validate them and freeze them into a ScopeModel.
// Assumes every table is small; validation walks each table once.

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import YAML from "yaml";
import type { ZodIssue } from "zod";

import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "../../core/errors.js";

import {
  PLATFORMS,
  ScopeConfigSchema,
  type Platform,
  type ProjectSet,
  type ProjectTableModel,
  type ScopeConfigFile,
  type ScopeModel,
} from "./schema.js";

export const SCOPE_CONFIG_ENV = "PREMERGE_SCOPE_CONFIG";

const DEFAULT_CONFIG_RELATIVE_PATH = path.join("config", "premerge.yaml");
const CONFIG_HINT = "Fix the selection tables or pass --config <path>.";

export type ScopeConfigSource = "explicit" | "env" | "bundled";

export type ScopeConfigResolution = {
  configPath: string;
  source: ScopeConfigSource;
};

// =============================================================================
// PATH RESOLUTION
// =============================================================================

export function resolveScopeConfigPath(
  args: {
    explicitPath?: string;
    env?: NodeJS.ProcessEnv;
  } = {},
): ScopeConfigResolution {
  if (args.explicitPath) {
    return { configPath: path.resolve(args.explicitPath), source: "explicit" };
  }

  const fromEnv = (args.env ?? process.env)[SCOPE_CONFIG_ENV]?.trim();
  if (fromEnv) {
    return { configPath: path.resolve(fromEnv), source: "env" };
  }

  return { configPath: bundledConfigPath(), source: "bundled" };
}

export function bundledConfigPath(): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const root = findUp(moduleDir, (dir) =>
    fs.existsSync(path.join(dir, DEFAULT_CONFIG_RELATIVE_PATH)),
  );
  if (!root) {
    throw new ConfigError(`Bundled ${DEFAULT_CONFIG_RELATIVE_PATH} not found above ${moduleDir}.`);
  }
  return path.join(root, DEFAULT_CONFIG_RELATIVE_PATH);
}

// =============================================================================
// LOADING
// =============================================================================

export function loadScopeModel(configPath: string): ScopeModel {
  const resolved = path.resolve(configPath);

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Selection config missing.",
      message: `Could not read selection config at ${resolved}.`,
      hint: CONFIG_HINT,
      cause: err,
    });
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Selection config is not valid YAML.",
      message: `Could not parse ${resolved}.`,
      hint: CONFIG_HINT,
      cause: err,
    });
  }

  try {
    return buildScopeModel(parsed);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;

    throw new UserFacingError({
      code: err.code,
      title: err.title,
      message: [`${err.message} (${resolved})`, ...err.details()].join("\n"),
      hint: CONFIG_HINT,
      cause: err,
    });
  }
}

export function buildScopeModel(raw: unknown): ScopeModel {
  const result = ScopeConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      "Selection config does not match the expected schema.",
      formatConfigIssues(result.error.issues),
    );
  }

  const issues = validateReferences(result.data);
  if (issues.length > 0) {
    throw new ConfigError("Selection config tables are inconsistent.", issues);
  }

  return freezeModel(result.data);
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}

// =============================================================================
// VALIDATION
// =============================================================================

function validateReferences(config: ScopeConfigFile): string[] {
  const issues: string[] = [];
  const projects = new Set(config.projects);
  const runtimes = new Set(config.runtimes);
  const universe = new Set([...projects, ...runtimes]);

  for (const name of runtimes) {
    if (projects.has(name)) {
      issues.push(`runtimes: "${name}" is also listed under projects`);
    }
  }

  const check = (location: string, name: string): void => {
    if (!universe.has(name)) {
      issues.push(`${location}: unknown project "${name}"`);
    }
  };

  const tables = {
    dependencies: config.dependencies,
    dependents_to_test: config.dependents_to_test,
    runtimes_to_build: config.runtimes_to_build,
    runtimes_to_test: config.runtimes_to_test,
    runtimes_to_test_needs_reconfig: config.runtimes_to_test_needs_reconfig,
  };

  for (const [tableName, table] of Object.entries(tables)) {
    for (const [key, members] of Object.entries(table)) {
      check(`${tableName}.${key}`, key);
      members.forEach((member) => check(`${tableName}.${key}`, member));
    }
  }

  for (const [tableName, members] of Object.entries({
    runtimes_to_build: config.runtimes_to_build,
    runtimes_to_test: config.runtimes_to_test,
    runtimes_to_test_needs_reconfig: config.runtimes_to_test_needs_reconfig,
  })) {
    for (const [key, values] of Object.entries(members)) {
      for (const value of values) {
        if (projects.has(value)) {
          issues.push(`${tableName}.${key}: "${value}" is a project, not a runtime`);
        }
      }
    }
  }

  Object.keys(config.check_targets).forEach((key) => check(`check_targets.${key}`, key));

  for (const platform of PLATFORMS) {
    config.exclusions[platform].forEach((name) => check(`exclusions.${platform}`, name));
    config.dependent_exclusions[platform].forEach((name) =>
      check(`dependent_exclusions.${platform}`, name),
    );
  }

  config.meta_projects.forEach((rule, index) =>
    check(`meta_projects.${index}.project`, rule.project),
  );
  config.skip_projects.forEach((name) => check("skip_projects", name));
  config.skip_build_projects.forEach((name) => check("skip_build_projects", name));

  if (config.cir_project !== undefined) {
    check("cir_project", config.cir_project);
  }

  return issues;
}

// =============================================================================
// MODEL FREEZING
// =============================================================================

function freezeModel(config: ScopeConfigFile): ScopeModel {
  return Object.freeze({
    projects: new Set(config.projects),
    runtimes: new Set(config.runtimes),
    dependencies: toTable(config.dependencies),
    dependentsToTest: toTable(config.dependents_to_test),
    runtimesToBuild: toTable(config.runtimes_to_build),
    runtimesToTest: toTable(config.runtimes_to_test),
    runtimesToTestNeedsReconfig: toTable(config.runtimes_to_test_needs_reconfig),
    checkTargets: new Map(Object.entries(config.check_targets)),
    exclusions: toPlatformTable(config.exclusions),
    dependentExclusions: toPlatformTable(config.dependent_exclusions),
    metaProjects: Object.freeze(
      config.meta_projects.map((rule) =>
        Object.freeze({ segments: Object.freeze([...rule.path]), project: rule.project }),
      ),
    ),
    skipProjects: new Set(config.skip_projects),
    skipBuildProjects: new Set(config.skip_build_projects),
    cirProject: config.cir_project ?? null,
  });
}

function toTable(table: Record<string, string[]>): ProjectTableModel {
  return new Map(
    Object.entries(table).map(([key, members]): [string, ProjectSet] => [key, new Set(members)]),
  );
}

function toPlatformTable(table: Record<Platform, string[]>): ReadonlyMap<Platform, ProjectSet> {
  return new Map(
    PLATFORMS.map((platform): [Platform, ProjectSet] => [platform, new Set(table[platform])]),
  );
}

function findUp(start: string, predicate: (dir: string) => boolean): string | null {
  let current = path.resolve(start);
  while (true) {
    if (predicate(current)) return current;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}
