import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, describe, expect, it } from "vitest";

import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "../../core/errors.js";

import { buildScopeModel, loadScopeModel, resolveScopeConfigPath, SCOPE_CONFIG_ENV } from "./load.js";
import { TEST_CONFIG } from "./model.test-helpers.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fse.removeSync(dir);
  }
  tempDirs.length = 0;
});

function writeTempConfig(contents: string): string {
  const dir = fse.mkdtempSync(path.join(os.tmpdir(), "premerge-scope-config-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "tables.yaml");
  fse.outputFileSync(configPath, contents, "utf8");
  return configPath;
}

function captureConfigError(raw: unknown): ConfigError {
  try {
    buildScopeModel(raw);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

function captureUserFacingError(configPath: string): UserFacingError {
  try {
    loadScopeModel(configPath);
  } catch (err) {
    if (err instanceof UserFacingError) return err;
    throw err;
  }
  throw new Error("expected a UserFacingError");
}

// =============================================================================
// TESTS
// =============================================================================

describe("resolveScopeConfigPath", () => {
  it("falls back to the bundled tables", () => {
    const resolved = resolveScopeConfigPath({ env: {} });

    expect(resolved.source).toBe("bundled");
    expect(resolved.configPath.endsWith(path.join("config", "premerge.yaml"))).toBe(true);
  });

  it("prefers an explicit path over the environment", () => {
    const env = { [SCOPE_CONFIG_ENV]: "/tmp/from-env.yaml" };

    expect(resolveScopeConfigPath({ env })).toEqual({
      configPath: path.resolve("/tmp/from-env.yaml"),
      source: "env",
    });
    expect(resolveScopeConfigPath({ explicitPath: "/tmp/explicit.yaml", env })).toEqual({
      configPath: path.resolve("/tmp/explicit.yaml"),
      source: "explicit",
    });
  });
});

describe("loadScopeModel", () => {
  it("loads and freezes the bundled tables", () => {
    const model = loadScopeModel(resolveScopeConfigPath({ env: {} }).configPath);

    expect(Object.isFrozen(model)).toBe(true);
    expect(model.projects.size).toBe(17);
    expect(Array.from(model.runtimes).sort()).toEqual([
      "compiler-rt",
      "flang-rt",
      "libc",
      "libcxx",
      "libcxxabi",
      "libunwind",
    ]);
    expect(model.cirProject).toBe("CIR");
    expect(model.checkTargets.get("CIR")).toBe("check-clang-cir");
    expect(model.metaProjects[0]).toEqual({ segments: ["clang", "lib", "CIR"], project: "CIR" });
  });

  it("maps a missing file to a config error", () => {
    const missing = path.join(os.tmpdir(), "premerge-scope-missing", "tables.yaml");
    const error = captureUserFacingError(missing);

    expect(error.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(error.title).toBe("Selection config missing.");
    expect(error.message).toBe(`Could not read selection config at ${path.resolve(missing)}.`);
  });

  it("maps malformed YAML to a config error", () => {
    const configPath = writeTempConfig("projects: [llvm\n");
    const error = captureUserFacingError(configPath);

    expect(error.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(error.title).toBe("Selection config is not valid YAML.");
  });

  it("lists table issues in the message", () => {
    const configPath = writeTempConfig(
      ["projects: [llvm, clang]", "dependencies:", "  clang: [llvm, lldb]", ""].join("\n"),
    );
    const error = captureUserFacingError(configPath);

    expect(error.title).toBe("Selection config invalid.");
    expect(error.message).toBe(
      `Selection config tables are inconsistent. (${configPath})\n` +
        '  - dependencies.clang: unknown project "lldb"',
    );
    expect(error.cause).toBeInstanceOf(ConfigError);
  });

  it("fills optional tables with empty defaults", () => {
    const configPath = writeTempConfig("projects: [llvm]\n");
    const model = loadScopeModel(configPath);

    expect(model.runtimes.size).toBe(0);
    expect(model.dependencies.size).toBe(0);
    expect(model.exclusions.get("Windows")?.size).toBe(0);
    expect(model.metaProjects).toEqual([]);
    expect(model.cirProject).toBeNull();
  });
});

describe("buildScopeModel", () => {
  it("accepts the test tables", () => {
    expect(buildScopeModel(TEST_CONFIG).projects.has("core")).toBe(true);
  });

  it("reports schema violations with their location", () => {
    expect(captureConfigError({ runtimes: [] }).issues).toEqual([
      "projects: Expected array, received undefined",
    ]);
    expect(captureConfigError({ projects: ["a"], extra: true }).issues).toEqual([
      "<root>: Unrecognized keys: extra",
    ]);
  });

  it("rejects names outside the project universe in every table", () => {
    const error = captureConfigError({
      projects: ["a"],
      runtimes: ["r"],
      dependents_to_test: { a: ["b"] },
      check_targets: { c: "check-c" },
      exclusions: { Darwin: ["d"] },
      meta_projects: [{ path: ["x"], project: "e" }],
      skip_build_projects: ["f"],
      cir_project: "g",
    });

    expect(error.issues).toEqual([
      'dependents_to_test.a: unknown project "b"',
      'check_targets.c: unknown project "c"',
      'exclusions.Darwin: unknown project "d"',
      'meta_projects.0.project: unknown project "e"',
      'skip_build_projects: unknown project "f"',
      'cir_project: unknown project "g"',
    ]);
  });

  it("rejects a name listed as both project and runtime", () => {
    expect(captureConfigError({ projects: ["a", "r"], runtimes: ["r"] }).issues).toEqual([
      'runtimes: "r" is also listed under projects',
    ]);
  });

  it("rejects projects in runtime tables", () => {
    expect(
      captureConfigError({
        projects: ["a", "b"],
        runtimes: ["r"],
        runtimes_to_test: { a: ["r", "b"] },
      }).issues,
    ).toEqual(['runtimes_to_test.a: "b" is a project, not a runtime']);
  });
});
