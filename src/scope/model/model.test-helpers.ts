import { buildScopeModel } from "./load.js";
import type { ScopeModel } from "./schema.js";

// Small graph with a dependency cycle (core <-> util), a sentinel project and two runtimes.
export const TEST_CONFIG = {
  projects: ["app", "core", "util", "tools", "helper", "flaky", "docs", "ci", "SENT"],
  runtimes: ["rt-a", "rt-b"],
  dependencies: {
    app: ["core"],
    core: ["util"],
    util: ["core"],
    tools: ["helper"],
    SENT: ["app"],
    "rt-a": ["tools"],
  },
  dependents_to_test: {
    core: ["app", "flaky"],
    ci: ["app", "core", "SENT"],
  },
  runtimes_to_build: {
    tools: ["rt-b"],
  },
  runtimes_to_test: {
    core: ["rt-a"],
    "rt-a": ["rt-a"],
  },
  runtimes_to_test_needs_reconfig: {
    app: ["rt-b"],
  },
  check_targets: {
    app: "check-app",
    core: "check-core",
    util: "check-util",
    tools: "check-tools",
    flaky: "check-flaky",
    SENT: "check-sent",
    "rt-a": "check-rt-a",
    "rt-b": "check-rt-b",
  },
  exclusions: {
    Windows: ["rt-b"],
    Darwin: ["flaky"],
  },
  dependent_exclusions: {
    Windows: ["flaky"],
  },
  meta_projects: [
    { path: ["app", "gen"], project: "core" },
    { path: ["*", "docs"], project: "docs" },
    { path: ["ci"], project: "ci" },
    { path: ["app", "sentinel"], project: "SENT" },
  ],
  skip_projects: ["docs"],
  skip_build_projects: ["SENT"],
  cir_project: "SENT",
};

export function createTestModel(overrides: Record<string, unknown> = {}): ScopeModel {
  return buildScopeModel({ ...TEST_CONFIG, ...overrides });
}
