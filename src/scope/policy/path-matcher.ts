// Changed-path attribution.
// Purpose: map repo-relative file paths to the projects they belong to.
// Assumes paths use forward slashes; empty and "." segments are ignored.

import { META_PATH_WILDCARD, type MetaProjectEntry, type ScopeModel } from "../model/schema.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveFileProjects(
  filePath: string,
  model: Pick<ScopeModel, "metaProjects" | "skipProjects">,
): Set<string> {
  const segments = splitPathSegments(filePath);
  if (segments.length === 0) {
    return new Set();
  }

  const projects = new Set<string>();
  for (const entry of model.metaProjects) {
    if (!matchesMetaPath(entry.segments, segments)) {
      continue;
    }
    if (model.skipProjects.has(entry.project)) {
      return new Set();
    }
    projects.add(entry.project);
  }

  projects.add(segments[0]);
  return projects;
}

export function resolveTouchedProjects(
  filePaths: Iterable<string>,
  model: Pick<ScopeModel, "metaProjects" | "skipProjects">,
): Set<string> {
  const touched = new Set<string>();
  for (const filePath of filePaths) {
    for (const project of resolveFileProjects(filePath, model)) {
      touched.add(project);
    }
  }
  return touched;
}

// A pattern matches any path that starts with it; longer paths still match.
export function matchesMetaPath(
  pattern: MetaProjectEntry["segments"],
  segments: readonly string[],
): boolean {
  if (segments.length < pattern.length) {
    return false;
  }

  return pattern.every(
    (part, index) => part === META_PATH_WILDCARD || part === segments[index],
  );
}

// =============================================================================
// HELPERS
// =============================================================================

function splitPathSegments(filePath: string): string[] {
  return filePath.split("/").filter((segment) => segment.length > 0 && segment !== ".");
}
