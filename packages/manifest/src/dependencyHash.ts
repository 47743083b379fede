import { calculateIntegrity } from "@burrow/common";
import type { IntegrityAlgorithm } from "@burrow/common";

import type { DependencyMap, Manifest } from "./manifest";

type DependencySection = Pick<
  Manifest,
  "name" | "dependencies" | "devDependencies"
>;

function sortedMap(map: DependencyMap): DependencyMap {
  const result: DependencyMap = {};
  for (const key of Object.keys(map).sort()) {
    const value = map[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Stable hash of the dependency section of a manifest (and of its workspace
 * members). Stored in the lockfile to detect manifest edits, digested with
 * the lockfile's algorithm.
 */
export function dependencyHash(
  manifest: DependencySection,
  workspaceManifests: readonly DependencySection[] = [],
  algorithm: IntegrityAlgorithm = "sha512"
): string {
  const canonical = {
    dependencies: sortedMap(manifest.dependencies),
    devDependencies: sortedMap(manifest.devDependencies),
    workspaces: [...workspaceManifests]
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map((w) => ({
        name: w.name,
        dependencies: sortedMap(w.dependencies),
        devDependencies: sortedMap(w.devDependencies),
      })),
  };
  return calculateIntegrity(Buffer.from(JSON.stringify(canonical)), algorithm);
}
