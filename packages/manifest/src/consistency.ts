import { dependencyHash } from "./dependencyHash";
import type { Lockfile, LockEntry } from "./lockfile";
import { rootEntryPath } from "./lockfile";
import { dependencySpecs } from "./manifest";
import type { DependencySpec, Manifest } from "./manifest";
import { WORKSPACE_PROTOCOL, rangeAccepts } from "./ranges";

/**
 * A workspace member as seen from the project root.
 */
export interface WorkspaceManifest {
  manifest: Manifest;
  /**
   * Directory of the member relative to the project root, with forward slashes.
   */
  relativePath: string;
}

export interface ConsistencyResult {
  consistent: boolean;
  /**
   * Why the lockfile cannot be used as is. Empty when consistent.
   */
  reasons: string[];
}

function isWorkspaceEntry(entry: LockEntry): boolean {
  return entry.resolved.startsWith(WORKSPACE_PROTOCOL);
}

/**
 * A lockfile is consistent with a manifest when it was computed from the same
 * dependency section and every requirement of the root (and of the workspace
 * members) is met by a locked package.
 */
export function checkLockfileConsistency(
  manifest: Manifest,
  lockfile: Lockfile,
  workspaces: readonly WorkspaceManifest[] = []
): ConsistencyResult {
  const reasons: string[] = [];
  const expectedHash = dependencyHash(
    manifest,
    workspaces.map((w) => w.manifest),
    lockfile.integrityAlgorithm
  );
  if (lockfile.manifestHash !== expectedHash) {
    reasons.push("dependencies changed since the lockfile was written");
  }

  const byPath = new Map<string, LockEntry>();
  lockfile.packages.forEach((entry) => byPath.set(entry.path, entry));
  const workspaceNames = new Set(workspaces.map((w) => w.manifest.name));

  for (const member of workspaces) {
    const entry = byPath.get(rootEntryPath(member.manifest.name));
    if (
      !entry ||
      !isWorkspaceEntry(entry) ||
      entry.resolved !== `${WORKSPACE_PROTOCOL}${member.relativePath}`
    ) {
      reasons.push(`workspace ${member.manifest.name} is not locked`);
    }
  }

  const check = (spec: DependencySpec, candidates: string[]) => {
    const entry = candidates
      .map((p) => byPath.get(p))
      .find((e): e is LockEntry => e !== undefined);
    if (workspaceNames.has(spec.name)) {
      if (!entry || !isWorkspaceEntry(entry)) {
        reasons.push(`${spec.name} should be linked from the workspace`);
      }
      return;
    }
    if (!entry) {
      reasons.push(`${spec.name}@${spec.range} is missing`);
    } else if (isWorkspaceEntry(entry) || !rangeAccepts(spec.range, entry.version)) {
      reasons.push(
        `${spec.name}@${entry.version} does not satisfy ${spec.range} (required by ${spec.requestedBy})`
      );
    }
  };

  for (const spec of dependencySpecs(manifest)) {
    check(spec, [rootEntryPath(spec.name)]);
  }
  for (const member of workspaces) {
    for (const spec of dependencySpecs(member.manifest)) {
      check(spec, [
        `${member.relativePath}/node_modules/${spec.name}`,
        rootEntryPath(spec.name),
      ]);
    }
  }

  return { consistent: reasons.length === 0, reasons };
}
