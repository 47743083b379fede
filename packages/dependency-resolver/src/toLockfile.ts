import type { IntegrityAlgorithm } from "@burrow/common";
import { LOCKFILE_VERSION } from "@burrow/manifest";
import type { LockEntry, Lockfile } from "@burrow/manifest";

import type { DependencyGraph } from "./graph";

export function toLockfile(
  graph: DependencyGraph,
  manifestHash: string,
  integrityAlgorithm: IntegrityAlgorithm
): Lockfile {
  const packages = graph.all().map((pkg) => {
    const entry: LockEntry = {
      path: pkg.path,
      name: pkg.name,
      version: pkg.version,
      integrity: pkg.integrity,
      resolved: pkg.resolved,
      requires: graph.edgesOf(pkg.id).map((edge) => {
        const target = graph.get(edge.target);
        return { name: target.name, version: target.version };
      }),
    };
    if (pkg.dev) {
      entry.dev = true;
    }
    return entry;
  });
  packages.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return {
    lockfileVersion: LOCKFILE_VERSION,
    integrityAlgorithm,
    manifestHash,
    packages,
  };
}
