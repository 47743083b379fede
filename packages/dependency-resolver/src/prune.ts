import { DependencyGraph, ROOT_SCOPE } from "./graph";
import type { PackageId, ScopeId } from "./graph";

/**
 * Copy of `graph` without development-only packages. Owners of scopes holding
 * a production package are kept so every kept path stays valid.
 */
export function withoutDevPackages(graph: DependencyGraph): DependencyGraph {
  const keep = new Set<PackageId>();
  for (const pkg of graph.all()) {
    if (pkg.dev) {
      continue;
    }
    keep.add(pkg.id);
    graph.enclosingPackages(pkg.scope).forEach((owner) => keep.add(owner.id));
  }

  const pruned = new DependencyGraph({
    ...graph.root,
    dependencies: graph.root.dependencies.filter((spec) => !spec.isDev),
  });
  const ids = new Map<PackageId, PackageId>();
  // Ids grow in creation order and owners are created before their scopes.
  for (const pkg of graph.all()) {
    if (!keep.has(pkg.id)) {
      continue;
    }
    const owner = graph.scope(pkg.scope).owner;
    let scope: ScopeId = ROOT_SCOPE;
    if (owner !== undefined) {
      const newOwner = ids.get(owner);
      if (newOwner === undefined) {
        throw new Error(`Owner of ${pkg.path} was pruned`);
      }
      scope = pruned.openPrivateScope(newOwner).id;
    }
    const copy = pruned.add(scope, {
      name: pkg.name,
      version: pkg.version,
      integrity: pkg.integrity,
      source: pkg.source,
      resolved: pkg.resolved,
      dependencies: pkg.dependencies,
      location: pkg.location,
      dev: pkg.dev,
    });
    ids.set(pkg.id, copy.id);
  }

  const copyEdges = (from: PackageId | undefined, to: PackageId | undefined) => {
    for (const edge of graph.edgesOf(from)) {
      const target = ids.get(edge.target);
      if (target !== undefined) {
        pruned.link(to, edge.spec, target);
      }
    }
  };
  copyEdges(undefined, undefined);
  for (const [oldId, newId] of ids) {
    copyEdges(oldId, newId);
  }
  return pruned;
}
