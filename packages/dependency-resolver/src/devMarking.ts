import type { DependencyGraph, PackageId } from "./graph";

/**
 * Flags every package that production code cannot reach: the root's
 * production dependencies and the workspace members are the starting points,
 * development edges are never followed.
 */
export function markDevPackages(graph: DependencyGraph): void {
  const reached = new Set<PackageId>();
  const pending: PackageId[] = [];
  const visit = (id: PackageId) => {
    if (!reached.has(id)) {
      reached.add(id);
      pending.push(id);
    }
  };

  graph.rootEdges.filter((e) => !e.spec.isDev).forEach((e) => visit(e.target));
  graph
    .all()
    .filter((p) => p.source === "workspace")
    .forEach((p) => visit(p.id));

  let id = pending.pop();
  while (id !== undefined) {
    for (const edge of graph.edgesOf(id)) {
      if (!edge.spec.isDev) {
        visit(edge.target);
      }
    }
    id = pending.pop();
  }

  for (const pkg of graph.all()) {
    pkg.dev = !reached.has(pkg.id);
  }
}
