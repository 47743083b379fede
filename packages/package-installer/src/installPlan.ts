import type { DependencyGraph, PackageId, ResolvedPackage } from "@burrow/dependency-resolver";

import { convertGraphToTree } from "./graphToTree";
import type { Graph, Tree } from "./graphToTree";
import { getNodesInOrder } from "./treeExecutor";

export interface InstallPlan {
  /**
   * Packages to install, in path order.
   */
  packages: ResolvedPackage[];
  tree: Tree;
  /**
   * Components in postorder, the root project last.
   */
  order: number[];
  /**
   * Key standing for the root project in `tree`.
   */
  rootKey: number;
}

/**
 * Condenses the graph into units of work ordered dependencies first. With
 * `production`, development-only packages are left out.
 */
export function createInstallPlan(
  graph: DependencyGraph,
  options: { production?: boolean } = {}
): InstallPlan {
  const packages = graph
    .all()
    .filter((p) => !(options.production && p.dev))
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const included = new Set<PackageId>(packages.map((p) => p.id));
  const rootKey = graph.size;

  const input: Graph = {
    nodes: [{ key: rootKey, isRoot: true }, ...packages.map((p) => ({ key: p.id }))],
    links: [],
  };
  for (const edge of graph.edgesOf(undefined)) {
    if (included.has(edge.target)) {
      input.links.push({ source: rootKey, target: edge.target });
    }
  }
  for (const pkg of packages) {
    for (const edge of graph.edgesOf(pkg.id)) {
      if (included.has(edge.target)) {
        input.links.push({ source: pkg.id, target: edge.target });
      }
    }
  }

  const tree = convertGraphToTree(input);
  return { packages, tree, order: getNodesInOrder(tree), rootKey };
}
