const scc: (graph: number[][]) => {
  components: number[][];
  adjacencyList: number[][];
} = require("strongly-connected-components");

export interface Tree {
  components: Map<
    number,
    {
      keys: number[];
      dependencies: number[];
    }
  >;
  rootComponents: number[];
}

export interface Graph {
  nodes: { key: number; isRoot?: boolean }[];
  links: { source: number; target: number }[];
}

/**
 * Collapses the strongly connected components of `graph`, so that packages
 * depending on each other form one unit of work.
 */
export function convertGraphToTree(graph: Graph): Tree {
  const nodeToIndex = new Map<number, number>();
  graph.nodes.forEach((n, i) => nodeToIndex.set(n.key, i));

  const gr: number[][] = graph.nodes.map(() => []);
  graph.links.forEach((link) => {
    const sourceIndex = nodeToIndex.get(link.source);
    const targetIndex = nodeToIndex.get(link.target);
    if (sourceIndex === undefined || targetIndex === undefined) {
      throw new Error(`Invalid link ${link.source} -> ${link.target}`);
    }
    gr[sourceIndex]?.push(targetIndex);
  });
  const { components, adjacencyList } = scc(gr);
  const tree: Tree = { components: new Map(), rootComponents: [] };
  components.forEach((c, j) => {
    const nodes = c.flatMap((i) => {
      const node = graph.nodes[i];
      return node ? [node] : [];
    });
    if (nodes.some((n) => n.isRoot)) {
      tree.rootComponents.push(j);
    }
    tree.components.set(j, {
      keys: nodes.map((n) => n.key),
      dependencies: [...(adjacencyList[j] ?? [])],
    });
  });
  return tree;
}
