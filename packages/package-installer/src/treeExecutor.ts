export interface ExecutableTree {
  components: Map<number, { dependencies: number[] }>;
  rootComponents: number[];
}

function dependenciesOf(tree: ExecutableTree, component: number): number[] {
  return tree.components.get(component)?.dependencies ?? [];
}

/**
 * Components in postorder: every component after its dependencies, the root
 * components last.
 */
export function getNodesInOrder(tree: ExecutableTree): number[] {
  const pending = new Set<number>(tree.components.keys());
  const done = new Set<number>();
  const result: number[] = [];

  while (pending.size !== 0) {
    let progressed = false;
    for (const component of [...pending]) {
      // skip root and add it at the end
      if (tree.rootComponents.includes(component)) {
        pending.delete(component);
        progressed = true;
      } else if (dependenciesOf(tree, component).every((d) => done.has(d))) {
        pending.delete(component);
        done.add(component);
        result.push(component);
        progressed = true;
      }
    }
    if (!progressed) {
      throw new Error("The install plan contains a cycle");
    }
  }
  result.push(...tree.rootComponents);
  return result;
}

/**
 * Runs `executor` for every component once all of its dependencies finished.
 * Independent components run concurrently; roots wait for everything else.
 */
export async function executeTree(
  tree: ExecutableTree,
  executor: (component: number) => Promise<void>
): Promise<void> {
  const componentOrders = getNodesInOrder(tree);

  const promises: Map<number, Promise<void>> = new Map();
  componentOrders.forEach((c) => {
    const dependencyExecutions = dependenciesOf(tree, c).map((d) =>
      promises.get(d)
    );

    // make root go last
    if (tree.rootComponents.includes(c)) {
      dependencyExecutions.push(...promises.values());
    }

    promises.set(
      c,
      Promise.all(dependencyExecutions).then(() => executor(c))
    );
  });

  await Promise.all(promises.values());
}
