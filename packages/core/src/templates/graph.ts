/**
 * Processor dependency graph helpers
 *
 * Generation never executes the graph, so cycles are only reported by the
 * project validator. Whatever orders execution at run time must reject them.
 */

export interface DependencyNode {
  id: string;
  dependencies: readonly string[];
}

/**
 * Find one dependency cycle
 *
 * @returns Processor ids along the cycle, first id repeated at the end
 *          (e.g. ['a', 'b', 'a']), or null when the graph is acyclic.
 *          Dependencies on unknown ids are ignored here.
 */
export function findDependencyCycle(nodes: readonly DependencyNode[]): string[] | null {
  const edges = new Map(nodes.map((node) => [node.id, node.dependencies]));
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  const visit = (id: string): string[] | null => {
    const current = state.get(id);
    if (current === 'done') return null;
    if (current === 'visiting') {
      return [...stack.slice(stack.indexOf(id)), id];
    }

    state.set(id, 'visiting');
    stack.push(id);

    for (const dependency of edges.get(id) ?? []) {
      if (!edges.has(dependency)) continue;
      const cycle = visit(dependency);
      if (cycle) return cycle;
    }

    stack.pop();
    state.set(id, 'done');
    return null;
  };

  for (const node of nodes) {
    const cycle = visit(node.id);
    if (cycle) return cycle;
  }

  return null;
}
