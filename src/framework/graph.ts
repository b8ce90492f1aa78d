// Directed graph with insertion-ordered topological sort and cycle extraction

export class DirectedGraph<N> {
  private readonly successorMap = new Map<N, Set<N>>();
  private readonly predecessorMap = new Map<N, Set<N>>();

  addNode(node: N): void {
    if (this.successorMap.has(node)) return;
    this.successorMap.set(node, new Set());
    this.predecessorMap.set(node, new Set());
  }

  addEdge(from: N, to: N): void {
    this.addNode(from);
    this.addNode(to);
    this.successorMap.get(from)?.add(to);
    this.predecessorMap.get(to)?.add(from);
  }

  hasEdge(from: N, to: N): boolean {
    return this.successorMap.get(from)?.has(to) ?? false;
  }

  nodes(): N[] {
    return [...this.successorMap.keys()];
  }

  successors(node: N): N[] {
    return [...(this.successorMap.get(node) ?? [])];
  }

  predecessors(node: N): N[] {
    return [...(this.predecessorMap.get(node) ?? [])];
  }

  /** Nodes reachable from `node`; itself only when it lies on a cycle. */
  descendants(node: N): N[] {
    const seen = new Set<N>();
    const stack = this.successors(node);
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      stack.push(...this.successors(next));
    }
    return [...seen];
  }

  /** A copy containing the same nodes and edges. */
  copy(): DirectedGraph<N> {
    const result = new DirectedGraph<N>();
    for (const node of this.successorMap.keys()) result.addNode(node);
    for (const [from, tos] of this.successorMap) {
      for (const to of tos) result.addEdge(from, to);
    }
    return result;
  }

  /** A new graph with every edge flipped. */
  reverse(): DirectedGraph<N> {
    const result = new DirectedGraph<N>();
    for (const node of this.successorMap.keys()) result.addNode(node);
    for (const [from, tos] of this.successorMap) {
      for (const to of tos) result.addEdge(to, from);
    }
    return result;
  }

  /**
   * Kahn's algorithm. Every node comes after all of its predecessors; ties
   * keep insertion order. Returns undefined when the graph has a cycle.
   */
  topologicalSort(): N[] | undefined {
    const inDegree = new Map<N, number>();
    for (const [node, preds] of this.predecessorMap) {
      inDegree.set(node, preds.size);
    }

    const queue: N[] = [];
    for (const [node, degree] of inDegree) {
      if (degree === 0) queue.push(node);
    }

    const sorted: N[] = [];
    for (let head = 0; head < queue.length; head++) {
      const node = queue[head];
      sorted.push(node);
      for (const next of this.successorMap.get(node) ?? []) {
        const degree = (inDegree.get(next) ?? 0) - 1;
        inDegree.set(next, degree);
        if (degree === 0) queue.push(next);
      }
    }

    return sorted.length === this.successorMap.size ? sorted : undefined;
  }

  /**
   * One simple cycle, found by depth-first search in insertion order, as the
   * list of its nodes (closing edge implied). Undefined for acyclic graphs.
   */
  findCycle(): N[] | undefined {
    const done = new Set<N>();
    const onStack = new Set<N>();
    const path: N[] = [];

    const visit = (node: N): N[] | undefined => {
      onStack.add(node);
      path.push(node);
      for (const next of this.successorMap.get(node) ?? []) {
        if (onStack.has(next)) {
          return path.slice(path.indexOf(next));
        }
        if (done.has(next)) continue;
        const cycle = visit(next);
        if (cycle) return cycle;
      }
      onStack.delete(node);
      path.pop();
      done.add(node);
      return undefined;
    };

    for (const node of this.successorMap.keys()) {
      if (done.has(node)) continue;
      const cycle = visit(node);
      if (cycle) return cycle;
    }
    return undefined;
  }
}
