import { GraphError } from "../errors.js";
import { canTransition, isTerminal, type GraphSpec, type TaskNode, type TaskStatus } from "./types.js";

export const DEFAULT_RESOURCE_CLASS = "_default";

/**
 * Declarative DAG of tasks keyed by caller-assigned ids.
 *
 * Waves are derived from the declared structure alone; node statuses only
 * matter for readiness (`getReadyTasks`) and completion tracking.
 */
export class TaskGraph {
  private nodes = new Map<string, TaskNode>();

  /**
   * Build a graph from a declaration map or list. Declaration order does not
   * matter here, so cycles are possible and reported as `GraphError(CYCLE)`.
   */
  static fromSpec(spec: GraphSpec): TaskGraph {
    const graph = new TaskGraph();
    const entries = Array.isArray(spec) ? spec.map((d) => [d.id, d] as const) : Object.entries(spec);
    for (const [id, decl] of entries) {
      graph.insert(id, decl.description, decl.resourceClass ?? DEFAULT_RESOURCE_CLASS, decl.dependsOn ?? []);
    }
    graph.validate();
    return graph;
  }

  /** Register a node. Every dependency must already be registered. */
  addTask(
    id: string,
    description: string,
    resourceClass: string = DEFAULT_RESOURCE_CLASS,
    dependsOn: string[] = [],
  ): TaskNode {
    for (const dep of dependsOn) {
      if (dep === id) {
        throw new GraphError("CYCLE", `Task "${id}" depends on itself`);
      }
      if (!this.nodes.has(dep)) {
        throw new GraphError("UNKNOWN_DEPENDENCY", `Task "${id}" depends on unknown task "${dep}"`);
      }
    }
    return this.insert(id, description, resourceClass, dependsOn);
  }

  private insert(id: string, description: string, resourceClass: string, dependsOn: string[]): TaskNode {
    if (this.nodes.has(id)) {
      throw new GraphError("DUPLICATE_TASK", `Task "${id}" is already declared`);
    }
    const node: TaskNode = {
      id,
      description,
      resourceClass,
      dependsOn: [...new Set(dependsOn)],
      status: "pending",
    };
    this.nodes.set(id, node);
    return node;
  }

  /** Check for missing deps, self-dependencies and cycles. */
  validate(): void {
    for (const node of this.nodes.values()) {
      for (const dep of node.dependsOn) {
        if (dep === node.id) {
          throw new GraphError("CYCLE", `Task "${node.id}" depends on itself`);
        }
        if (!this.nodes.has(dep)) {
          throw new GraphError("UNKNOWN_DEPENDENCY", `Task "${node.id}" depends on unknown task "${dep}"`);
        }
      }
    }
    const cycle = this.findCycle();
    if (cycle) {
      throw new GraphError("CYCLE", `Task graph contains a cycle: ${cycle.join(" -> ")}`);
    }
  }

  /** DFS with coloring; returns the ids along the first back edge found. */
  private findCycle(): string[] | undefined {
    const WHITE = 0, GRAY = 1, BLACK = 2;
    const color = new Map<string, number>();
    for (const id of this.nodes.keys()) color.set(id, WHITE);
    const dependents = this.dependentsMap();
    const path: string[] = [];

    const dfs = (id: string): string[] | undefined => {
      color.set(id, GRAY);
      path.push(id);
      for (const next of dependents.get(id) ?? []) {
        const c = color.get(next);
        if (c === GRAY) return [...path.slice(path.indexOf(next)), next];
        if (c === WHITE) {
          const found = dfs(next);
          if (found) return found;
        }
      }
      path.pop();
      color.set(id, BLACK);
      return undefined;
    };

    for (const id of this.nodes.keys()) {
      if (color.get(id) === WHITE) {
        const found = dfs(id);
        if (found) return found;
      }
    }
    return undefined;
  }

  private dependentsMap(): Map<string, string[]> {
    const dependents = new Map<string, string[]>();
    for (const node of this.nodes.values()) {
      for (const dep of node.dependsOn) {
        const list = dependents.get(dep) ?? [];
        list.push(node.id);
        dependents.set(dep, list);
      }
    }
    return dependents;
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  get(id: string): TaskNode | undefined {
    return this.nodes.get(id);
  }

  list(): TaskNode[] {
    return [...this.nodes.values()];
  }

  get size(): number {
    return this.nodes.size;
  }

  /** Pending nodes whose every dependency has completed, in declaration order. */
  getReadyTasks(): TaskNode[] {
    return this.list().filter(
      (n) =>
        (n.status === "pending" || n.status === "ready") &&
        n.dependsOn.every((d) => this.nodes.get(d)?.status === "completed"),
    );
  }

  /**
   * Partition the graph into waves: take the ready set, pretend it completed,
   * repeat. A round that places nothing while nodes remain means a cycle.
   */
  getIndependentGroups(): TaskNode[][] {
    const placed = new Set<string>();
    const waves: TaskNode[][] = [];

    while (placed.size < this.nodes.size) {
      const wave = this.list().filter(
        (n) => !placed.has(n.id) && n.dependsOn.every((d) => placed.has(d)),
      );
      if (wave.length === 0) {
        const stuck = this.list().filter((n) => !placed.has(n.id)).map((n) => n.id);
        throw new GraphError("CYCLE", `Task graph contains a cycle among: ${stuck.join(", ")}`);
      }
      for (const n of wave) placed.add(n.id);
      waves.push(wave);
    }

    return waves;
  }

  /**
   * Move a node forward in its lifecycle. Returns false when the transition
   * would go backwards or leave a terminal state.
   */
  setStatus(id: string, status: TaskStatus, at: number = Date.now()): boolean {
    const node = this.require(id);
    if (!canTransition(node.status, status)) return false;
    node.status = status;
    if (status === "spawned") node.spawnedAt = at;
    if (isTerminal(status)) node.completedAt = at;
    return true;
  }

  /** Mark a node completed. Waves are not recomputed. */
  markCompleted(id: string): boolean {
    return this.setStatus(id, "completed");
  }

  /** Every task that depends on `id`, directly or transitively, nearest first. */
  dependentsOf(id: string): string[] {
    this.require(id);
    const dependents = this.dependentsMap();
    const queue = [...(dependents.get(id) ?? [])];
    const seen = new Set<string>();
    const result: string[] = [];

    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      result.push(next);
      queue.push(...(dependents.get(next) ?? []));
    }
    return result;
  }

  /** Nodes ordered so that every node comes after all of its dependencies. */
  topologicalSort(): TaskNode[] {
    const visited = new Set<string>();
    const sorted: TaskNode[] = [];

    const visit = (node: TaskNode): void => {
      if (visited.has(node.id)) return;
      visited.add(node.id);
      for (const dep of node.dependsOn) {
        const depNode = this.nodes.get(dep);
        if (depNode) visit(depNode);
      }
      sorted.push(node);
    };

    for (const node of this.nodes.values()) visit(node);
    return sorted;
  }

  /**
   * Cancel every not-yet-spawned transitive dependent of `failedId`.
   * Returns the ids that were cancelled.
   */
  skipDownstream(failedId: string): string[] {
    const skipped: string[] = [];
    for (const id of this.dependentsOf(failedId)) {
      const node = this.nodes.get(id);
      if (node && (node.status === "pending" || node.status === "ready")) {
        this.setStatus(id, "cancelled");
        skipped.push(id);
      }
    }
    return skipped;
  }

  /** True when every node is terminal. */
  isComplete(): boolean {
    return this.list().every((n) => isTerminal(n.status));
  }

  private require(id: string): TaskNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new GraphError("UNKNOWN_TASK", `Unknown task "${id}"`);
    }
    return node;
  }
}
