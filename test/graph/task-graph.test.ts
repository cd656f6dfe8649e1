import { describe, expect, it } from "vitest";
import { GraphError } from "../../src/errors.js";
import { TaskGraph } from "../../src/graph/task-graph.js";
import { canTransition, isTerminal } from "../../src/graph/types.js";

function diamond(): TaskGraph {
  return TaskGraph.fromSpec({
    a: { description: "do A" },
    b: { description: "do B", resourceClass: "opus" },
    c: { description: "do C", dependsOn: ["a", "b"] },
    d: { description: "do D", dependsOn: ["c"] },
    e: { description: "do E", dependsOn: ["a"] },
  });
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof GraphError ? err.code : undefined;
  }
  return undefined;
}

describe("TaskGraph construction", () => {
  it("creates pending nodes with defaults", () => {
    const graph = diamond();
    expect(graph.size).toBe(5);
    expect(graph.get("a")).toMatchObject({ id: "a", status: "pending", resourceClass: "_default", dependsOn: [] });
    expect(graph.get("b")?.resourceClass).toBe("opus");
  });

  it("accepts a list of declarations", () => {
    const graph = TaskGraph.fromSpec([
      { id: "x", description: "X" },
      { id: "y", description: "Y", dependsOn: ["x"] },
    ]);
    expect(graph.list().map((n) => n.id)).toEqual(["x", "y"]);
  });

  it("rejects an unknown dependency", () => {
    const graph = new TaskGraph();
    expect(() => graph.addTask("a", "do A", "_default", ["missing"])).toThrow(
      'Task "a" depends on unknown task "missing"',
    );
    expect(codeOf(() => graph.addTask("a", "do A", "_default", ["missing"]))).toBe("UNKNOWN_DEPENDENCY");
    expect(graph.has("a")).toBe(false);
  });

  it("rejects a self-dependency as a cycle", () => {
    const graph = new TaskGraph();
    expect(codeOf(() => graph.addTask("a", "do A", "_default", ["a"]))).toBe("CYCLE");
  });

  it("rejects duplicate ids", () => {
    const graph = new TaskGraph();
    graph.addTask("a", "do A");
    expect(() => graph.addTask("a", "again")).toThrow('Task "a" is already declared');
    expect(codeOf(() => graph.addTask("a", "again"))).toBe("DUPLICATE_TASK");
  });

  it("reports a cycle in a declaration map", () => {
    const build = () =>
      TaskGraph.fromSpec({
        a: { description: "A", dependsOn: ["b"] },
        b: { description: "B", dependsOn: ["a"] },
      });
    expect(build).toThrow("Task graph contains a cycle: a -> b -> a");
    expect(codeOf(build)).toBe("CYCLE");
  });

  it("collapses repeated dependencies", () => {
    const graph = new TaskGraph();
    graph.addTask("a", "A");
    expect(graph.addTask("b", "B", "_default", ["a", "a"]).dependsOn).toEqual(["a"]);
  });
});

describe("getIndependentGroups", () => {
  it("partitions the graph into waves", () => {
    const waves = diamond().getIndependentGroups().map((w) => w.map((n) => n.id));
    expect(waves).toEqual([["a", "b"], ["c", "e"], ["d"]]);
  });

  it("places every node whatever its status", () => {
    const graph = diamond();
    graph.markCompleted("a");
    graph.setStatus("b", "failed");
    expect(graph.getIndependentGroups().flat()).toHaveLength(5);
  });

  it("returns no waves for an empty graph", () => {
    expect(new TaskGraph().getIndependentGroups()).toEqual([]);
  });
});

describe("getReadyTasks", () => {
  it("starts with the dependency-free nodes", () => {
    expect(diamond().getReadyTasks().map((n) => n.id)).toEqual(["a", "b"]);
  });

  it("releases dependents as dependencies complete", () => {
    const graph = diamond();
    graph.markCompleted("a");
    expect(graph.getReadyTasks().map((n) => n.id)).toEqual(["b", "e"]);
    graph.markCompleted("b");
    expect(graph.getReadyTasks().map((n) => n.id)).toEqual(["c", "e"]);
  });

  it("does not treat a failed dependency as satisfied", () => {
    const graph = diamond();
    graph.setStatus("a", "failed");
    expect(graph.getReadyTasks().map((n) => n.id)).toEqual(["b"]);
  });
});

describe("status transitions", () => {
  it("only moves forward", () => {
    const graph = diamond();
    expect(graph.setStatus("a", "running")).toBe(true);
    expect(graph.setStatus("a", "ready")).toBe(false);
    expect(graph.setStatus("a", "running")).toBe(false);
    expect(graph.markCompleted("a")).toBe(true);
    expect(graph.setStatus("a", "failed")).toBe(false);
    expect(graph.get("a")?.status).toBe("completed");
  });

  it("stamps spawn and completion times", () => {
    const graph = diamond();
    graph.setStatus("a", "spawned", 1_000);
    graph.setStatus("a", "completed", 2_500);
    expect(graph.get("a")).toMatchObject({ spawnedAt: 1_000, completedAt: 2_500 });
  });

  it("throws for an unknown id", () => {
    expect(codeOf(() => diamond().setStatus("nope", "ready"))).toBe("UNKNOWN_TASK");
  });

  it("agrees with the status helpers", () => {
    expect(canTransition("pending", "cancelled")).toBe(true);
    expect(canTransition("completed", "failed")).toBe(false);
    expect(canTransition("running", "spawned")).toBe(false);
    expect(isTerminal("cancelled")).toBe(true);
    expect(isTerminal("running")).toBe(false);
  });
});

describe("skipDownstream", () => {
  it("cancels every not-yet-spawned transitive dependent", () => {
    const graph = diamond();
    graph.setStatus("a", "failed");
    expect(graph.skipDownstream("a")).toEqual(["c", "e", "d"]);
    expect(graph.get("d")?.status).toBe("cancelled");
    expect(graph.get("b")?.status).toBe("pending");
  });

  it("leaves dependents that are already running alone", () => {
    const graph = diamond();
    graph.setStatus("e", "running");
    expect(graph.skipDownstream("a")).toEqual(["c", "d"]);
    expect(graph.get("e")?.status).toBe("running");
  });

  it("completes once every node is terminal", () => {
    const graph = diamond();
    graph.setStatus("a", "failed");
    graph.skipDownstream("a");
    expect(graph.isComplete()).toBe(false);
    graph.markCompleted("b");
    expect(graph.isComplete()).toBe(true);
  });
});

describe("dependentsOf", () => {
  it("lists direct and transitive dependents, nearest first", () => {
    const graph = diamond();
    expect(graph.dependentsOf("a")).toEqual(["c", "e", "d"]);
    expect(graph.dependentsOf("b")).toEqual(["c", "d"]);
    expect(graph.dependentsOf("d")).toEqual([]);
  });

  it("throws for an unknown id", () => {
    expect(codeOf(() => diamond().dependentsOf("zzz"))).toBe("UNKNOWN_TASK");
  });
});

describe("topologicalSort", () => {
  it("keeps declaration order when it already respects dependencies", () => {
    expect(diamond().topologicalSort().map((n) => n.id)).toEqual(["a", "b", "c", "d", "e"]);
  });

  it("puts dependencies first whatever the declaration order", () => {
    const graph = TaskGraph.fromSpec({
      d: { description: "do D", dependsOn: ["c"] },
      c: { description: "do C", dependsOn: ["a"] },
      a: { description: "do A" },
    });
    expect(graph.topologicalSort().map((n) => n.id)).toEqual(["a", "c", "d"]);
  });
});
