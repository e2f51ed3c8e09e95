import { describe, expect, it } from "vitest";
import { ConfigError, CycleError, DuplicateIdError, UnknownDependencyError, ValidationError } from "../src/errors.js";
import { TaskGraph } from "../src/planner/task-graph.js";
import type { TaskInit } from "../src/planner/types.js";

const task = (id: string, dependsOn: string[] = [], priority = 0): TaskInit => ({
  id,
  spec: { description: `do ${id}` },
  dependsOn,
  priority,
});

const ok = (payload: string) => ({ payload, producedBy: ["agent"], support: 1 });

describe("TaskGraph.addTask", () => {
  it("adds tasks as ready when they have no dependencies", () => {
    const graph = new TaskGraph();
    graph.addTask(task("a"));
    graph.addTask(task("b", ["a"]));

    expect(graph.get("a").status).toBe("ready");
    expect(graph.get("b").status).toBe("pending");
    expect(graph.size).toBe(2);
  });

  it("throws DuplicateIdError for a known id", () => {
    const graph = new TaskGraph();
    graph.addTask(task("a"));
    expect(() => graph.addTask(task("a"))).toThrow(DuplicateIdError);
  });

  it("rejects invalid retry and consensus limits without changing the graph", () => {
    const graph = new TaskGraph();
    expect(() => graph.addTask({ ...task("a"), consensus: 1.5 })).toThrow(
      'Task "a": fault tolerance must be a non-negative integer, got 1.5',
    );
    expect(() => graph.addTask({ ...task("a"), consensus: -1 })).toThrow(ConfigError);
    expect(() => graph.addTask({ ...task("a"), maxRetries: -2 })).toThrow(ConfigError);
    expect(graph.size).toBe(0);
    expect(graph.addTask({ ...task("a"), consensus: "none", maxRetries: 0 }).status).toBe("ready");
  });

  it("throws CycleError on self-dependency", () => {
    const graph = new TaskGraph();
    expect(() => graph.addTask(task("a", ["a"]))).toThrow(CycleError);
  });

  it("throws CycleError when a new task closes a loop through forward references", () => {
    const graph = new TaskGraph();
    graph.addTask(task("b", ["a"]));
    graph.addTask(task("c", ["b"]));

    let caught: unknown;
    try {
      graph.addTask(task("a", ["c"]));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CycleError);
    expect(caught instanceof CycleError && caught.path).toEqual(["a", "b", "c", "a"]);
    expect(graph.has("a")).toBe(false);
  });

  it("leaves the graph unchanged when a cycle is rejected", () => {
    const graph = new TaskGraph();
    graph.addTask(task("b", ["a"]));
    expect(() => graph.addTask(task("a", ["b"]))).toThrow(CycleError);
    expect(graph.size).toBe(1);
    expect(graph.dependentsOf("a")).toEqual(["b"]);
  });

  it("accepts an explicit dependency list over the init's own", () => {
    const graph = new TaskGraph();
    graph.addTask(task("a"));
    graph.addTask(task("b"), ["a"]);
    expect(graph.get("b").dependsOn).toEqual(["a"]);
    expect(graph.get("b").status).toBe("pending");
  });
});

describe("TaskGraph.fromTasks", () => {
  it("builds from tasks listed in any order", () => {
    const graph = TaskGraph.fromTasks([task("c", ["a", "b"]), task("a"), task("b", ["a"])]);
    expect(graph.readyTasks().map((t) => t.id)).toEqual(["a"]);
  });

  it("throws on a missing dependency", () => {
    expect(() => TaskGraph.fromTasks([task("a", ["nonexistent"])])).toThrow(UnknownDependencyError);
    expect(() => TaskGraph.fromTasks([task("a", ["nonexistent"])])).toThrow(
      'Task "a" depends on unknown task "nonexistent"',
    );
  });

  it("throws on a cycle", () => {
    expect(() => TaskGraph.fromTasks([task("a", ["b"]), task("b", ["a"])])).toThrow("cycle");
  });
});

describe("readyTasks", () => {
  it("orders by descending priority, then ascending id", () => {
    const graph = TaskGraph.fromTasks([
      task("b", [], 1),
      task("d", [], 5),
      task("a", [], 1),
      task("c", [], 5),
    ]);
    expect(graph.readyTasks().map((t) => t.id)).toEqual(["c", "d", "a", "b"]);
  });

  it("excludes tasks with unmet dependencies and tasks already running", () => {
    const graph = TaskGraph.fromTasks([task("a"), task("b"), task("c", ["a", "b"])]);
    graph.markRunning("a");
    expect(graph.readyTasks().map((t) => t.id)).toEqual(["b"]);
  });
});

describe("markSucceeded", () => {
  it("promotes dependents once every dependency has succeeded", () => {
    const graph = TaskGraph.fromTasks([task("a"), task("b"), task("c", ["a", "b"])]);
    graph.markRunning("a");
    expect(graph.markSucceeded("a", ok("A"))).toEqual([]);
    expect(graph.get("c").status).toBe("pending");

    graph.markRunning("b");
    const promoted = graph.markSucceeded("b", ok("B"));
    expect(promoted.map((t) => t.id)).toEqual(["c"]);
    expect(graph.get("c").status).toBe("ready");
    expect(graph.get("a").result?.payload).toBe("A");
  });

  it("rejects a transition from a task that is not running", () => {
    const graph = TaskGraph.fromTasks([task("a")]);
    expect(() => graph.markSucceeded("a", ok("A"))).toThrow(ValidationError);
  });

  it("accepts completion from awaiting-consensus", () => {
    const graph = TaskGraph.fromTasks([task("a")]);
    graph.markRunning("a");
    graph.markAwaitingConsensus("a");
    graph.markSucceeded("a", ok("A"));
    expect(graph.get("a").status).toBe("succeeded");
  });
});

describe("markFailed", () => {
  it("fails transitive dependents with UpstreamFailure and leaves independent tasks alone", () => {
    const graph = TaskGraph.fromTasks([task("a"), task("b", ["a"]), task("c", ["b"]), task("d")]);
    graph.markRunning("a");

    const downstream = graph.markFailed("a", { reason: "AgentFailure", detail: "boom" });

    expect(downstream).toEqual(["b", "c"]);
    expect(graph.get("a").failure).toEqual({ reason: "AgentFailure", detail: "boom" });
    expect(graph.get("b").failure?.reason).toBe("UpstreamFailure");
    expect(graph.get("c").status).toBe("failed");
    expect(graph.get("c").failure?.detail).toBe('Dependency "a" failed');
    expect(graph.get("d").status).toBe("ready");
  });

  it("throws for a task that is already terminal", () => {
    const graph = TaskGraph.fromTasks([task("a")]);
    graph.markRunning("a");
    graph.markSucceeded("a", ok("A"));
    expect(() => graph.markFailed("a", { reason: "AgentFailure", detail: "late" })).toThrow("already succeeded");
  });
});

describe("recordRetry", () => {
  it("returns the task to running and counts the retry", () => {
    const graph = TaskGraph.fromTasks([task("a")]);
    graph.markRunning("a");
    graph.markAwaitingConsensus("a");
    graph.recordRetry("a");
    expect(graph.get("a").status).toBe("running");
    expect(graph.get("a").retryCount).toBe(1);
  });
});

describe("topologicalOrder", () => {
  it("returns dependencies before dependents", () => {
    const graph = TaskGraph.fromTasks([task("c", ["a", "b"]), task("a"), task("b", ["a"])]);
    expect(graph.topologicalOrder().map((t) => t.id)).toEqual(["a", "b", "c"]);
  });

  it("prefers higher priority among available tasks", () => {
    const graph = TaskGraph.fromTasks([task("x", [], 1), task("y", [], 9), task("z", ["x"], 0)]);
    expect(graph.topologicalOrder().map((t) => t.id)).toEqual(["y", "x", "z"]);
  });
});

describe("isComplete and cancelRemaining", () => {
  it("cancels every non-terminal task without upstream propagation", () => {
    const graph = TaskGraph.fromTasks([task("a"), task("b", ["a"]), task("c")]);
    graph.markRunning("c");
    graph.markSucceeded("c", ok("C"));
    expect(graph.isComplete()).toBe(false);

    expect(graph.cancelRemaining()).toEqual(["a", "b"]);
    expect(graph.get("b").failure).toEqual({ reason: "Cancelled", detail: "Run cancelled" });
    expect(graph.get("c").status).toBe("succeeded");
    expect(graph.isComplete()).toBe(true);
  });
});

describe("snapshot", () => {
  it("returns copies that do not alias graph state", () => {
    const graph = TaskGraph.fromTasks([task("a")]);
    const [copy] = graph.snapshot();
    copy.status = "failed";
    expect(graph.get("a").status).toBe("ready");
  });
});
