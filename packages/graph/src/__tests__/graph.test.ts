import { describe, it, expect, afterEach } from "vitest";
import { config, createLogger, type LogLevel } from "@graphfold/core";
import {
  bigintKeys,
  createDigraph,
  createGraph,
  InvalidEdgeError,
  numberKeys,
  PartialConnectionError,
  PreconditionError,
  SelfLoopError,
  stringKeys,
  type GraphKind,
  WeightMismatchError,
} from "../index.js";
import { corruptible, lcg } from "./fixtures.js";

afterEach(() => {
  config.reset();
});

// ---------------------------------------------------------------------------
// Construction & queries
// ---------------------------------------------------------------------------

describe("graph construction", () => {
  it("creates a directed graph", () => {
    const g = createDigraph(numberKeys, [
      [1, 2],
      [2, 3],
    ]);
    expect(g.kind).toBe("directed");
    expect(g.directed).toBe(true);
    expect(g.size).toBe(3);
    expect(g.countEdge()).toBe(2);
  });

  it("creates an undirected graph", () => {
    const g = createGraph(numberKeys, [[1, 2]]);
    expect(g.directed).toBe(false);
    expect(g.edges(1)).toEqual([{ tail: 1, head: 2, weight: 1, distance: 1 }]);
    expect(g.edges(2)).toEqual([{ tail: 2, head: 1, weight: 1, distance: 1 }]);
  });

  it("starts empty", () => {
    const g = createGraph(stringKeys);
    expect(g.size).toBe(0);
    expect(g.vertices()).toEqual([]);
    expect(g.totalWeight()).toBe(0);
  });

  it("lists vertices in creation order", () => {
    const g = createDigraph(stringKeys, [
      ["m", "a"],
      ["z", "m"],
    ]);
    expect(g.vertices()).toEqual(["m", "a", "z"]);
    expect(g.nonEmptyVertices()).toEqual(["m", "z"]);
  });

  it("counts an undirected pair once", () => {
    const edges: Array<[number, number, number]> = [
      [1, 2, 1],
      [2, 3, 2],
    ];
    const undirected = createGraph(numberKeys, edges);
    const directed = createDigraph(numberKeys, edges);
    expect(undirected.countEdge()).toBe(2);
    expect(undirected.totalWeight()).toBe(3);
    expect(directed.countEdge()).toBe(2);
    expect(directed.totalWeight()).toBe(3);
  });

  it("returns copies of edges", () => {
    const g = createDigraph(numberKeys, [[1, 2, 4, 0.5]]);
    expect(g.edge(1, 2)).toEqual({ tail: 1, head: 2, weight: 4, distance: 0.5 });
    expect(g.edge(2, 1)).toBeUndefined();
    expect(g.edge(7, 1)).toBeUndefined();
    expect(g.edges(7)).toEqual([]);
  });

  it("merges repeated factory tuples", () => {
    const g = createGraph(numberKeys, [
      [1, 2],
      [2, 1],
    ]);
    expect(g.edge(1, 2)?.weight).toBe(2);
    expect(g.countEdge()).toBe(1);
  });
});

describe("key instances", () => {
  it("orders bigint keys numerically", () => {
    const g = createDigraph(bigintKeys, [
      [1n, 10n],
      [1n, 9n],
    ]);
    expect(g.edges(1n).map((e) => e.head)).toEqual([9n, 10n]);
  });

  it("collapses and renders bigint keys", () => {
    const g = createGraph(bigintKeys, [
      [1n, 2n],
      [2n, 3n],
      [1n, 3n],
    ]);
    expect(g.collapse(1n, 2n)).toBe(1);
    expect(g.edge(2n, 3n)?.weight).toBe(2);
    expect(g.dump()).toBe("1n [unvisited]\n2n [unvisited] -> 3n (2, 1)\n3n [unvisited] -> 2n (2, 1)");
  });

  it("keeps NaN apart from every other number key", () => {
    const g = createDigraph(numberKeys, [[1, 2]]);
    expect(g.hasVertex(Number.NaN)).toBe(false);
    expect(g.edge(1, Number.NaN)).toBeUndefined();
    expect(g.disconnect(1, Number.NaN)).toBe(0);
    expect(g.edge(1, 2)?.weight).toBe(1);

    expect(g.addEdge(1, Number.NaN)).toBe(1);
    expect(g.edges(1).map((e) => e.head)).toEqual([2, Number.NaN]);
    expect(g.disconnect(1, Number.NaN)).toBe(1);
    expect(g.edge(1, 2)?.weight).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Connectivity
// ---------------------------------------------------------------------------

describe("isConnected", () => {
  it("follows edge direction in a directed graph", () => {
    const g = createDigraph(numberKeys, [[1, 2]]);
    expect(g.isConnected(1, 2)).toBe(true);
    expect(g.isConnected(2, 1)).toBe(false);
  });

  it("treats a vertex as connected to itself", () => {
    const g = createDigraph(numberKeys, [[1, 2]]);
    expect(g.isConnected(1, 1)).toBe(true);
    expect(g.isConnected(5, 5)).toBe(true);
  });

  it("is false for unknown vertices", () => {
    const g = createGraph(numberKeys, [[1, 2]]);
    expect(g.isConnected(1, 99)).toBe(false);
    expect(g.connectionStatus(98, 99)).toBe("disconnected");
  });

  it("throws on a half-connected undirected pair", () => {
    const g = corruptible("undirected", [[1, 2]]);
    g.dropHalf(2, 1);
    expect(g.connectionStatus(1, 2)).toBe("partial");
    expect(g.connectionStatus(2, 1)).toBe("partial");
    expect(() => g.isConnected(1, 2)).toThrow(PartialConnectionError);
    expect(() => g.isConnected(2, 1)).toThrow("Vertices 2 -> 1 are only partially connected");
  });
});

describe("connect", () => {
  it("adds an edge and reports success", () => {
    const g = createDigraph(numberKeys);
    expect(g.connect(1, 2, 3, 0.25)).toBe(true);
    expect(g.edge(1, 2)).toEqual({ tail: 1, head: 2, weight: 3, distance: 0.25 });
    expect(g.size).toBe(2);
  });

  it("leaves an existing edge untouched", () => {
    const g = createGraph(numberKeys);
    g.connect(1, 2);
    expect(g.connect(1, 2, 4)).toBe(false);
    expect(g.connect(2, 1)).toBe(false);
    expect(g.edge(1, 2)?.weight).toBe(1);
    expect(g.edge(2, 1)?.weight).toBe(1);
  });

  it("rejects self-loops", () => {
    const g = createDigraph(numberKeys);
    expect(() => g.connect(1, 1)).toThrow(SelfLoopError);
    expect(() => g.addEdge(1, 1)).toThrow("Self-loop on vertex 1 is not allowed");
    expect(g.size).toBe(0);
  });

  it("rejects invalid weights and distances", () => {
    const g = createDigraph(numberKeys);
    expect(() => g.connect(1, 2, 0)).toThrow(InvalidEdgeError);
    expect(() => g.connect(1, 2, 1.5)).toThrow(InvalidEdgeError);
    expect(() => g.connect(1, 2, 1, Number.POSITIVE_INFINITY)).toThrow(
      "Edge 1 -> 2 needs a finite distance, got Infinity"
    );
    expect(() => g.connect(1, 2, -1)).toThrow(PreconditionError);
    expect(g.size).toBe(0);
  });

  it("refuses to repair a partial connection", () => {
    const g = corruptible("undirected", [[1, 2]]);
    g.dropHalf(1, 2);
    expect(() => g.connect(1, 2)).toThrow(PartialConnectionError);
  });
});

describe("addEdge", () => {
  it("accumulates parallel edges", () => {
    const g = createGraph(numberKeys);
    expect(g.addEdge(1, 2, 2)).toBe(2);
    expect(g.addEdge(1, 2, 3)).toBe(5);
    expect(g.edge(1, 2)?.weight).toBe(5);
    expect(g.edge(2, 1)?.weight).toBe(5);
  });

  it("applies the configured distance policy", () => {
    config.set({ graph: { distancePolicy: "min" } });
    const g = createDigraph(numberKeys, [
      [1, 2, 1, 5],
      [1, 2, 1, 3],
    ]);
    expect(g.edge(1, 2)).toEqual({ tail: 1, head: 2, weight: 2, distance: 3 });
  });

  it("prefers the distance policy option over configuration", () => {
    config.set({ graph: { distancePolicy: "min" } });
    const g = createDigraph(
      numberKeys,
      [
        [1, 2, 1, 5],
        [1, 2, 1, 3],
      ],
      { distancePolicy: "first" }
    );
    expect(g.edge(1, 2)?.distance).toBe(5);
  });
});

describe("disconnect", () => {
  it("removes both halves of an undirected edge", () => {
    const g = createGraph(numberKeys, [[1, 2, 3]]);
    expect(g.disconnect(2, 1)).toBe(3);
    expect(g.edges(1)).toEqual([]);
    expect(g.edges(2)).toEqual([]);
    expect(g.size).toBe(2);
  });

  it("removes only the given direction of a directed edge", () => {
    const g = createDigraph(numberKeys, [
      [1, 2],
      [2, 1, 4],
    ]);
    expect(g.disconnect(1, 2)).toBe(1);
    expect(g.edge(2, 1)?.weight).toBe(4);
  });

  it("returns 0 when there is no edge", () => {
    const g = createGraph(numberKeys, [[1, 2]]);
    expect(g.disconnect(1, 3)).toBe(0);
    expect(g.disconnect(8, 9)).toBe(0);
  });

  it("refuses mismatched halves without removing either", () => {
    const g = corruptible("undirected", [[1, 2]]);
    g.setHalfWeight(2, 1, 3);
    expect(() => g.disconnect(1, 2)).toThrow(WeightMismatchError);
    expect(() => g.disconnect(1, 2)).toThrow("Edge 1 -> 2 has weight 1 but its mirror has 3");
    expect(g.edge(1, 2)?.weight).toBe(1);
    expect(g.edge(2, 1)?.weight).toBe(3);
  });

  it("treats a missing half as weight 0", () => {
    const g = corruptible("undirected", [[1, 2]]);
    g.dropHalf(2, 1);
    expect(() => g.disconnect(1, 2)).toThrow("Edge 1 -> 2 has weight 1 but its mirror has 0");
  });
});

// ---------------------------------------------------------------------------
// Contraction
// ---------------------------------------------------------------------------

describe("collapse (undirected)", () => {
  it("folds a triangle into a double edge", () => {
    const g = createGraph(numberKeys, [
      [1, 2],
      [2, 3],
      [1, 3],
    ]);
    expect(g.totalWeight()).toBe(3);
    expect(g.collapse(1, 2)).toBe(1);
    expect(g.edge(2, 3)?.weight).toBe(2);
    expect(g.edge(3, 2)?.weight).toBe(2);
    expect(g.edges(1)).toEqual([]);
    expect(g.edge(3, 1)).toBeUndefined();
    expect(g.totalWeight()).toBe(2);
    expect(g.hasVertex(1)).toBe(true);
    expect(g.nonEmptyVertices()).toEqual([2, 3]);
  });

  it("creates the destination when it is new", () => {
    const g = createGraph(numberKeys, [[1, 2]]);
    expect(g.collapse(1, 9)).toBe(0);
    expect(g.vertices()).toEqual([1, 2, 9]);
    expect(g.edge(9, 2)?.weight).toBe(1);
    expect(g.edge(2, 9)?.weight).toBe(1);
    expect(g.edge(2, 1)).toBeUndefined();
  });

  it("is a no-op for an unknown source", () => {
    const g = createGraph(numberKeys, [[1, 2]]);
    expect(g.collapse(7, 1)).toBe(0);
    expect(g.size).toBe(2);
    expect(g.totalWeight()).toBe(1);
  });

  it("rejects collapsing a vertex into itself", () => {
    const g = createGraph(numberKeys, [[1, 2]]);
    expect(() => g.collapse(1, 1)).toThrow(PreconditionError);
  });

  it("conserves weight minus the dropped loop", () => {
    const g = createGraph(numberKeys, [
      [1, 2, 2],
      [1, 3, 1],
      [2, 3, 4],
      [3, 4, 1],
      [1, 4, 3],
    ]);
    const before = g.totalWeight();
    const dropped = g.collapse(1, 3);
    expect(dropped).toBe(1);
    expect(g.totalWeight()).toBe(before - dropped);
    expect(g.edge(3, 2)?.weight).toBe(6);
    expect(g.edge(3, 4)?.weight).toBe(4);
    expect(g.verify().valid).toBe(true);
  });

  it("carries distances and merges them by policy", () => {
    const g = createGraph(
      numberKeys,
      [
        [1, 3, 1, 4],
        [2, 3, 1, 7],
      ],
      { distancePolicy: "min" }
    );
    g.collapse(1, 2);
    expect(g.edge(2, 3)).toEqual({ tail: 2, head: 3, weight: 2, distance: 4 });
    expect(g.edge(3, 2)).toEqual({ tail: 3, head: 2, weight: 2, distance: 4 });
  });
});

describe("collapse (directed)", () => {
  it("reroutes outgoing and incoming edges", () => {
    const g = createDigraph(numberKeys, [
      [1, 2],
      [2, 1, 2],
      [1, 3],
      [4, 1],
      [4, 2],
      [3, 4],
    ]);
    expect(g.totalWeight()).toBe(7);
    expect(g.collapse(1, 2)).toBe(3);
    expect(g.edges(1)).toEqual([]);
    expect(g.edges(2)).toEqual([{ tail: 2, head: 3, weight: 1, distance: 1 }]);
    expect(g.edges(4)).toEqual([{ tail: 4, head: 2, weight: 2, distance: 1 }]);
    expect(g.edges(3)).toEqual([{ tail: 3, head: 4, weight: 1, distance: 1 }]);
    expect(g.totalWeight()).toBe(4);
  });

  it("keeps the first distance by default", () => {
    const g = createDigraph(numberKeys, [
      [1, 3, 1, 4],
      [2, 3, 1, 7],
    ]);
    g.collapse(1, 2);
    expect(g.edge(2, 3)).toEqual({ tail: 2, head: 3, weight: 2, distance: 7 });
  });
});

describe("random mutation sequences", () => {
  function run(kind: GraphKind, seed: number): void {
    const random = lcg(seed);
    const pick = (n: number) => Math.floor(random() * n);
    const g = kind === "directed" ? createDigraph(numberKeys) : createGraph(numberKeys);
    let expected = 0;

    for (let step = 0; step < 300; step++) {
      const op = pick(4);
      const a = pick(8);
      const b = pick(8);
      if (a === b) continue;

      if (op === 0) {
        if (g.connect(a, b)) expected += 1;
      } else if (op === 1) {
        const weight = 1 + pick(3);
        g.addEdge(a, b, weight);
        expected += weight;
      } else if (op === 2) {
        expected -= g.disconnect(a, b);
      } else {
        expected -= g.collapse(a, b);
      }

      expect(g.verify()).toEqual({ valid: true, violations: [] });
      expect(g.totalWeight()).toBe(expected);
    }
  }

  it("keep an undirected graph consistent after every step", () => {
    run("undirected", 11);
  });

  it("keep a directed graph consistent after every step", () => {
    run("directed", 29);
  });
});

// ---------------------------------------------------------------------------
// Reversal & cloning
// ---------------------------------------------------------------------------

describe("reverse", () => {
  it("flips every directed edge and keeps all vertices", () => {
    const g = createDigraph(numberKeys, [
      [1, 2, 2, 0.5],
      [2, 3],
    ]);
    g.connect(4, 5);
    g.disconnect(4, 5);
    const r = g.reverse();
    expect(r.vertices()).toEqual([1, 2, 3, 4, 5]);
    expect(r.edge(2, 1)).toEqual({ tail: 2, head: 1, weight: 2, distance: 0.5 });
    expect(r.edge(3, 2)?.weight).toBe(1);
    expect(r.edge(1, 2)).toBeUndefined();
  });

  it("round-trips to the same edges", () => {
    const g = createDigraph(numberKeys, [
      [3, 1],
      [1, 2, 2],
      [2, 3],
      [1, 3, 5],
    ]);
    const back = g.reverse().reverse();
    for (const v of g.vertices()) {
      expect(back.edges(v)).toEqual(g.edges(v));
    }
  });

  it("leaves an undirected graph's edges unchanged", () => {
    const g = createGraph(numberKeys, [
      [1, 2],
      [2, 3, 4],
    ]);
    const r = g.reverse();
    expect(r.directed).toBe(false);
    expect(r.edges(2)).toEqual(g.edges(2));
    expect(r.verify().valid).toBe(true);
  });
});

describe("clone", () => {
  it("is independent of the original", () => {
    const g = createGraph(numberKeys, [
      [1, 2],
      [2, 3],
    ]);
    const copy = g.clone();
    copy.collapse(1, 2);
    expect(g.edge(1, 2)?.weight).toBe(1);
    expect(copy.edge(1, 2)).toBeUndefined();
    expect(copy.vertices()).toEqual([1, 2, 3]);
  });
});

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

describe("mutation logging", () => {
  function captured() {
    const lines: Array<[LogLevel, string]> = [];
    const logger = createLogger("test", { writer: (level, line) => lines.push([level, line]) });
    return { lines, logger };
  }

  it("logs mutations at debug level", () => {
    config.set({ debug: true });
    const { lines, logger } = captured();
    const g = createGraph(numberKeys, [], { logger });
    g.connect(1, 2);
    g.connect(2, 3);
    g.collapse(1, 2);
    expect(lines).toEqual([
      ["debug", "[graphfold:test] DEBUG: connect tail=1 head=2 weight=1 distance=1"],
      ["debug", "[graphfold:test] DEBUG: connect tail=2 head=3 weight=1 distance=1"],
      ["debug", "[graphfold:test] DEBUG: collapse src=1 dst=2 dropped=1"],
    ]);
  });

  it("stays quiet without debug", () => {
    const { lines, logger } = captured();
    const g = createGraph(numberKeys, [], { logger });
    g.connect(1, 2);
    g.disconnect(1, 2);
    expect(lines).toEqual([]);
  });
});
