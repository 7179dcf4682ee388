/**
 * Minimum-cost maximum-cardinality bipartite matching, solved as a unit
 * capacity min-cost flow by successive shortest paths (Bellman-Ford, so the
 * negative residual costs on reverse edges are handled).
 *
 * Network: source → task (cost = task cost) → resource (0) → sink (0).
 * Every edge has capacity 1, so each task gets at most one resource and
 * each resource at most one task.
 */

export interface MatchingProblem {
  /** Cost of routing each task (lower is preferred). */
  readonly taskCosts: readonly number[];
  readonly resourceCount: number;
  /** Whether task `t` may be assigned resource `r`. */
  readonly feasible: (task: number, resource: number) => boolean;
}

export interface MatchingPair {
  readonly task: number;
  readonly resource: number;
}

export interface MatchingResult {
  readonly pairs: MatchingPair[];
  readonly totalCost: number;
}

interface Edge {
  readonly to: number;
  readonly rev: number;
  readonly cost: number;
  readonly forward: boolean;
  cap: number;
}

function addEdge(graph: Edge[][], from: number, to: number, cost: number): void {
  graph[from].push({ to, rev: graph[to].length, cost, cap: 1, forward: true });
  graph[to].push({ to: from, rev: graph[from].length - 1, cost: -cost, cap: 0, forward: false });
}

export function solveMinCostMatching(problem: MatchingProblem): MatchingResult {
  const taskCount = problem.taskCosts.length;
  const resourceCount = problem.resourceCount;
  const source = 0;
  const taskNode = (t: number) => 1 + t;
  const resourceNode = (r: number) => 1 + taskCount + r;
  const sink = 1 + taskCount + resourceCount;
  const nodeCount = sink + 1;

  const graph: Edge[][] = Array.from({ length: nodeCount }, () => []);
  for (let t = 0; t < taskCount; t++) {
    addEdge(graph, source, taskNode(t), problem.taskCosts[t]);
    for (let r = 0; r < resourceCount; r++) {
      if (problem.feasible(t, r)) addEdge(graph, taskNode(t), resourceNode(r), 0);
    }
  }
  for (let r = 0; r < resourceCount; r++) {
    addEdge(graph, resourceNode(r), sink, 0);
  }

  let totalCost = 0;
  for (;;) {
    const dist: number[] = new Array(nodeCount).fill(Infinity);
    const prevNode: number[] = new Array(nodeCount).fill(-1);
    const prevEdge: number[] = new Array(nodeCount).fill(-1);
    dist[source] = 0;

    // Bellman-Ford; node and edge order are fixed, so ties break deterministically
    for (let iter = 0; iter < nodeCount; iter++) {
      let updated = false;
      for (let u = 0; u < nodeCount; u++) {
        if (dist[u] === Infinity) continue;
        graph[u].forEach((e, i) => {
          if (e.cap > 0 && dist[u] + e.cost < dist[e.to]) {
            dist[e.to] = dist[u] + e.cost;
            prevNode[e.to] = u;
            prevEdge[e.to] = i;
            updated = true;
          }
        });
      }
      if (!updated) break;
    }

    if (dist[sink] === Infinity) break;

    for (let v = sink; v !== source; v = prevNode[v]) {
      const edge = graph[prevNode[v]][prevEdge[v]];
      edge.cap -= 1;
      graph[v][edge.rev].cap += 1;
    }
    totalCost += dist[sink];
  }

  const pairs: MatchingPair[] = [];
  for (let t = 0; t < taskCount; t++) {
    for (const e of graph[taskNode(t)]) {
      if (e.forward && e.cap === 0) {
        pairs.push({ task: t, resource: e.to - 1 - taskCount });
      }
    }
  }

  return { pairs, totalCost };
}
