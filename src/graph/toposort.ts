import type { StructuredLogger } from "../logger.js";
import { vertexIndexError } from "./errors.js";
import type { IndexGraph, Vertex } from "./indexGraph.js";

/**
 * Outcome of {@link toposortOrScc}. A cyclic graph is an expected outcome,
 * not an exception: callers branch on `ok` to report dependency cycles.
 */
export type ToposortResult<T = number> =
  | { ok: true; order: T[] }
  | { ok: false; components: T[][] };

export interface ToposortOptions {
  /** Receives one `debug` entry describing the outcome. */
  readonly logger?: StructuredLogger;
}

/** Per-vertex traversal state shared by both DFS passes of the SCC phase. */
enum TraversalState {
  Unvisited = 0,
  Discovered = 1,
  Finalized = 2,
}

/** Explicit DFS stack frame: the vertex and the next edge to follow. */
interface Frame {
  vertex: number;
  edge: number;
}

/**
 * Sorts the graph topologically with Kahn's algorithm. When a cycle prevents
 * a complete order, falls back to Kosaraju's algorithm and returns the
 * strongly connected components that contain a cycle. Vertices that are not
 * part of any cycle never appear in `components`; a self-loop forms a
 * one-vertex component.
 *
 * Runs in `O(V + E)` time with `O(V)` additional space. The graph is consumed:
 * its in-degree counters serve as Kahn's scratch state, so any later use of
 * `graph` throws.
 *
 * The order of the components and of the vertices inside each component
 * follows the traversal and is stable for a fixed edge insertion order; only
 * the grouping itself is meaningful.
 */
export function toposortOrScc(graph: IndexGraph, options: ToposortOptions = {}): ToposortResult {
  const vertices = graph.consume();
  const order = kahnOrder(vertices);

  if (order.length === vertices.length) {
    options.logger?.debug("graph_toposort_completed", { vertices: vertices.length });
    return { ok: true, order };
  }

  const state = new Uint8Array(vertices.length);
  const finished = forwardFinishOrder(vertices, state);
  const components = collectComponents(vertices, state, finished);

  options.logger?.debug("graph_cycles_detected", {
    vertices: vertices.length,
    sorted: order.length,
    components: components.length,
  });
  return { ok: false, components };
}

function vertexAt(vertices: Vertex[], index: number): Vertex {
  const vertex = vertices[index];
  if (vertex === undefined) {
    throw vertexIndexError(index, vertices.length, "edge");
  }
  return vertex;
}

/**
 * Kahn's algorithm. The FIFO queue doubles as the result: every enqueued
 * vertex is emitted exactly once, in queue order.
 */
function kahnOrder(vertices: Vertex[]): number[] {
  const queue: number[] = [];
  vertices.forEach((vertex, index) => {
    if (vertex.inDegree === 0) {
      queue.push(index);
    }
  });

  // The array iterator also reaches entries appended while the loop runs.
  for (const index of queue) {
    for (const next of vertexAt(vertices, index).outEdges) {
      const target = vertexAt(vertices, next);
      target.inDegree -= 1;
      if (target.inDegree === 0) {
        queue.push(next);
      }
    }
  }

  return queue;
}

/**
 * First Kosaraju pass: iterative DFS along out-edges recording vertices in
 * post-order. Vertex 0 is the first root; vertices it cannot reach start
 * further searches in index order.
 */
function forwardFinishOrder(vertices: Vertex[], state: Uint8Array): number[] {
  const finished: number[] = [];
  const stack: Frame[] = [];

  for (let root = 0; root < vertices.length; root += 1) {
    if (state[root] !== TraversalState.Unvisited) {
      continue;
    }
    state[root] = TraversalState.Discovered;
    stack.push({ vertex: root, edge: 0 });

    for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
      const next = vertexAt(vertices, frame.vertex).outEdges[frame.edge];
      if (next === undefined) {
        finished.push(frame.vertex);
        continue;
      }
      frame.edge += 1;
      stack.push(frame);
      if (state[next] === TraversalState.Unvisited) {
        state[next] = TraversalState.Discovered;
        stack.push({ vertex: next, edge: 0 });
      }
    }
  }

  return finished;
}

/**
 * Second Kosaraju pass: reverse DFS along in-edges from each root, latest
 * finisher first. A root only joins its own component when an in-edge leads
 * back to it, which is what separates cyclic components from lone vertices.
 */
function collectComponents(vertices: Vertex[], state: Uint8Array, finished: number[]): number[][] {
  const components: number[][] = [];
  const stack: Frame[] = [];

  for (const root of finished.reverse()) {
    if (state[root] === TraversalState.Finalized) {
      continue;
    }

    const component: number[] = [];
    stack.push({ vertex: root, edge: 0 });

    for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
      const next = vertexAt(vertices, frame.vertex).inEdges[frame.edge];
      if (next === undefined) {
        continue;
      }
      frame.edge += 1;
      stack.push(frame);
      if (state[next] === TraversalState.Discovered) {
        state[next] = TraversalState.Finalized;
        component.push(next);
        stack.push({ vertex: next, edge: 0 });
      }
    }

    if (state[root] === TraversalState.Finalized) {
      components.push(component);
    } else {
      state[root] = TraversalState.Finalized;
    }
  }

  return components;
}
