import { ERROR_CODES } from "../types.js";
import { GraphConsumedError, GraphContractError, vertexIndexError } from "./errors.js";

/**
 * Adjacency record stored for every vertex. Degrees mirror the lengths of the
 * edge lists until the sort engine takes the graph over and starts using the
 * in-degree as scratch state.
 */
export interface Vertex {
  inDegree: number;
  outDegree: number;
  inEdges: number[];
  outEdges: number[];
}

/** Read-only view of a {@link Vertex} handed out by the public accessors. */
export interface VertexView {
  readonly inDegree: number;
  readonly outDegree: number;
  readonly inEdges: readonly number[];
  readonly outEdges: readonly number[];
}

/** Callback invoked once per item by {@link IndexGraph.fromItems}. */
export type IndexGraphItemCallback<T> = (builder: IndexGraphBuilder, item: T, index: number) => void;

/**
 * Edge builder bound to one vertex of a graph under construction. Neither
 * method checks for duplicate edges.
 */
export class IndexGraphBuilder {
  constructor(
    readonly graph: IndexGraph,
    readonly index: number,
  ) {}

  /** Adds an edge from the bound vertex to `to`. */
  addOutEdge(to: number): void {
    this.graph.addEdge(this.index, to);
  }

  /** Adds an edge from `from` to the bound vertex. */
  addInEdge(from: number): void {
    this.graph.addEdge(from, this.index);
  }
}

/**
 * Adjacency-list graph over the dense indices `0..vertexCount-1`. Each vertex
 * keeps both its incoming and outgoing edges so the graph can be walked, and
 * transposed, in either direction.
 *
 * A graph is consumed by {@link toposortOrScc}; any later call throws a
 * {@link GraphConsumedError}.
 */
export class IndexGraph implements Iterable<VertexView> {
  private vertices: Vertex[];
  private consumed = false;

  private constructor(vertices: Vertex[]) {
    this.vertices = vertices;
  }

  /** Creates a graph with `count` vertices and no edges. */
  static withVertices(count: number): IndexGraph {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new GraphContractError(
        ERROR_CODES.GRAPH_VERTEX_COUNT,
        `vertex count must be a non-negative integer, received ${count}`,
        { count },
      );
    }
    const vertices: Vertex[] = [];
    for (let index = 0; index < count; index += 1) {
      vertices.push({ inDegree: 0, outDegree: 0, inEdges: [], outEdges: [] });
    }
    return new IndexGraph(vertices);
  }

  /**
   * Builds a graph with one vertex per item. The callback runs once per item,
   * in order, with a builder bound to that item's index.
   */
  static fromItems<T>(items: readonly T[], callback: IndexGraphItemCallback<T>): IndexGraph {
    const graph = IndexGraph.withVertices(items.length);
    items.forEach((item, index) => {
      callback(new IndexGraphBuilder(graph, index), item, index);
    });
    return graph;
  }

  /** Builds a graph from out-edge lists: `lists[u]` holds the targets of `u`. */
  static fromAdjacency(lists: ReadonlyArray<readonly number[]>): IndexGraph {
    return IndexGraph.fromItems(lists, (builder, targets) => {
      for (const target of targets) {
        builder.addOutEdge(target);
      }
    });
  }

  get vertexCount(): number {
    this.assertLive("vertexCount");
    return this.vertices.length;
  }

  get edgeCount(): number {
    this.assertLive("edgeCount");
    let total = 0;
    for (const vertex of this.vertices) {
      total += vertex.outEdges.length;
    }
    return total;
  }

  /** Whether {@link toposortOrScc} already took this graph over. */
  get isConsumed(): boolean {
    return this.consumed;
  }

  vertex(index: number): VertexView {
    this.assertLive("vertex");
    return this.at(index, "vertex");
  }

  /**
   * Adds the directed edge `from -> to`. Both indices are validated before
   * anything is written, so a rejected call leaves the graph untouched.
   */
  addEdge(from: number, to: number): void {
    this.assertLive("addEdge");
    const source = this.at(from, "source");
    const target = this.at(to, "target");
    source.outDegree += 1;
    target.inDegree += 1;
    // `-0` passes the range check; store it as 0.
    source.outEdges.push(to + 0);
    target.inEdges.push(from + 0);
  }

  /** Reverses every edge in place by swapping the per-vertex lists. */
  transpose(): void {
    this.assertLive("transpose");
    for (const vertex of this.vertices) {
      const degree = vertex.inDegree;
      vertex.inDegree = vertex.outDegree;
      vertex.outDegree = degree;
      const edges = vertex.inEdges;
      vertex.inEdges = vertex.outEdges;
      vertex.outEdges = edges;
    }
  }

  /** Iterates the vertices in index order; every step re-checks that the graph is live. */
  [Symbol.iterator](): Iterator<VertexView> {
    this.assertLive("iterate");
    let index = 0;
    return {
      next: (): IteratorResult<VertexView> => {
        this.assertLive("iterate");
        const vertex = this.vertices[index];
        if (vertex === undefined) {
          return { done: true, value: undefined };
        }
        index += 1;
        return { done: false, value: vertex };
      },
    };
  }

  /**
   * Hands the vertex storage over to the caller and marks the graph as
   * consumed. Only the sort engine calls this; the returned records are
   * mutated freely afterwards.
   */
  consume(): Vertex[] {
    this.assertLive("consume");
    const vertices = this.vertices;
    this.vertices = [];
    this.consumed = true;
    return vertices;
  }

  private at(index: number, role: string): Vertex {
    const vertex = Number.isInteger(index) && index >= 0 ? this.vertices[index] : undefined;
    if (vertex === undefined) {
      throw vertexIndexError(index, this.vertices.length, role);
    }
    return vertex;
  }

  private assertLive(operation: string): void {
    if (this.consumed) {
      throw new GraphConsumedError(operation);
    }
  }
}

/** Creates a graph with `vertexCount` vertices and no edges. */
export function create(vertexCount: number): IndexGraph {
  return IndexGraph.withVertices(vertexCount);
}

/** Creates a graph from out-edge lists. */
export function createFromAdjacency(lists: ReadonlyArray<readonly number[]>): IndexGraph {
  return IndexGraph.fromAdjacency(lists);
}

/** Creates a graph with one vertex per item, see {@link IndexGraph.fromItems}. */
export function createFromItems<T>(items: readonly T[], callback: IndexGraphItemCallback<T>): IndexGraph {
  return IndexGraph.fromItems(items, callback);
}
