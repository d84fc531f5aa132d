import { ERROR_CODES } from "../types.js";
import { GraphContractError } from "./errors.js";
import { IndexGraph } from "./indexGraph.js";
import { toposortOrScc, type ToposortOptions, type ToposortResult } from "./toposort.js";

/**
 * Pair of pure functions translating caller-owned identifiers to dense vertex
 * indices and back. `Tag` carries whatever the identifier scheme needs to
 * rebuild an identifier from an index (an arena id, a generation, a table).
 */
export interface IndexCodec<Id, Tag> {
  toIndex(id: Id): number;
  fromIndex(tag: Tag, index: number): Id;
}

/** Callback invoked once per item by {@link KeyedGraph.fromItems}. */
export type KeyedGraphItemCallback<T, Id> = (
  builder: KeyedGraphBuilder<Id>,
  item: T,
  index: number,
) => void;

/** Edge builder bound to one item, addressing the other end by identifier. */
export class KeyedGraphBuilder<Id> {
  constructor(
    private readonly graph: IndexGraph,
    private readonly toIndex: (id: Id) => number,
    readonly index: number,
  ) {}

  /** Adds an edge from the bound item to `id`. */
  addOutEdge(id: Id): void {
    this.graph.addEdge(this.index, this.toIndex(id));
  }

  /** Adds an edge from `id` to the bound item. */
  addInEdge(id: Id): void {
    this.graph.addEdge(this.toIndex(id), this.index);
  }
}

/**
 * Graph over items keyed by opaque identifiers. Items occupy the dense
 * indices matching their position; results come back as identifiers rebuilt
 * through the codec.
 */
export class KeyedGraph<Id, Tag> {
  private constructor(
    readonly graph: IndexGraph,
    private readonly codec: IndexCodec<Id, Tag>,
    readonly tag: Tag,
  ) {}

  static fromItems<T, Id, Tag>(
    items: readonly T[],
    codec: IndexCodec<Id, Tag>,
    tag: Tag,
    callback: KeyedGraphItemCallback<T, Id>,
  ): KeyedGraph<Id, Tag> {
    const toIndex = (id: Id): number => codec.toIndex(id);
    const graph = IndexGraph.fromItems(items, (builder, item, index) => {
      callback(new KeyedGraphBuilder(builder.graph, toIndex, index), item, index);
    });
    return new KeyedGraph(graph, codec, tag);
  }

  get vertexCount(): number {
    return this.graph.vertexCount;
  }

  transpose(): void {
    this.graph.transpose();
  }

  /** Consumes the underlying graph, see {@link toposortOrScc}. */
  toposortOrScc(options: ToposortOptions = {}): ToposortResult<Id> {
    const result = toposortOrScc(this.graph, options);
    const toId = (index: number): Id => this.codec.fromIndex(this.tag, index);
    if (result.ok) {
      return { ok: true, order: result.order.map(toId) };
    }
    return { ok: false, components: result.components.map((component) => component.map(toId)) };
  }
}

/**
 * Codec for string labels. The tag is the label table itself, so results map
 * back to the labels the graph was built from.
 */
export function labelCodec(labels: readonly string[]): IndexCodec<string, readonly string[]> {
  const positions = new Map<string, number>();
  labels.forEach((label, index) => {
    if (positions.has(label)) {
      throw new GraphContractError(ERROR_CODES.GRAPH_DUPLICATE_LABEL, `duplicate vertex label '${label}'`, {
        label,
        index,
      });
    }
    positions.set(label, index);
  });

  return {
    toIndex(label) {
      const index = positions.get(label);
      if (index === undefined) {
        throw new GraphContractError(ERROR_CODES.GRAPH_UNKNOWN_LABEL, `unknown vertex label '${label}'`, { label });
      }
      return index;
    },
    fromIndex(table, index) {
      const label = table[index];
      if (label === undefined) {
        throw new GraphContractError(
          ERROR_CODES.GRAPH_INDEX,
          `index ${index} has no label in a table of ${table.length} labels`,
          { index, labels: table.length },
        );
      }
      return label;
    },
  };
}
