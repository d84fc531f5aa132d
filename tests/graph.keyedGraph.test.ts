import { describe, it } from "mocha";
import { expect } from "chai";

import { GraphConsumedError, GraphContractError } from "../src/graph/errors.js";
import { KeyedGraph, labelCodec, type IndexCodec } from "../src/graph/keyedGraph.js";
import { ERROR_CODES } from "../src/types.js";

/** Handle shaped like an arena id: a generation tag plus a slot. */
interface Handle {
  readonly arena: number;
  readonly slot: number;
}

const handleCodec: IndexCodec<Handle, number> = {
  toIndex: (handle) => handle.slot,
  fromIndex: (arena, slot) => ({ arena, slot }),
};

interface Task {
  readonly name: string;
  readonly after: Handle[];
}

describe("graph/keyedGraph", () => {
  it("maps the sorted order back through the codec tag", () => {
    const arena = 7;
    const tasks: Task[] = [
      { name: "link", after: [{ arena, slot: 1 }, { arena, slot: 2 }] },
      { name: "compile", after: [{ arena, slot: 2 }] },
      { name: "fetch", after: [] },
    ];

    const graph = KeyedGraph.fromItems(tasks, handleCodec, arena, (builder, task) => {
      for (const dependency of task.after) {
        builder.addInEdge(dependency);
      }
    });

    expect(graph.vertexCount).to.equal(3);
    expect(graph.toposortOrScc()).to.deep.equal({
      ok: true,
      order: [
        { arena: 7, slot: 2 },
        { arena: 7, slot: 1 },
        { arena: 7, slot: 0 },
      ],
    });
  });

  it("maps cyclic components back to identifiers", () => {
    const labels = ["a", "b", "c"];
    const graph = KeyedGraph.fromItems(labels, labelCodec(labels), labels, (builder, label) => {
      if (label === "a") {
        builder.addOutEdge("b");
      }
      if (label === "b") {
        builder.addOutEdge("a");
        builder.addOutEdge("c");
      }
    });

    expect(graph.toposortOrScc()).to.deep.equal({ ok: false, components: [["b", "a"]] });
  });

  it("transposes the underlying graph", () => {
    const labels = ["first", "second"];
    const graph = KeyedGraph.fromItems(labels, labelCodec(labels), labels, (builder, label) => {
      if (label === "first") {
        builder.addOutEdge("second");
      }
    });
    graph.transpose();

    expect(graph.toposortOrScc()).to.deep.equal({ ok: true, order: ["second", "first"] });
  });

  it("cannot be sorted twice", () => {
    const labels = ["solo"];
    const graph = KeyedGraph.fromItems(labels, labelCodec(labels), labels, () => undefined);
    graph.toposortOrScc();

    expect(() => graph.toposortOrScc()).to.throw(GraphConsumedError);
    expect(graph.graph.isConsumed).to.equal(true);
  });

  describe("labelCodec", () => {
    it("rejects unknown labels", () => {
      const codec = labelCodec(["x"]);
      expect(() => codec.toIndex("y"))
        .to.throw(GraphContractError)
        .with.property("code", ERROR_CODES.GRAPH_UNKNOWN_LABEL);
    });

    it("rejects duplicate labels", () => {
      expect(() => labelCodec(["x", "y", "x"]))
        .to.throw(GraphContractError, "duplicate vertex label 'x'")
        .with.property("code", ERROR_CODES.GRAPH_DUPLICATE_LABEL);
    });

    it("rejects indices outside the label table", () => {
      const labels = ["x"];
      expect(() => labelCodec(labels).fromIndex(labels, 3))
        .to.throw(GraphContractError)
        .with.property("code", ERROR_CODES.GRAPH_INDEX);
    });
  });
});
