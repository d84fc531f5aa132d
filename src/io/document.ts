import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { IndexGraph } from "../graph/indexGraph.js";
import { KeyedGraph, labelCodec } from "../graph/keyedGraph.js";
import { toposortOrScc, type ToposortResult } from "../graph/toposort.js";
import type { StructuredLogger } from "../logger.js";
import { ERROR_CODES, type ErrorCode } from "../types.js";

export type DocumentFormat = "json" | "yaml";

/** Validation problem reported for a graph document. */
export interface GraphDocumentIssue {
  /** JSON pointer to the offending value. */
  path: string;
  message: string;
}

/** Error thrown when a graph document cannot be parsed or fails validation. */
export class GraphDocumentError extends Error {
  public readonly code: ErrorCode = ERROR_CODES.GRAPH_DOCUMENT;

  constructor(
    message: string,
    readonly issues: GraphDocumentIssue[] = [],
  ) {
    super(issues.length === 0 ? message : `${message}: ${issues.map((issue) => `${issue.path} ${issue.message}`).join("; ")}`);
    this.name = "GraphDocumentError";
  }
}

/**
 * Indexed document: `adjacency[u]` lists the targets of `u`. `vertices` may
 * declare trailing vertices that have no out-edges.
 */
const IndexedDocumentSchema = z
  .object({
    vertices: z.number().int().nonnegative().optional(),
    adjacency: z.array(z.array(z.number().int().nonnegative())),
  })
  .strict()
  .superRefine((document, ctx) => {
    const vertexCount = document.vertices ?? document.adjacency.length;
    if (vertexCount < document.adjacency.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["vertices"],
        message: `declares ${vertexCount} vertices but lists ${document.adjacency.length} adjacency entries`,
      });
      return;
    }
    document.adjacency.forEach((targets, source) => {
      targets.forEach((target, position) => {
        if (target >= vertexCount) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["adjacency", source, position],
            message: `target ${target} is out of range for ${vertexCount} vertices`,
          });
        }
      });
    });
  });

/** Targets of one label; a YAML key without a value (`leaf:`) has none. */
const LabelTargetsSchema = z
  .array(z.string().min(1))
  .nullable()
  .transform((targets) => targets ?? []);

/** Labelled document: `edges[a]` lists the labels `a` points to. */
const LabelledDocumentSchema = z
  .object({
    edges: z.record(LabelTargetsSchema),
  })
  .strict();

/** Schemas accepted by {@link readGraphDocument}, exposed for reuse. */
export const graphDocumentSchema = {
  indexed: IndexedDocumentSchema,
  labelled: LabelledDocumentSchema,
};

export interface IndexedGraphDocument {
  readonly kind: "indexed";
  readonly vertexCount: number;
  readonly adjacency: number[][];
}

export interface LabelledGraphDocument {
  readonly kind: "labelled";
  /** Key order first, then labels only mentioned as targets. */
  readonly labels: string[];
  readonly successors: ReadonlyMap<string, string[]>;
}

export type GraphDocument = IndexedGraphDocument | LabelledGraphDocument;

/** Picks the document format from the file extension (`.yaml`/`.yml`, else JSON). */
export function detectDocumentFormat(path: string): DocumentFormat {
  const extension = extname(path).toLowerCase();
  return extension === ".yaml" || extension === ".yml" ? "yaml" : "json";
}

/** Parses JSON or YAML text into a validated {@link GraphDocument}. */
export function parseGraphDocument(text: string, format: DocumentFormat): GraphDocument {
  let payload: unknown;
  try {
    payload = format === "json" ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    throw new GraphDocumentError(
      `unable to parse ${format} document (${error instanceof Error ? error.message : String(error)})`,
    );
  }
  return readGraphDocument(payload);
}

/**
 * Validates an already decoded payload. A bare array is shorthand for
 * `{ adjacency: [...] }`; an object with an `edges` key is a labelled
 * document.
 */
export function readGraphDocument(payload: unknown): GraphDocument {
  if (isRecord(payload) && "edges" in payload) {
    const parsed = LabelledDocumentSchema.safeParse(payload);
    if (!parsed.success) {
      throw new GraphDocumentError("invalid labelled graph document", toIssues(parsed.error));
    }
    // z.record drops a `__proto__` key from its output, so the entries are
    // read back from the validated input.
    const edges = isRecord(payload.edges) ? payload.edges : {};
    return toLabelledDocument(
      Object.entries(edges).map(([label, targets]): [string, string[]] => [label, LabelTargetsSchema.parse(targets)]),
    );
  }

  const parsed = IndexedDocumentSchema.safeParse(Array.isArray(payload) ? { adjacency: payload } : payload);
  if (!parsed.success) {
    throw new GraphDocumentError("invalid indexed graph document", toIssues(parsed.error));
  }
  return {
    kind: "indexed",
    vertexCount: parsed.data.vertices ?? parsed.data.adjacency.length,
    adjacency: parsed.data.adjacency,
  };
}

export interface SolveOptions {
  /** Reverse every edge before sorting. */
  readonly transpose?: boolean;
  readonly logger?: StructuredLogger;
}

/**
 * Builds the graph described by `document` and runs {@link toposortOrScc} on
 * it. Labelled documents report labels, indexed documents report indices.
 */
export function solveGraphDocument(
  document: GraphDocument,
  options: SolveOptions = {},
): ToposortResult<number> | ToposortResult<string> {
  const { logger } = options;
  const sortOptions = logger ? { logger } : {};

  if (document.kind === "indexed") {
    const graph = IndexGraph.withVertices(document.vertexCount);
    document.adjacency.forEach((targets, source) => {
      for (const target of targets) {
        graph.addEdge(source, target);
      }
    });
    logger?.info("graph_document_loaded", { kind: document.kind, vertices: graph.vertexCount, edges: graph.edgeCount });
    if (options.transpose) {
      graph.transpose();
    }
    return toposortOrScc(graph, sortOptions);
  }

  const { labels, successors } = document;
  const graph = KeyedGraph.fromItems(labels, labelCodec(labels), labels, (builder, label) => {
    for (const target of successors.get(label) ?? []) {
      builder.addOutEdge(target);
    }
  });
  logger?.info("graph_document_loaded", {
    kind: document.kind,
    vertices: graph.vertexCount,
    edges: graph.graph.edgeCount,
  });
  if (options.transpose) {
    graph.transpose();
  }
  return graph.toposortOrScc(sortOptions);
}

function toLabelledDocument(edges: Array<[string, string[]]>): LabelledGraphDocument {
  const successors = new Map(edges);
  const labels = [...successors.keys()];
  const known = new Set(labels);
  for (const targets of successors.values()) {
    for (const target of targets) {
      if (!known.has(target)) {
        known.add(target);
        labels.push(target);
      }
    }
  }
  return { kind: "labelled", labels, successors };
}

function toIssues(error: z.ZodError): GraphDocumentIssue[] {
  return error.issues.map((issue) => ({
    path: `/${issue.path.join("/")}`,
    message: issue.message,
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
