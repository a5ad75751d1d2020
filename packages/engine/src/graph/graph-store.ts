/**
 * Knowledge graph store: typed nodes and weighted relationships with
 * hop-bounded neighbourhood traversal.
 *
 * The in-memory store holds one immutable snapshot. `load` validates a
 * complete batch, builds a fresh adjacency list and swaps the snapshot
 * reference; traversals capture the snapshot they start with.
 */

import {
  nodeKey,
  refOf,
  type GraphBatch,
  type KnowledgeNode,
  type Neighbor,
  type NodeKind,
  type NodeRef,
  type RelationshipKind,
} from "@transit-vibes/types";
import { BulkLoadValidationError, InvalidInputError, NotFoundError } from "../errors/index.js";
import {
  countByKind,
  validateGraphBatch,
  type GraphValidationOptions,
} from "./validation.js";

/**
 * Kinds indexed in both directions. IS_NEAR is symmetric; SERVES is
 * stored route → stop but expansion must also reach a stop's routes.
 */
export const BIDIRECTIONAL_KINDS: ReadonlySet<RelationshipKind> = new Set(["IS_NEAR", "SERVES"]);

export interface GraphStats {
  nodes: Record<NodeKind, number>;
  relationships: number;
  version: number;
}

/** Read access to one graph snapshot */
export interface GraphView {
  /**
   * Nodes reachable from `ref` in at most `maxHops` steps over the given
   * relationship kinds, cheapest first. Throws NotFoundError for an
   * unknown start node. Unknown kinds are ignored.
   */
  neighbors(
    ref: NodeRef,
    maxHops: number,
    relationshipKinds: readonly string[],
    signal?: AbortSignal,
  ): Promise<Neighbor[]>;
  getNode(ref: NodeRef): KnowledgeNode | undefined;
  version(): number;
}

/** Contract every graph backend satisfies */
export interface KnowledgeGraphStore extends GraphView {
  /**
   * Pin the current snapshot. Every read through the returned view sees
   * the same graph, whatever `load` commits meanwhile.
   */
  view(): GraphView;
  /** Validate and atomically replace the whole graph */
  load(batch: GraphBatch): Promise<GraphStats>;
  stats(): GraphStats;
}

interface AdjacentEdge {
  readonly targetKey: string;
  readonly kind: RelationshipKind;
  readonly weight: number;
}

interface GraphSnapshot {
  readonly version: number;
  readonly nodes: ReadonlyMap<string, KnowledgeNode>;
  readonly adjacency: ReadonlyMap<string, readonly AdjacentEdge[]>;
  readonly relationshipCount: number;
}

function addEdge(adjacency: Map<string, AdjacentEdge[]>, from: string, edge: AdjacentEdge): void {
  let list = adjacency.get(from);
  if (!list) {
    list = [];
    adjacency.set(from, list);
  }
  list.push(edge);
}

/** Ascending weight, then hops, then node key */
function compareNeighbors(a: Neighbor, b: Neighbor): number {
  if (a.cumulativeWeight !== b.cumulativeWeight) return a.cumulativeWeight - b.cumulativeWeight;
  if (a.hops !== b.hops) return a.hops - b.hops;
  const ka = nodeKey(a.node);
  const kb = nodeKey(b.node);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

/**
 * Hop-bounded expansion from `ref`. `hops` is the BFS depth that first
 * reaches a node; `cumulativeWeight` is the cheapest path of at most
 * `maxHops` edges, which may take more hops than that. A node's weight
 * is only propagated again when it strictly improves.
 */
function traverse(
  snap: GraphSnapshot,
  ref: NodeRef,
  maxHops: number,
  relationshipKinds: readonly string[],
  signal?: AbortSignal,
): Neighbor[] {
  if (!Number.isInteger(maxHops) || maxHops < 0) {
    throw new InvalidInputError(`maxHops must be a non-negative integer, got ${maxHops}`);
  }
  const startKey = nodeKey(ref);
  if (!snap.nodes.has(startKey)) {
    throw new NotFoundError(`No ${ref.kind} node with id "${ref.id}"`);
  }
  if (maxHops === 0) return [];

  const kinds = new Set<string>(relationshipKinds);
  const best = new Map<string, { weight: number; hops: number }>();
  let frontier = new Map<string, number>([[startKey, 0]]);

  for (let hop = 1; hop <= maxHops && frontier.size > 0; hop++) {
    signal?.throwIfAborted();
    const next = new Map<string, number>();
    for (const [fromKey, fromWeight] of frontier) {
      for (const edge of snap.adjacency.get(fromKey) ?? []) {
        if (!kinds.has(edge.kind) || edge.targetKey === startKey) continue;
        const weight = fromWeight + edge.weight;
        const known = best.get(edge.targetKey);
        if (known && weight >= known.weight) continue;
        best.set(edge.targetKey, { weight, hops: known?.hops ?? hop });
        next.set(edge.targetKey, weight);
      }
    }
    frontier = next;
  }

  const result: Neighbor[] = [];
  for (const [key, { weight, hops }] of best) {
    const node = snap.nodes.get(key);
    if (node) result.push({ node, cumulativeWeight: weight, hops });
  }
  return result.sort(compareNeighbors);
}

export class InMemoryGraphStore implements KnowledgeGraphStore {
  private snapshot: GraphSnapshot = {
    version: 0,
    nodes: new Map(),
    adjacency: new Map(),
    relationshipCount: 0,
  };

  constructor(private readonly validation: GraphValidationOptions = {}) {}

  async neighbors(
    ref: NodeRef,
    maxHops: number,
    relationshipKinds: readonly string[],
    signal?: AbortSignal,
  ): Promise<Neighbor[]> {
    return traverse(this.snapshot, ref, maxHops, relationshipKinds, signal);
  }

  view(): GraphView {
    const snap = this.snapshot;
    return {
      neighbors: async (ref, maxHops, relationshipKinds, signal) =>
        traverse(snap, ref, maxHops, relationshipKinds, signal),
      getNode: (ref) => snap.nodes.get(nodeKey(ref)),
      version: () => snap.version,
    };
  }

  getNode(ref: NodeRef): KnowledgeNode | undefined {
    return this.snapshot.nodes.get(nodeKey(ref));
  }

  hasPoi(id: string): boolean {
    return this.snapshot.nodes.has(nodeKey({ kind: "poi", id }));
  }

  async load(batch: GraphBatch): Promise<GraphStats> {
    const issues = validateGraphBatch(batch, this.validation);
    if (issues.length > 0) {
      console.warn(`[graph] Bulk load rejected with ${issues.length} issue(s)`);
      throw new BulkLoadValidationError(issues);
    }

    const nodes = new Map<string, KnowledgeNode>();
    for (const node of batch.nodes) nodes.set(nodeKey(refOf(node)), node);

    const adjacency = new Map<string, AdjacentEdge[]>();
    for (const rel of batch.relationships) {
      const sourceKey = nodeKey(rel.source);
      const targetKey = nodeKey(rel.target);
      addEdge(adjacency, sourceKey, { targetKey, kind: rel.kind, weight: rel.weight });
      if (BIDIRECTIONAL_KINDS.has(rel.kind)) {
        addEdge(adjacency, targetKey, { targetKey: sourceKey, kind: rel.kind, weight: rel.weight });
      }
    }

    this.snapshot = {
      version: this.snapshot.version + 1,
      nodes,
      adjacency,
      relationshipCount: batch.relationships.length,
    };
    const stats = this.stats();
    console.log(
      `[graph] Snapshot v${stats.version} committed: ` +
        `${stats.nodes.stop} stops, ${stats.nodes.poi} POIs, ${stats.nodes.route} routes, ` +
        `${stats.relationships} relationships`,
    );
    return stats;
  }

  stats(): GraphStats {
    const snap = this.snapshot;
    return {
      nodes: countByKind(snap.nodes.values()),
      relationships: snap.relationshipCount,
      version: snap.version,
    };
  }

  version(): number {
    return this.snapshot.version;
  }
}
