/**
 * Knowledge graph model: transit stops, points of interest and routes,
 * joined by typed, weighted relationships.
 *
 * Nodes and relationships are produced in bulk by the ETL side and are
 * read-only at query time.
 */

import type { Coordinate } from "./geo.js";

/** Node variant tag */
export type NodeKind = "stop" | "poi" | "route";

/** All node kinds, in canonical order */
export const NODE_KINDS: readonly NodeKind[] = ["stop", "poi", "route"];

/** Transit mode of a route */
export type TransitMode = "TRAM" | "METRO" | "BUS" | "FERRY" | "TRAIN" | "OTHER";

interface BaseNode {
  /** Stable identifier, unique within its kind */
  id: string;
  /** Display name */
  name: string;
  /** WGS84 location, immutable */
  location: Coordinate;
}

/** A transit stop */
export interface StopNode extends BaseNode {
  kind: "stop";
  /** Rider-facing stop code (if the feed has one) */
  code?: string;
}

/** A point of interest with descriptive text used for semantic matching */
export interface PoiNode extends BaseNode {
  kind: "poi";
  /** Free-form category tags, sorted and unique */
  tags: string[];
  /** Text the embedding is derived from */
  description: string;
  /** Primary category (tourism/leisure/amenity/historic value) */
  category?: string;
  imageUrl?: string;
}

/** A transit route (line) */
export interface RouteNode extends BaseNode {
  kind: "route";
  shortName: string;
  longName: string;
  mode: TransitMode;
}

export type KnowledgeNode = StopNode | PoiNode | RouteNode;

/** Reference to a node; ids are only unique within a kind */
export interface NodeRef {
  kind: NodeKind;
  id: string;
}

/** Relationship types */
export type RelationshipKind = "IS_NEAR" | "SERVES" | "CONNECTS";

export const RELATIONSHIP_KINDS: readonly RelationshipKind[] = [
  "IS_NEAR",
  "SERVES",
  "CONNECTS",
];

/**
 * A directed, weighted edge.
 *
 * - IS_NEAR: stop↔poi or poi↔poi within the linking distance (traversed both ways)
 * - SERVES: route → stop
 * - CONNECTS: stop → next stop on a trip
 */
export interface Relationship {
  source: NodeRef;
  target: NodeRef;
  kind: RelationshipKind;
  /** Non-negative traversal cost (kilometres for spatial edges) */
  weight: number;
}

/** Bulk load unit: a complete replacement of the graph */
export interface GraphBatch {
  nodes: KnowledgeNode[];
  relationships: Relationship[];
}

/** A vector stored for a POI */
export interface EmbeddingRecord {
  nodeId: string;
  vector: number[];
}

/** ETL input for the embedding index */
export interface DescriptionRecord {
  nodeId: string;
  description: string;
}

/** A node reached by graph expansion */
export interface Neighbor {
  node: KnowledgeNode;
  /** Sum of edge weights along the cheapest discovered path */
  cumulativeWeight: number;
  /** Breadth-first hop distance from the start node */
  hops: number;
}

/** Composite key that disambiguates ids across kinds */
export function nodeKey(ref: NodeRef): string {
  return `${ref.kind}:${ref.id}`;
}

export function refOf(node: KnowledgeNode): NodeRef {
  return { kind: node.kind, id: node.id };
}

export function isNodeKind(value: unknown): value is NodeKind {
  return value === "stop" || value === "poi" || value === "route";
}

export function isRelationshipKind(value: unknown): value is RelationshipKind {
  return value === "IS_NEAR" || value === "SERVES" || value === "CONNECTS";
}
