/**
 * Bulk-load validation for knowledge graph batches.
 *
 * Batches arrive from the ETL side (and from disk), so every field is
 * checked at runtime. All issues are collected; the caller rejects the
 * whole batch if any are found.
 */

import {
  isNodeKind,
  isRelationshipKind,
  nodeKey,
  type GraphBatch,
  type KnowledgeNode,
  type NodeKind,
  type Relationship,
  type RelationshipKind,
} from "@transit-vibes/types";
import type { ValidationIssue } from "../errors/index.js";
import { haversineDistance, isValidCoordinate } from "../geo/index.js";

/** Default maximum IS_NEAR distance */
export const DEFAULT_MAX_NEAR_DISTANCE_METERS = 400;

/** Slack for rounding in ETL-computed distances */
const DISTANCE_TOLERANCE_METERS = 1;

const TRANSIT_MODES = new Set(["TRAM", "METRO", "BUS", "FERRY", "TRAIN", "OTHER"]);

/** Endpoint kinds each relationship kind may join, as "source>target" */
const ALLOWED_ENDPOINTS: Record<RelationshipKind, ReadonlySet<string>> = {
  IS_NEAR: new Set(["stop>poi", "poi>stop", "poi>poi"]),
  SERVES: new Set(["route>stop"]),
  CONNECTS: new Set(["stop>stop"]),
};

export interface GraphValidationOptions {
  maxNearDistanceMeters?: number;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function validateNode(node: KnowledgeNode, path: string, issues: ValidationIssue[]): void {
  if (!isNodeKind(node.kind)) {
    issues.push({ path, message: `unknown node kind "${String(node.kind)}"` });
    return;
  }
  if (!isNonEmptyString(node.id)) issues.push({ path, message: "id must be a non-empty string" });
  if (typeof node.name !== "string") issues.push({ path, message: "name must be a string" });
  if (!isValidCoordinate(node.location)) {
    issues.push({ path, message: "location must be a valid WGS84 coordinate" });
  }

  switch (node.kind) {
    case "poi":
      if (!Array.isArray(node.tags) || !node.tags.every((t) => typeof t === "string")) {
        issues.push({ path, message: "tags must be an array of strings" });
      }
      if (typeof node.description !== "string") {
        issues.push({ path, message: "description must be a string" });
      }
      break;
    case "route":
      if (!TRANSIT_MODES.has(node.mode)) {
        issues.push({ path, message: `unknown transit mode "${String(node.mode)}"` });
      }
      break;
    case "stop":
      break;
  }
}

function validateRelationship(
  rel: Relationship,
  path: string,
  nodes: ReadonlyMap<string, KnowledgeNode>,
  maxNearDistanceMeters: number,
  issues: ValidationIssue[],
): void {
  if (!isRelationshipKind(rel.kind)) {
    issues.push({ path, message: `unknown relationship kind "${String(rel.kind)}"` });
    return;
  }
  if (typeof rel.weight !== "number" || !Number.isFinite(rel.weight) || rel.weight < 0) {
    issues.push({ path, message: "weight must be a finite non-negative number" });
  }
  if (!rel.source || !rel.target || !isNodeKind(rel.source.kind) || !isNodeKind(rel.target.kind)) {
    issues.push({ path, message: "source and target must be node references" });
    return;
  }

  const source = nodes.get(nodeKey(rel.source));
  const target = nodes.get(nodeKey(rel.target));
  if (!source) issues.push({ path, message: `source ${nodeKey(rel.source)} does not exist` });
  if (!target) issues.push({ path, message: `target ${nodeKey(rel.target)} does not exist` });
  if (nodeKey(rel.source) === nodeKey(rel.target)) {
    issues.push({ path, message: "self-loops are not allowed" });
  }

  const endpoints = `${rel.source.kind}>${rel.target.kind}`;
  if (!ALLOWED_ENDPOINTS[rel.kind].has(endpoints)) {
    issues.push({ path, message: `${rel.kind} cannot join ${rel.source.kind} to ${rel.target.kind}` });
  }

  if (rel.kind === "IS_NEAR" && source && target) {
    const distance = haversineDistance(source.location, target.location);
    if (distance > maxNearDistanceMeters + DISTANCE_TOLERANCE_METERS) {
      issues.push({
        path,
        message: `IS_NEAR endpoints are ${Math.round(distance)}m apart (max ${maxNearDistanceMeters}m)`,
      });
    }
  }
}

/**
 * Check a batch against the graph invariants.
 *
 * @returns Every issue found, empty when the batch may be committed
 */
export function validateGraphBatch(
  batch: GraphBatch,
  options: GraphValidationOptions = {},
): ValidationIssue[] {
  const maxNear = options.maxNearDistanceMeters ?? DEFAULT_MAX_NEAR_DISTANCE_METERS;
  const issues: ValidationIssue[] = [];

  if (!Array.isArray(batch.nodes) || !Array.isArray(batch.relationships)) {
    return [{ path: "batch", message: "nodes and relationships must be arrays" }];
  }

  const nodes = new Map<string, KnowledgeNode>();
  batch.nodes.forEach((node, i) => {
    const path = `nodes[${i}]`;
    const before = issues.length;
    validateNode(node, path, issues);
    if (issues.length > before) return;

    const key = nodeKey(node);
    if (nodes.has(key)) {
      issues.push({ path, message: `duplicate ${node.kind} id "${node.id}"` });
      return;
    }
    nodes.set(key, node);
  });

  batch.relationships.forEach((rel, i) => {
    validateRelationship(rel, `relationships[${i}]`, nodes, maxNear, issues);
  });

  return issues;
}

/** Count nodes by kind */
export function countByKind(nodes: Iterable<KnowledgeNode>): Record<NodeKind, number> {
  const counts: Record<NodeKind, number> = { stop: 0, poi: 0, route: 0 };
  for (const node of nodes) counts[node.kind]++;
  return counts;
}
