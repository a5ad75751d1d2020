/**
 * Knowledge base snapshot persistence.
 *
 * A snapshot is one SQLite file holding the graph batch, the POI
 * embeddings and a little metadata. The ETL writes it; the server reads
 * it at startup and on reload. Writes go to a temporary file that is
 * renamed over the target, so readers never see a half-written file.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync, renameSync, rmSync } from "node:fs";
import { dirname } from "node:path";
import { NotFoundError } from "@transit-vibes/engine";
import type {
  EmbeddingRecord,
  GraphBatch,
  KnowledgeNode,
  PoiNode,
  Relationship,
  TransitMode,
} from "@transit-vibes/types";
import { isNodeKind, isRelationshipKind } from "@transit-vibes/types";

export interface SnapshotMeta {
  /** ISO timestamp of the build */
  builtAt: string;
  /** Dimension of the stored vectors, null when there are none */
  encoderDimension: number | null;
}

export interface KnowledgeBaseSnapshot {
  graph: GraphBatch;
  embeddings: EmbeddingRecord[];
  meta: SnapshotMeta;
}

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

interface NodeRow {
  kind: string;
  id: string;
  name: string;
  lat: number;
  lng: number;
  code: string | null;
  tags: string | null;
  description: string | null;
  category: string | null;
  image_url: string | null;
  short_name: string | null;
  long_name: string | null;
  mode: string | null;
}

interface RelationshipRow {
  source_kind: string;
  source_id: string;
  target_kind: string;
  target_id: string;
  kind: string;
  weight: number;
}

interface EmbeddingRow {
  node_id: string;
  vector: Buffer;
}

interface MetaRow {
  key: string;
  value: string;
}

const SCHEMA = `
  CREATE TABLE nodes (
    kind TEXT NOT NULL,
    id TEXT NOT NULL,
    name TEXT NOT NULL,
    lat REAL NOT NULL,
    lng REAL NOT NULL,
    code TEXT,
    tags TEXT,
    description TEXT,
    category TEXT,
    image_url TEXT,
    short_name TEXT,
    long_name TEXT,
    mode TEXT,
    PRIMARY KEY (kind, id)
  );
  CREATE TABLE relationships (
    source_kind TEXT NOT NULL,
    source_id TEXT NOT NULL,
    target_kind TEXT NOT NULL,
    target_id TEXT NOT NULL,
    kind TEXT NOT NULL,
    weight REAL NOT NULL
  );
  CREATE TABLE embeddings (
    node_id TEXT NOT NULL PRIMARY KEY,
    vector BLOB NOT NULL
  );
  CREATE TABLE meta (
    key TEXT NOT NULL PRIMARY KEY,
    value TEXT NOT NULL
  );
`;

const TRANSIT_MODES: ReadonlySet<string> = new Set(["TRAM", "METRO", "BUS", "FERRY", "TRAIN", "OTHER"]);

function isTransitMode(value: string | null): value is TransitMode {
  return value !== null && TRANSIT_MODES.has(value);
}

/** Vectors are stored as little-endian float64 */
function encodeVector(vector: readonly number[]): Buffer {
  const buf = Buffer.alloc(vector.length * 8);
  vector.forEach((v, i) => buf.writeDoubleLE(v, i * 8));
  return buf;
}

function decodeVector(buf: Buffer): number[] {
  const vector: number[] = [];
  for (let offset = 0; offset + 8 <= buf.length; offset += 8) {
    vector.push(buf.readDoubleLE(offset));
  }
  return vector;
}

function parseTags(raw: string | null): string[] {
  if (!raw) return [];
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === "string") : [];
}

function nodeFromRow(row: NodeRow): KnowledgeNode {
  const base = { id: row.id, name: row.name, location: { lat: row.lat, lng: row.lng } };
  switch (row.kind) {
    case "stop":
      return row.code ? { kind: "stop", ...base, code: row.code } : { kind: "stop", ...base };
    case "poi": {
      const node: PoiNode = {
        kind: "poi",
        ...base,
        tags: parseTags(row.tags),
        description: row.description ?? "",
      };
      if (row.category) node.category = row.category;
      if (row.image_url) node.imageUrl = row.image_url;
      return node;
    }
    case "route":
      if (!isTransitMode(row.mode)) {
        throw new Error(`Snapshot route ${row.id} has unknown mode "${String(row.mode)}"`);
      }
      return {
        kind: "route",
        ...base,
        shortName: row.short_name ?? "",
        longName: row.long_name ?? "",
        mode: row.mode,
      };
    default:
      throw new Error(`Snapshot node ${row.id} has unknown kind "${row.kind}"`);
  }
}

function relationshipFromRow(row: RelationshipRow, index: number): Relationship {
  const { source_kind, target_kind, kind } = row;
  if (!isNodeKind(source_kind) || !isNodeKind(target_kind) || !isRelationshipKind(kind)) {
    throw new Error(`Snapshot relationship #${index} has an unknown kind`);
  }
  return {
    kind,
    source: { kind: source_kind, id: row.source_id },
    target: { kind: target_kind, id: row.target_id },
    weight: row.weight,
  };
}

/**
 * Write a snapshot file, replacing any existing one.
 */
export function writeSnapshot(filePath: string, snapshot: KnowledgeBaseSnapshot): void {
  const tmpPath = `${filePath}.tmp`;
  mkdirSync(dirname(filePath), { recursive: true });
  rmSync(tmpPath, { force: true });

  const db = new Database(tmpPath);
  try {
    db.exec(SCHEMA);
    const insertNode = db.prepare(
      `INSERT INTO nodes (kind, id, name, lat, lng, code, tags, description, category, image_url, short_name, long_name, mode)
       VALUES (@kind, @id, @name, @lat, @lng, @code, @tags, @description, @category, @image_url, @short_name, @long_name, @mode)`,
    );
    const insertRel = db.prepare(
      `INSERT INTO relationships (source_kind, source_id, target_kind, target_id, kind, weight)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );
    const insertEmbedding = db.prepare("INSERT INTO embeddings (node_id, vector) VALUES (?, ?)");
    const insertMeta = db.prepare("INSERT INTO meta (key, value) VALUES (?, ?)");

    db.transaction(() => {
      for (const node of snapshot.graph.nodes) {
        const row: NodeRow = {
          kind: node.kind,
          id: node.id,
          name: node.name,
          lat: node.location.lat,
          lng: node.location.lng,
          code: null,
          tags: null,
          description: null,
          category: null,
          image_url: null,
          short_name: null,
          long_name: null,
          mode: null,
        };
        if (node.kind === "stop") {
          row.code = node.code ?? null;
        } else if (node.kind === "poi") {
          row.tags = JSON.stringify(node.tags);
          row.description = node.description;
          row.category = node.category ?? null;
          row.image_url = node.imageUrl ?? null;
        } else {
          row.short_name = node.shortName;
          row.long_name = node.longName;
          row.mode = node.mode;
        }
        insertNode.run(row);
      }
      for (const rel of snapshot.graph.relationships) {
        insertRel.run(rel.source.kind, rel.source.id, rel.target.kind, rel.target.id, rel.kind, rel.weight);
      }
      for (const record of snapshot.embeddings) {
        insertEmbedding.run(record.nodeId, encodeVector(record.vector));
      }
      insertMeta.run("builtAt", snapshot.meta.builtAt);
      if (snapshot.meta.encoderDimension !== null) {
        insertMeta.run("encoderDimension", String(snapshot.meta.encoderDimension));
      }
    })();
  } finally {
    db.close();
  }

  renameSync(tmpPath, filePath);
  console.log(
    `[snapshot] Wrote ${filePath}: ${snapshot.graph.nodes.length.toLocaleString()} nodes, ` +
      `${snapshot.graph.relationships.length.toLocaleString()} relationships, ` +
      `${snapshot.embeddings.length.toLocaleString()} embeddings`,
  );
}

/**
 * Read a snapshot file. Throws NotFoundError when the file is missing.
 */
export function readSnapshot(filePath: string): KnowledgeBaseSnapshot {
  if (!existsSync(filePath)) {
    throw new NotFoundError(`Knowledge base snapshot not found: ${filePath}`);
  }

  const db = new Database(filePath, { readonly: true });
  try {
    const nodes = db
      .prepare<[], NodeRow>("SELECT * FROM nodes ORDER BY kind, id")
      .all()
      .map(nodeFromRow);
    const relationships = db
      .prepare<[], RelationshipRow>("SELECT * FROM relationships ORDER BY rowid")
      .all()
      .map(relationshipFromRow);
    const embeddings = db
      .prepare<[], EmbeddingRow>("SELECT node_id, vector FROM embeddings ORDER BY node_id")
      .all()
      .map((row) => ({ nodeId: row.node_id, vector: decodeVector(row.vector) }));
    const meta = new Map(
      db
        .prepare<[], MetaRow>("SELECT key, value FROM meta")
        .all()
        .map((row) => [row.key, row.value]),
    );

    const dimension = meta.get("encoderDimension");
    console.log(
      `[snapshot] Read ${filePath}: ${nodes.length.toLocaleString()} nodes, ` +
        `${relationships.length.toLocaleString()} relationships, ${embeddings.length.toLocaleString()} embeddings`,
    );
    return {
      graph: { nodes, relationships },
      embeddings,
      meta: {
        builtAt: meta.get("builtAt") ?? "",
        encoderDimension: dimension === undefined ? null : Number(dimension),
      },
    };
  } finally {
    db.close();
  }
}
