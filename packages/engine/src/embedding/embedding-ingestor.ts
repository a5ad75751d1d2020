/**
 * ETL → embedding index bulk contract.
 *
 * Takes (nodeId, description) pairs, derives vectors with the encoder and
 * commits them as one new snapshot. Descriptions for node ids that are not
 * POIs of the current graph are rejected as a batch, so the index never
 * holds orphan vectors.
 */

import type { DescriptionRecord, EmbeddingRecord } from "@transit-vibes/types";
import { BulkLoadValidationError, type ValidationIssue } from "../errors/index.js";
import type { QueryEncoder } from "../encoder/query-encoder.js";
import type { EmbeddingIndex } from "./embedding-index.js";

export interface EmbeddingIngestResult {
  embedded: number;
  indexVersion: number;
}

export class EmbeddingIngestor {
  constructor(
    private readonly encoder: QueryEncoder,
    private readonly index: EmbeddingIndex,
  ) {}

  /**
   * Encode every description and atomically replace the index contents.
   *
   * @param records - One description per POI
   * @param isKnownPoi - Membership test against the committed graph
   */
  async ingest(
    records: DescriptionRecord[],
    isKnownPoi: (nodeId: string) => boolean,
  ): Promise<EmbeddingIngestResult> {
    const embeddings = await this.embed(records, isKnownPoi);
    await this.index.replaceAll(embeddings);
    return { embedded: embeddings.length, indexVersion: this.index.version() };
  }

  /**
   * Validate and encode without touching the index, so a caller can
   * commit the vectors together with the graph they belong to.
   */
  async embed(
    records: DescriptionRecord[],
    isKnownPoi: (nodeId: string) => boolean,
  ): Promise<EmbeddingRecord[]> {
    const issues: ValidationIssue[] = [];
    const seen = new Set<string>();

    records.forEach((record, i) => {
      const path = `descriptions[${i}]`;
      if (!isKnownPoi(record.nodeId)) {
        issues.push({ path, message: `no POI node with id "${record.nodeId}"` });
      }
      if (seen.has(record.nodeId)) {
        issues.push({ path, message: `duplicate description for "${record.nodeId}"` });
      }
      if (record.description.trim().length === 0) {
        issues.push({ path, message: "description is empty" });
      }
      seen.add(record.nodeId);
    });
    if (issues.length > 0) throw new BulkLoadValidationError(issues);

    const start = Date.now();
    const embeddings: EmbeddingRecord[] = [];
    for (const record of records) {
      embeddings.push({
        nodeId: record.nodeId,
        vector: await this.encoder.encode(record.description),
      });
    }
    console.log(
      `[index] Embedded ${embeddings.length.toLocaleString()} descriptions in ${Date.now() - start}ms`,
    );
    return embeddings;
  }
}
