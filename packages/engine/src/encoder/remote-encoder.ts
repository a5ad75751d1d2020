/**
 * Encoder backed by an OpenAI-compatible `/embeddings` endpoint.
 */

import axios from "axios";
import { EncoderUnavailableError, InvalidInputError } from "../errors/index.js";
import { isFiniteVector } from "../embedding/similarity.js";
import type { QueryEncoder } from "./query-encoder.js";

export interface RemoteEncoderConfig {
  /** e.g. "https://api.openai.com/v1" */
  baseUrl: string;
  model: string;
  /** Expected vector length; responses of any other length are rejected */
  dimension: number;
  apiKey?: string;
  /** Transport timeout in milliseconds (default: 10000) */
  timeout?: number;
}

interface EmbeddingsResponse {
  data?: Array<{ embedding?: unknown }>;
}

export class RemoteEmbeddingEncoder implements QueryEncoder {
  readonly dimension: number;

  constructor(private readonly config: RemoteEncoderConfig) {
    this.dimension = config.dimension;
  }

  async encode(text: string, signal?: AbortSignal): Promise<number[]> {
    if (typeof text !== "string" || text.trim().length === 0) {
      throw new InvalidInputError("query text must be a non-empty string");
    }

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.config.apiKey) headers["Authorization"] = "Bearer " + this.config.apiKey;

    let body: EmbeddingsResponse;
    try {
      const res = await axios.post<EmbeddingsResponse>(
        "/embeddings",
        { model: this.config.model, input: text, encoding_format: "float" },
        {
          baseURL: this.config.baseUrl,
          timeout: this.config.timeout ?? 10000,
          headers,
          signal,
        },
      );
      body = res.data;
    } catch (err) {
      throw new EncoderUnavailableError(`Embedding request failed: ${describeAxiosError(err)}`, {
        cause: err,
      });
    }

    const embedding = body.data?.[0]?.embedding;
    if (!Array.isArray(embedding) || embedding.length === 0 || !isFiniteVector(embedding)) {
      throw new EncoderUnavailableError("Embedding response empty or malformed");
    }
    if (embedding.length !== this.dimension) {
      throw new EncoderUnavailableError(
        `Embedding has dimension ${embedding.length}, expected ${this.dimension}`,
      );
    }
    return embedding;
  }
}

export function describeAxiosError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    return err.response ? `HTTP ${err.response.status}` : err.code ?? err.message;
  }
  return err instanceof Error ? err.message : String(err);
}
