/**
 * Encoder selection shared by the ETL and the server, so both sides
 * embed into the same vector space.
 */

import { InvalidInputError } from "../errors/index.js";
import { DEFAULT_HASHING_DIMENSION, HashingQueryEncoder } from "./hashing-encoder.js";
import type { QueryEncoder } from "./query-encoder.js";
import { RemoteEmbeddingEncoder } from "./remote-encoder.js";

export const DEFAULT_REMOTE_EMBEDDING_MODEL = "text-embedding-3-small";
export const DEFAULT_REMOTE_EMBEDDING_DIMENSION = 1536;

export interface EncoderSettings {
  /** OpenAI-compatible API base URL; the local hashing encoder is used when unset */
  baseUrl?: string;
  model?: string;
  apiKey?: string;
  dimension?: number;
}

/** Read EMBEDDING_BASE_URL, EMBEDDING_MODEL, EMBEDDING_API_KEY and EMBEDDING_DIMENSION */
export function encoderSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): EncoderSettings {
  const settings: EncoderSettings = {};
  if (env["EMBEDDING_BASE_URL"]) settings.baseUrl = env["EMBEDDING_BASE_URL"];
  if (env["EMBEDDING_MODEL"]) settings.model = env["EMBEDDING_MODEL"];
  if (env["EMBEDDING_API_KEY"]) settings.apiKey = env["EMBEDDING_API_KEY"];

  const rawDimension = env["EMBEDDING_DIMENSION"];
  if (rawDimension) {
    const dimension = Number(rawDimension);
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new InvalidInputError(`EMBEDDING_DIMENSION must be a positive integer, got "${rawDimension}"`);
    }
    settings.dimension = dimension;
  }
  return settings;
}

export function createQueryEncoder(settings: EncoderSettings = {}): QueryEncoder {
  if (settings.baseUrl) {
    console.log(`[encoder] Using remote embeddings at ${settings.baseUrl}`);
    return new RemoteEmbeddingEncoder({
      baseUrl: settings.baseUrl,
      model: settings.model ?? DEFAULT_REMOTE_EMBEDDING_MODEL,
      dimension: settings.dimension ?? DEFAULT_REMOTE_EMBEDDING_DIMENSION,
      apiKey: settings.apiKey,
    });
  }
  return new HashingQueryEncoder({ dimension: settings.dimension ?? DEFAULT_HASHING_DIMENSION });
}
