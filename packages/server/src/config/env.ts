/**
 * Server settings from environment variables.
 */

import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import {
  DEFAULT_NARRATIVE_BASE_URL,
  DEFAULT_NARRATIVE_MODEL,
  InvalidInputError,
  encoderSettingsFromEnv,
  type ChatCompletionConfig,
  type EncoderSettings,
} from "@transit-vibes/engine";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Where the builder script writes by default */
export const DEFAULT_SNAPSHOT_PATH = resolve(__dirname, "../../../../data/knowledge-base.sqlite");

export interface ServerConfig {
  port: number;
  /** Retrieval profile name; base config when unset */
  retrievalProfile?: string;
  snapshotPath: string;
  narrative: ChatCompletionConfig;
  encoder: EncoderSettings;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = parseInt(env["PORT"] ?? "3000", 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidInputError(`PORT must be a valid port number, got "${env["PORT"]}"`);
  }

  return {
    port,
    retrievalProfile: env["RETRIEVAL_PROFILE"] || undefined,
    snapshotPath: resolve(env["SNAPSHOT_PATH"] || DEFAULT_SNAPSHOT_PATH),
    narrative: {
      baseUrl: env["NARRATIVE_BASE_URL"] || DEFAULT_NARRATIVE_BASE_URL,
      model: env["NARRATIVE_MODEL"] || DEFAULT_NARRATIVE_MODEL,
      apiKey: env["NARRATIVE_API_KEY"] || undefined,
      city: env["NARRATIVE_CITY"] || "Helsinki",
    },
    encoder: encoderSettingsFromEnv(env),
  };
}
