export type { QueryEncoder } from "./query-encoder.js";
export {
  HashingQueryEncoder,
  DEFAULT_HASHING_DIMENSION,
  fnv1a,
  type HashingEncoderOptions,
} from "./hashing-encoder.js";
export {
  RemoteEmbeddingEncoder,
  describeAxiosError,
  type RemoteEncoderConfig,
} from "./remote-encoder.js";
export { normalizeText, tokenize, charTrigrams } from "./tokenize.js";
export {
  createQueryEncoder,
  encoderSettingsFromEnv,
  DEFAULT_REMOTE_EMBEDDING_MODEL,
  DEFAULT_REMOTE_EMBEDDING_DIMENSION,
  type EncoderSettings,
} from "./encoder-factory.js";
