export {
  buildNarrativePrompt,
  type NarrativeGenerator,
  type NarrativeRequest,
} from "./narrative-generator.js";
export {
  ChatCompletionNarrativeGenerator,
  DEFAULT_NARRATIVE_BASE_URL,
  DEFAULT_NARRATIVE_MODEL,
  type ChatCompletionConfig,
} from "./chat-completion-generator.js";
