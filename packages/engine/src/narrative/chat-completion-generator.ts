/**
 * Narrative generator backed by an OpenAI-compatible chat completions
 * endpoint (Groq by default).
 */

import axios from "axios";
import { describeAxiosError } from "../encoder/remote-encoder.js";
import { GenerationError } from "../errors/index.js";
import {
  buildNarrativePrompt,
  type NarrativeGenerator,
  type NarrativeRequest,
} from "./narrative-generator.js";

export const DEFAULT_NARRATIVE_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_NARRATIVE_MODEL = "llama-3.3-70b-versatile";

export interface ChatCompletionConfig {
  baseUrl?: string;
  model?: string;
  apiKey?: string;
  /** City name used in the guide persona */
  city?: string;
  /** Transport timeout in milliseconds (default: 30000) */
  timeout?: number;
  temperature?: number;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: unknown } }>;
}

export class ChatCompletionNarrativeGenerator implements NarrativeGenerator {
  constructor(private readonly config: ChatCompletionConfig = {}) {}

  async generate(request: NarrativeRequest, signal?: AbortSignal): Promise<string> {
    if (!this.config.apiKey) {
      throw new GenerationError("Narrative generator is not configured (missing API key)");
    }
    const prompt = buildNarrativePrompt(request, this.config.city);

    let body: ChatCompletionResponse;
    try {
      const res = await axios.post<ChatCompletionResponse>(
        "/chat/completions",
        {
          model: this.config.model ?? DEFAULT_NARRATIVE_MODEL,
          messages: [{ role: "user", content: prompt }],
          temperature: this.config.temperature ?? 0.7,
        },
        {
          baseURL: this.config.baseUrl ?? DEFAULT_NARRATIVE_BASE_URL,
          timeout: this.config.timeout ?? 30000,
          headers: {
            "Content-Type": "application/json",
            Authorization: "Bearer " + this.config.apiKey,
          },
          signal,
        },
      );
      body = res.data;
    } catch (err) {
      throw new GenerationError(`Narrative request failed: ${describeAxiosError(err)}`, {
        cause: err,
      });
    }

    const content = body.choices?.[0]?.message?.content;
    if (typeof content !== "string" || content.trim().length === 0) {
      throw new GenerationError("Narrative response was empty");
    }
    return content.trim();
  }
}
