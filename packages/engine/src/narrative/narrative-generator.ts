/**
 * Narrative generation: the external language model that turns the
 * assembled context into a guide-style itinerary.
 *
 * The generator reasons over retrieved places only; it never invents
 * stops or POIs of its own.
 */

import type { Place } from "@transit-vibes/types";

export interface NarrativeRequest {
  /** Assembled, size-bounded context */
  context: string;
  /** The user's original vibe text */
  queryText: string;
  origin?: Place;
  destination?: Place;
}

export interface NarrativeGenerator {
  /** Returns free text, or throws GenerationError */
  generate(request: NarrativeRequest, signal?: AbortSignal): Promise<string>;
}

/** Build the guide prompt sent to the language model. */
export function buildNarrativePrompt(request: NarrativeRequest, city = "the city"): string {
  const from = request.origin?.name ?? `${city} centre`;
  const to = request.destination?.name ?? "the best match below";

  return [
    `Act as a local guide for ${city}.`,
    `User request: go from ${from} to ${to}.`,
    `User vibe: "${request.queryText}"`,
    "",
    "RETRIEVED PLACES (ranked, with nearby transit):",
    request.context.length > 0 ? request.context : "(no matching places found)",
    "",
    "INSTRUCTIONS:",
    "1. Recommend the best-ranked places and the transit stops or lines near them.",
    "2. Be conversational, for example \"The easiest way is to hop on tram 4...\".",
    "3. Explain why each destination fits the vibe.",
    "4. Only mention places and transit listed above.",
  ].join("\n");
}
