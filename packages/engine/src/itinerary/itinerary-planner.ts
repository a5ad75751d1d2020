/**
 * Itinerary pipeline: retrieve → assemble → generate.
 *
 * Retrieval errors and cancellation propagate. Any other generator
 * failure, a timeout included, is reported as a GenerationError next to
 * the retrieval result, which stays usable without the narrative.
 */

import type {
  AssembledContext,
  Place,
  RetrievalOptions,
  RetrievalResult,
} from "@transit-vibes/types";
import { assemble } from "../context/context-assembler.js";
import { GenerationError, RetrievalCancelledError } from "../errors/index.js";
import type { NarrativeGenerator } from "../narrative/narrative-generator.js";
import { withTimeout } from "../resilience/index.js";
import type { HybridRetriever } from "../retrieval/hybrid-retriever.js";

export interface ItineraryRequest extends RetrievalOptions {
  query: string;
  origin?: Place;
  /** Context budget; falls back to the configured maxContextChars */
  maxContextChars?: number;
}

export interface ItineraryResult {
  retrieval: RetrievalResult;
  context: AssembledContext;
  /** Best-ranked POI, the place the narrative routes towards */
  destination: Place | null;
  narrative: string | null;
  generationError: string | null;
}

function toGenerationError(err: unknown): GenerationError {
  if (err instanceof GenerationError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new GenerationError(`Narrative generation failed: ${message}`, { cause: err });
}

export class ItineraryPlanner {
  constructor(
    private readonly retriever: HybridRetriever,
    private readonly generator: NarrativeGenerator,
  ) {}

  async plan(request: ItineraryRequest, signal?: AbortSignal): Promise<ItineraryResult> {
    const { query, origin, maxContextChars, ...options } = request;
    const config = this.retriever.getConfig();

    const retrieval = await this.retriever.retrieve(query, options, signal);
    const context = assemble(retrieval.candidates, maxContextChars ?? config.maxContextChars);

    const top = retrieval.candidates.find((c) => c.node.kind === "poi" && !c.detached);
    const destination: Place | null = top
      ? { name: top.node.name, lat: top.node.location.lat, lng: top.node.location.lng }
      : null;

    try {
      const narrative = await withTimeout(
        (sig) =>
          this.generator.generate(
            {
              context: context.text,
              queryText: query,
              origin,
              destination: destination ?? undefined,
            },
            sig,
          ),
        "generator",
        config.timeouts.generatorMs,
        signal,
      );
      return { retrieval, context, destination, narrative, generationError: null };
    } catch (err) {
      if (err instanceof RetrievalCancelledError) throw err;
      const failure = toGenerationError(err);
      console.warn(`[narrative] query ${retrieval.metadata.queryHash}: ${failure.message}`);
      return { retrieval, context, destination, narrative: null, generationError: failure.message };
    }
  }
}
