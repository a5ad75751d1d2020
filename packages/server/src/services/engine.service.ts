/**
 * Live knowledge base and the retrieval pipeline built on it.
 *
 * The stores are created once and keep serving while a reload builds
 * new snapshots and swaps them in; requests in flight finish against
 * the snapshot they started with.
 */

import {
  ChatCompletionNarrativeGenerator,
  HybridRetriever,
  InMemoryEmbeddingIndex,
  InMemoryGraphStore,
  ItineraryPlanner,
  createQueryEncoder,
  listRetrievalProfiles,
  resolveRetrievalConfig,
  type ItineraryResult,
  type NarrativeGenerator,
  type QueryEncoder,
} from "@transit-vibes/engine";
import { loadKnowledgeBase, readSnapshot } from "@transit-vibes/builder";
import type { RetrievalConfig, RetrievalResult } from "@transit-vibes/types";
import type { ServerConfig } from "../config/env.js";
import type { ItineraryRequestBody, SearchRequest } from "../models/requests.js";
import type { HealthResponse, ProfileListItem, ReloadResponse } from "../models/responses.js";

export interface EngineServiceOptions {
  snapshotPath: string;
  config: RetrievalConfig;
  encoder: QueryEncoder;
  generator: NarrativeGenerator;
  profile?: string;
  /** Override configs/retrieval lookup (tests) */
  configsRoot?: string;
}

interface LoadedSnapshot {
  builtAt: string;
  loadedAt: string;
}

export class EngineService {
  readonly graph = new InMemoryGraphStore();
  readonly index = new InMemoryEmbeddingIndex();
  private readonly retriever: HybridRetriever;
  private readonly planner: ItineraryPlanner;
  private loaded: LoadedSnapshot | null = null;
  private pendingReload: Promise<ReloadResponse> | null = null;

  constructor(private readonly options: EngineServiceOptions) {
    this.retriever = new HybridRetriever({
      encoder: options.encoder,
      index: this.index,
      graph: this.graph,
      config: options.config,
    });
    this.planner = new ItineraryPlanner(this.retriever, options.generator);
  }

  static fromConfig(config: ServerConfig): EngineService {
    return new EngineService({
      snapshotPath: config.snapshotPath,
      config: resolveRetrievalConfig(config.retrievalProfile),
      encoder: createQueryEncoder(config.encoder),
      generator: new ChatCompletionNarrativeGenerator(config.narrative),
      profile: config.retrievalProfile,
    });
  }

  /**
   * Read the snapshot file and swap it in. Concurrent calls share one
   * reload.
   */
  reload(): Promise<ReloadResponse> {
    if (!this.pendingReload) {
      this.pendingReload = this.doReload().finally(() => {
        this.pendingReload = null;
      });
    }
    return this.pendingReload;
  }

  search(request: SearchRequest, signal?: AbortSignal): Promise<RetrievalResult> {
    const { query, ...options } = request;
    return this.retriever.retrieve(query, options, signal);
  }

  plan(request: ItineraryRequestBody, signal?: AbortSignal): Promise<ItineraryResult> {
    return this.planner.plan(request, signal);
  }

  listProfiles(): ProfileListItem[] {
    return listRetrievalProfiles(this.options.configsRoot);
  }

  getRetrievalConfig(profile?: string): RetrievalConfig {
    if (!profile) return this.retriever.getConfig();
    return resolveRetrievalConfig(profile, this.options.configsRoot);
  }

  health(): HealthResponse {
    const stats = this.graph.stats();
    return {
      status: this.loaded ? "ok" : "empty",
      uptime: process.uptime(),
      profile: this.options.profile ?? null,
      snapshot: {
        path: this.options.snapshotPath,
        builtAt: this.loaded?.builtAt ?? null,
        loadedAt: this.loaded?.loadedAt ?? null,
      },
      graph: {
        version: stats.version,
        nodes: stats.nodes,
        relationships: stats.relationships,
      },
      index: {
        version: this.index.version(),
        vectors: this.index.size(),
        dimension: this.index.dimension,
      },
    };
  }

  private async doReload(): Promise<ReloadResponse> {
    const start = Date.now();
    const snapshot = readSnapshot(this.options.snapshotPath);
    const result = await loadKnowledgeBase(snapshot, {
      graph: this.graph,
      index: this.index,
      encoder: this.options.encoder,
    });
    this.loaded = { builtAt: snapshot.meta.builtAt, loadedAt: new Date().toISOString() };
    console.log(`[server] Knowledge base reloaded in ${Date.now() - start}ms`);
    return { ...result, builtAt: snapshot.meta.builtAt };
  }
}
