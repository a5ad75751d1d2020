import { describe, it, expect, beforeEach, vi } from "vitest";
import axios, { AxiosError, AxiosHeaders, type AxiosResponse } from "axios";
import { ApiError } from "./baseClient.js";
import { ConfigClient } from "./configClient.js";
import { HealthClient } from "./healthClient.js";
import { ItineraryClient } from "./itineraryClient.js";
import { KnowledgeBaseClient } from "./knowledgeBaseClient.js";
import { RetrievalClient } from "./retrievalClient.js";

vi.mock("axios", async (importOriginal) => {
  const actual = await importOriginal<typeof import("axios")>();
  return {
    ...actual,
    default: { ...actual.default, get: vi.fn(), post: vi.fn() },
  };
});

// ─── Helpers ────────────────────────────────────────────────────────────────

const config = { baseUrl: "http://localhost:3000" };

function ok<T>(data: T): AxiosResponse<T> {
  return { data, status: 200, statusText: "OK", headers: {}, config: { headers: new AxiosHeaders() } };
}

function failed(status: number, data: unknown): AxiosError {
  const requestConfig = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_REQUEST", requestConfig, null, {
    data,
    status,
    statusText: "Error",
    headers: {},
    config: requestConfig,
  });
}

const emptyResult = {
  candidates: [],
  metadata: {
    queryHash: "abc123",
    degraded: false,
    degradationReasons: [],
    semanticHits: 0,
    graphExpansions: 0,
    elapsedMs: 1,
    snapshot: { indexVersion: 1, graphVersion: 1 },
  },
};

beforeEach(() => {
  vi.mocked(axios.get).mockReset();
  vi.mocked(axios.post).mockReset();
});

// ─── Domain clients ─────────────────────────────────────────────────────────

describe("RetrievalClient", () => {
  it("posts the search request", async () => {
    vi.mocked(axios.post).mockResolvedValue(ok(emptyResult));
    const controller = new AbortController();

    const result = await new RetrievalClient(config).search({ query: "cozy book cafe", topK: 5 }, controller.signal);

    expect(result).toEqual(emptyResult);
    expect(axios.post).toHaveBeenCalledWith(
      "/api/retrieval/search",
      { query: "cozy book cafe", topK: 5 },
      expect.objectContaining({ baseURL: "http://localhost:3000", signal: controller.signal }),
    );
  });

  it("turns an error response into an ApiError", async () => {
    vi.mocked(axios.post).mockRejectedValue(
      failed(422, { message: "Validation failed", details: { "body.query": { message: "'query' is required" } } }),
    );

    const error = await new RetrievalClient(config).search({ query: "" }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    if (!(error instanceof ApiError)) return;
    expect(error.message).toBe("Validation failed");
    expect(error.status).toBe(422);
    expect(error.details).toEqual({ "body.query": { message: "'query' is required" } });
  });

  it("passes through errors without a response", async () => {
    const networkError = new Error("socket hang up");
    vi.mocked(axios.post).mockRejectedValue(networkError);

    await expect(new RetrievalClient(config).search({ query: "sauna" })).rejects.toBe(networkError);
  });
});

describe("ItineraryClient", () => {
  it("posts to the itineraries resource root", async () => {
    const response = {
      retrieval: emptyResult,
      context: { text: "", includedCount: 0, droppedCount: 0 },
      destination: null,
      narrative: null,
      generationError: "Narrative generator is not configured (missing API key)",
    };
    vi.mocked(axios.post).mockResolvedValue(ok(response));

    const origin = { name: "Kamppi", lat: 60.169, lng: 24.932 };
    expect(await new ItineraryClient(config).plan({ query: "sea views", origin })).toEqual(response);
    expect(axios.post).toHaveBeenCalledWith(
      "/api/itineraries",
      { query: "sea views", origin },
      expect.objectContaining({ baseURL: "http://localhost:3000" }),
    );
  });
});

describe("KnowledgeBaseClient", () => {
  it("posts a reload without a body", async () => {
    vi.mocked(axios.post).mockResolvedValue(ok({ vectors: 2 }));
    await new KnowledgeBaseClient(config).reload();
    expect(axios.post).toHaveBeenCalledWith("/api/knowledge-base/reload", undefined, expect.any(Object));
  });
});

describe("ConfigClient", () => {
  it("lists profiles", async () => {
    const profiles = [{ name: "graph-heavy", description: "Favour reachable places" }];
    vi.mocked(axios.get).mockResolvedValue(ok(profiles));

    expect(await new ConfigClient(config).listProfiles()).toEqual(profiles);
    expect(axios.get).toHaveBeenCalledWith("/api/config/profiles", expect.any(Object));
  });

  it("asks for a named profile through the query string", async () => {
    vi.mocked(axios.get).mockResolvedValue(ok({ alpha: 0.4 }));
    await new ConfigClient(config).getRetrievalConfig("graph-heavy");
    expect(axios.get).toHaveBeenCalledWith(
      "/api/config/retrieval",
      expect.objectContaining({ params: { profile: "graph-heavy" } }),
    );
  });
});

describe("HealthClient", () => {
  it("gets /health", async () => {
    vi.mocked(axios.get).mockResolvedValue(ok({ status: "ok" }));
    expect(await new HealthClient(config).getHealth()).toEqual({ status: "ok" });
    expect(axios.get).toHaveBeenCalledWith("/health", expect.any(Object));
  });

  it("is not ready while the server runs without a snapshot", async () => {
    vi.mocked(axios.get).mockResolvedValue(ok({ status: "empty", index: { version: 0, vectors: 0, dimension: null } }));
    expect(await new HealthClient(config).isReady()).toBe(false);
  });

  it("is ready once vectors are loaded", async () => {
    vi.mocked(axios.get).mockResolvedValue(ok({ status: "ok", index: { version: 2, vectors: 3, dimension: 256 } }));
    expect(await new HealthClient(config).isReady()).toBe(true);
  });
});
