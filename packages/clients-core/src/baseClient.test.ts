import { describe, it, expect } from "vitest";
import { BaseClient, type ClientConfig, type RequestParams } from "./baseClient.js";

class ProbeClient extends BaseClient {
  path(params: RequestParams = {}) {
    return this.buildPath(params);
  }
  config(params: RequestParams = {}) {
    return this.buildConfig(params);
  }
}

const local: ClientConfig = { baseUrl: "http://localhost:3000" };

describe("BaseClient", () => {
  it.each([
    ["api/retrieval", "search", "/api/retrieval/search"],
    ["api/itineraries", undefined, "/api/itineraries"],
    ["api/knowledge-base", "reload", "/api/knowledge-base/reload"],
    ["api/config", "profiles", "/api/config/profiles"],
    ["health", undefined, "/health"],
  ])("resolves %s + %s to %s", (resource, path, expected) => {
    expect(new ProbeClient(resource, local).path({ path })).toBe(expected);
  });

  it("targets the configured server with a 30s default timeout", () => {
    const config = new ProbeClient("health", local).config();
    expect(config.baseURL).toBe("http://localhost:3000");
    expect(config.timeout).toBe(30000);
    expect(config.headers).toEqual({
      "Content-Type": "application/json",
      Accept: "application/json",
    });
  });

  it("honours a custom timeout", () => {
    const client = new ProbeClient("api/retrieval", { ...local, timeout: 2500 });
    expect(client.config().timeout).toBe(2500);
  });

  it("sends query params only when given", () => {
    const client = new ProbeClient("api/config", local);
    expect(client.config()).not.toHaveProperty("params");
    expect(client.config({ query: { profile: "walkable" } }).params).toEqual({ profile: "walkable" });
  });

  it("forwards the abort signal", () => {
    const client = new ProbeClient("api/retrieval", local);
    const controller = new AbortController();
    expect(client.config({ signal: controller.signal }).signal).toBe(controller.signal);
    expect(client.config()).not.toHaveProperty("signal");
  });

  describe("bearer token", () => {
    it("is sent when configured", () => {
      const client = new ProbeClient("api/knowledge-base", { ...local, token: "test-token" });
      expect(client.config().headers).toMatchObject({ Authorization: "Bearer test-token" });
    });

    it("can be set and cleared after construction", () => {
      const client = new ProbeClient("api/knowledge-base", local);
      expect(client.config().headers).not.toHaveProperty("Authorization");

      client.setToken("test-token");
      expect(client.config().headers).toMatchObject({ Authorization: "Bearer test-token" });

      client.setToken(undefined);
      expect(client.config().headers).not.toHaveProperty("Authorization");
    });
  });
});
