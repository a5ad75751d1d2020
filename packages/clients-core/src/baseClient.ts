import axios, { type AxiosRequestConfig } from "axios";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Optional bearer token, for deployments behind an auth proxy */
  token?: string;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
  query?: Record<string, string | number | undefined>;
  /** Cancels the request; the server aborts the work in flight */
  signal?: AbortSignal;
}

/** A non-2xx response, carrying the server's `{ message }` */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function toApiError(err: unknown): unknown {
  if (!axios.isAxiosError(err) || !err.response) return err;
  const data: unknown = err.response.data;
  let message = err.message;
  let details: unknown;
  if (typeof data === "object" && data !== null) {
    if ("message" in data && typeof data.message === "string") message = data.message;
    if ("details" in data) details = data.details;
  }
  return new ApiError(message, err.response.status, details);
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;
  protected token?: string;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 30000;
    this.token = config.token;
  }

  public setToken(token: string | undefined): void {
    this.token = token;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    if (this.token) headers["Authorization"] = "Bearer " + this.token;

    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers,
    };
    if (params.query) config.params = params.query;
    if (params.signal) config.signal = params.signal;
    return config;
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    try {
      const response = await axios.get<T>(this.buildPath(params), this.buildConfig(params));
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    try {
      const response = await axios.post<T>(this.buildPath(params), params.body, this.buildConfig(params));
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }
}
