import axios, { type AxiosRequestConfig } from "axios";
import { CollaboratorError, describeError } from "@skyroute/routing";

export interface ClientConfig {
  /** Base URL of the upstream API (e.g., "https://api.example.com/v1") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 5000) */
  timeout?: number;
  /** API key sent as a query parameter */
  apiKey?: string;
  /** Query parameter name for the API key (default: "key") */
  apiKeyParam?: string;
}

export interface RequestParams {
  path?: string;
  query?: Record<string, unknown>;
}

/**
 * Shared GET plumbing for the lookup services. Transport failures surface
 * as CollaboratorError tagged with the collaborator name.
 */
export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;
  protected apiKey?: string;
  protected apiKeyParam: string;

  constructor(
    readonly collaborator: string,
    resource: string,
    config: ClientConfig,
  ) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 5000;
    this.apiKey = config.apiKey;
    this.apiKeyParam = config.apiKeyParam ?? "key";
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        Accept: "application/json",
      },
    };

    const query: Record<string, unknown> = { ...params.query };
    if (this.apiKey) {
      query[this.apiKeyParam] = this.apiKey;
    }
    if (Object.keys(query).length > 0) {
      config.params = query;
    }

    return config;
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    const path = this.buildPath(params);
    const config = this.buildConfig(params);
    try {
      const response = await axios.get<T>(path, config);
      return response.data;
    } catch (err) {
      throw new CollaboratorError(this.collaborator, describeError(err), err);
    }
  }
}
