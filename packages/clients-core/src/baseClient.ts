import axios, { type AxiosRequestConfig } from "axios";

export interface ClientConfig {
  /** Base URL for the navigation server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeout?: number;
}

export interface RequestParams {
  /** Sub-path under the resource; array segments are URL-encoded */
  path?: string | string[];
  body?: unknown;
  query?: Record<string, unknown>;
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 10000;
  }

  protected buildPath(params: RequestParams): string {
    const path = Array.isArray(params.path)
      ? params.path.map(encodeURIComponent).join("/")
      : params.path;
    return path ? this.resource + "/" + path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
    };

    if (params.query) {
      config.params = params.query;
    }

    return config;
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    const response = await axios.get<T>(this.buildPath(params), this.buildConfig(params));
    return response.data;
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    const response = await axios.post<T>(this.buildPath(params), params.body ?? {}, this.buildConfig(params));
    return response.data;
  }

  public async delete(params: RequestParams = {}): Promise<void> {
    await axios.delete(this.buildPath(params), this.buildConfig(params));
  }
}
