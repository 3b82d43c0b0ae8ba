/**
 * Network layer interface and implementation.
 *
 * HttpClient: HTTP GET requests with timeout support.
 */

import type { Logger } from "../logging/index.js";

/**
 * Options for HTTP requests.
 */
export interface HttpRequestOptions {
  /** Timeout in milliseconds until response headers arrive. Default: 30000 */
  readonly timeout?: number;
  /** Extra request headers */
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * HTTP client for making fetch requests with timeout support.
 */
export interface HttpClient {
  /**
   * HTTP GET request with timeout support.
   * The timeout covers the wait for response headers; reading the body is not bounded.
   *
   * @throws DOMException with name "AbortError" on timeout
   * @throws TypeError on network error (connection refused, DNS failure)
   *
   * @example
   * const response = await httpClient.fetch(url, { timeout: 300000 });
   * if (response.ok) {
   *   const data = await response.arrayBuffer();
   * }
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<Response>;
}

/**
 * Configuration for DefaultNetworkLayer.
 */
export interface NetworkLayerConfig {
  /** Default timeout for HTTP requests in ms. Default: 30000 */
  readonly defaultTimeout?: number;
  /** User-Agent header sent with every request */
  readonly userAgent?: string;
}

/**
 * Default implementation of HttpClient using the global fetch.
 */
export class DefaultNetworkLayer implements HttpClient {
  private readonly config: Required<NetworkLayerConfig>;

  constructor(
    private readonly logger: Logger,
    config: NetworkLayerConfig = {}
  ) {
    this.config = {
      defaultTimeout: config.defaultTimeout ?? 30000,
      userAgent: config.userAgent ?? "remembrances-installer",
    };
  }

  async fetch(url: string, options?: HttpRequestOptions): Promise<Response> {
    const timeout = options?.timeout ?? this.config.defaultTimeout;

    this.logger.debug("Fetch", { url, method: "GET" });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }, timeout);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: { "User-Agent": this.config.userAgent, ...options?.headers },
        redirect: "follow",
      });
      this.logger.debug("Fetch complete", { url, status: response.status });
      return response;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.warn("Fetch failed", { url, error: errorMessage });
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
