/**
 * Mock HttpClient for unit tests.
 *
 * Provides:
 * - Request history tracking
 * - Response configuration per URL
 * - Network error simulation
 */

import { vi, type Mock } from "vitest";
import type { HttpClient, HttpRequestOptions } from "./network.js";

/**
 * Response configuration - stores DATA, not Response objects.
 * A fresh Response is constructed on each fetch() call.
 */
export interface ConfiguredResponse {
  readonly body?: string | Buffer;
  readonly status?: number; // Default: 200
  readonly headers?: Record<string, string>;
  readonly error?: Error; // Throw this instead of returning response
}

/** Record of an HTTP request made through the mock. */
export interface HttpRequestRecord {
  readonly url: string;
  readonly options?: HttpRequestOptions | undefined;
}

export interface MockHttpClient extends HttpClient {
  fetch: Mock<(url: string, options?: HttpRequestOptions) => Promise<Response>>;
  /** All requests in call order. */
  readonly requests: readonly HttpRequestRecord[];
  setResponse(url: string, config: ConfiguredResponse): void;
}

export interface MockHttpClientOptions {
  /** Pre-configured responses by exact URL. */
  readonly responses?: Record<string, ConfiguredResponse>;
  /** Default for unconfigured URLs. Default: { status: 404 } */
  readonly defaultResponse?: ConfiguredResponse;
}

function toResponse(config: ConfiguredResponse): Response {
  const body = config.body === undefined ? null : config.body;
  return new Response(body, {
    status: config.status ?? 200,
    ...(config.headers !== undefined && { headers: config.headers }),
  });
}

/**
 * Create a mock HttpClient.
 *
 * @example
 * const httpClient = createMockHttpClient({
 *   responses: {
 *     "https://example.test/asset.zip": { body: zipBuffer },
 *     "https://example.test/down": { error: new TypeError("fetch failed") },
 *   },
 * });
 */
export function createMockHttpClient(options?: MockHttpClientOptions): MockHttpClient {
  const requests: HttpRequestRecord[] = [];
  const responses = new Map<string, ConfiguredResponse>(
    options?.responses ? Object.entries(options.responses) : []
  );
  const defaultResponse: ConfiguredResponse = options?.defaultResponse ?? { status: 404 };

  return {
    requests,
    setResponse(url, config) {
      responses.set(url, config);
    },
    fetch: vi.fn(async (url: string, requestOptions?: HttpRequestOptions) => {
      requests.push({ url, options: requestOptions });
      const config = responses.get(url) ?? defaultResponse;
      if (config.error) {
        throw config.error;
      }
      return toResponse(config);
    }),
  };
}
