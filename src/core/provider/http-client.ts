/**
 * HttpClient - minimal request capability used by weather sources
 */

import { HttpTimeoutError } from "../errors/pipeline-errors";

export interface HttpResponse {
  status: number;
  ok: boolean;
  body: string;
}

export interface HttpRequestOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs: number;
}

export interface HttpClient {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

/**
 * HttpClient over the global fetch, with an AbortController timeout
 * covering both the response headers and the body.
 */
export class FetchHttpClient implements HttpClient {
  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const response = await fetch(url, { signal: controller.signal });
      const body = await response.text();
      return { status: response.status, ok: response.ok, body };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HttpTimeoutError(withoutQuery(url), options.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Strip the query string so credentials never reach logs. */
export function withoutQuery(url: string): string {
  const index = url.indexOf("?");
  return index >= 0 ? url.slice(0, index) : url;
}
