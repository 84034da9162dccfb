/**
 * HTTP Transport
 *
 * The client speaks to the platform through the `Transport` interface;
 * `FetchTransport` is the default implementation on the global fetch API.
 */

import { TransportError } from './errors.js';

export type HttpMethod = 'GET' | 'POST';

export interface FormFile {
  data: Uint8Array;
  filename?: string;
  contentType?: string;
}

export type TransportBody =
  | { kind: 'json'; value: unknown }
  | { kind: 'form'; fields: Record<string, string>; files: Record<string, FormFile> };

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  query?: Record<string, string>;
  body?: TransportBody;
}

export interface TransportResponse {
  status: number;
  /** Raw response body; the caller decodes it */
  text: string;
}

export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
  /** Fetch the raw bytes behind a URL, unauthenticated */
  download(url: string): Promise<Uint8Array>;
}

export interface FetchTransportOptions {
  timeoutMs: number;
  headers: Record<string, string>;
}

const DEFAULT_OPTIONS: FetchTransportOptions = {
  timeoutMs: 30000,
  headers: {},
};

export function buildUrl(url: string, query?: Record<string, string>): string {
  if (!query || Object.keys(query).length === 0) {
    return url;
  }
  const separator = url.includes('?') ? '&' : '?';
  return `${url}${separator}${new URLSearchParams(query).toString()}`;
}

function encodeBody(body: TransportBody): { payload: string | FormData; contentType?: string } {
  if (body.kind === 'json') {
    return {
      payload: JSON.stringify(body.value),
      contentType: 'application/json; charset=utf-8',
    };
  }

  // fetch sets the multipart boundary itself
  const form = new FormData();
  for (const [name, value] of Object.entries(body.fields)) {
    form.append(name, value);
  }
  for (const [name, file] of Object.entries(body.files)) {
    const blob = new Blob([file.data], { type: file.contentType ?? 'application/octet-stream' });
    form.append(name, blob, file.filename ?? name);
  }
  return { payload: form };
}

export class FetchTransport implements Transport {
  private readonly options: FetchTransportOptions;

  constructor(options?: Partial<FetchTransportOptions>) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Fetch `url` and read the response with `read`. The timeout covers the body as well as the headers.
   */
  private async exchange<T>(url: string, init: RequestInit, read: (response: Response) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      return await read(response);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request timed out after ${this.options.timeoutMs}ms`, {
          cause: error,
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Request to ${url} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const headers: Record<string, string> = { ...this.options.headers };
    let payload: string | FormData | undefined;

    if (request.body) {
      const encoded = encodeBody(request.body);
      payload = encoded.payload;
      if (encoded.contentType) {
        headers['Content-Type'] = encoded.contentType;
      }
    }

    const url = buildUrl(request.url, request.query);
    return this.exchange(
      url,
      {
        method: request.method,
        headers: { ...headers, ...request.headers },
        body: payload,
      },
      async (response) => ({ status: response.status, text: await response.text() })
    );
  }

  async download(url: string): Promise<Uint8Array> {
    return this.exchange(url, { method: 'GET', headers: this.options.headers }, async (response) => {
      if (!response.ok) {
        throw new TransportError(`Download of ${url} failed with HTTP ${response.status}`, {
          status: response.status,
        });
      }
      return new Uint8Array(await response.arrayBuffer());
    });
  }
}
