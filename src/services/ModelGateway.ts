/**
 * Text-generation backend that writes and repairs script bodies
 */
export interface ModelGateway {
  /** Send a prompt and return the raw response text */
  complete(prompt: string): Promise<string>;
}

export interface HttpRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

/**
 * The subset of `fetch` the gateway and supervisor rely on
 */
export type FetchLike = (url: string, init?: HttpRequestInit) => Promise<HttpResponseLike>;
