import fetch from 'node-fetch';
import { GatewayUnavailableError, getErrorMessage } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { BackendSupervisor } from './BackendSupervisor.js';
import { FetchLike, ModelGateway } from './ModelGateway.js';

export interface OllamaGatewayOptions {
  baseUrl: string;
  model: string;
  requestTimeoutMs: number;
}

function extractResponseText(data: unknown): string {
  if (typeof data === 'object' && data !== null && 'response' in data && typeof data.response === 'string') {
    return data.response;
  }
  return '';
}

/**
 * Non-streaming client for Ollama's `/api/generate`
 */
export class OllamaGateway implements ModelGateway {
  constructor(
    private options: OllamaGatewayOptions,
    private supervisor: BackendSupervisor,
    private fetchImpl: FetchLike = fetch
  ) {}

  get model(): string {
    return this.options.model;
  }

  async complete(prompt: string): Promise<string> {
    await this.supervisor.ensureRunning();

    const url = generateEndpoint(this.options.baseUrl);
    let response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.options.model, prompt, stream: false }),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (error) {
      throw new GatewayUnavailableError(`Model backend unreachable at ${url}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      const detail = await this.readErrorBody(response.text.bind(response));
      throw new GatewayUnavailableError(
        `Model backend returned HTTP ${response.status} ${response.statusText}${detail ? `: ${detail}` : ''}`
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new GatewayUnavailableError(`Model backend sent an unreadable response: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    const text = extractResponseText(data);
    logger.debug('Model response received', { model: this.options.model, characters: text.length });
    return text;
  }

  private async readErrorBody(read: () => Promise<string>): Promise<string> {
    try {
      return (await read()).trim();
    } catch (error) {
      logger.debug('Could not read error body from model backend', { reason: getErrorMessage(error) });
      return '';
    }
  }
}

/** Resolve `api/generate` under the base URL, keeping any path prefix. */
export function generateEndpoint(baseUrl: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return new URL('api/generate', base).toString();
}
