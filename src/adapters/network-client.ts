/**
 * Minimal JSON-over-HTTP client shared by the tool adapters.
 *
 * Every failure is raised as an AdapterError so the tool manager can turn it
 * into a failed invocation result.
 */

import { Logger } from '@nestjs/common';
import { AdapterError } from '../errors/network-agent.errors';
import { QueryFilters } from '../interfaces';
import { isRecord } from '../utils/records';

export interface NetworkClientOptions {
  baseUrl: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

export class NetworkClient {
  private readonly logger = new Logger(NetworkClient.name);
  private readonly baseUrl: string;

  constructor(private readonly options: NetworkClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  buildUrl(path: string, params: QueryFilters = {}): string {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (Array.isArray(value)) {
        value.forEach((item) => search.append(key, item));
      } else {
        search.append(key, String(value));
      }
    }
    const query = search.toString();
    return `${this.baseUrl}/${path.replace(/^\/+/, '')}${query ? `?${query}` : ''}`;
  }

  /**
   * GET a JSON object. The request is aborted after timeoutMs or when the
   * caller's signal fires, whichever comes first.
   */
  async get(path: string, params?: QueryFilters, signal?: AbortSignal): Promise<Record<string, unknown>> {
    const url = this.buildUrl(path, params);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    this.logger.debug(`GET ${url}`);

    try {
      if (signal?.aborted) {
        throw new AdapterError('Timeout', `Request to ${url} was cancelled`);
      }

      const response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json', ...this.options.headers },
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        throw new AdapterError(
          classifyStatus(response.status),
          `${response.status} ${response.statusText || 'error'} from ${url}${text ? `: ${text.slice(0, 200)}` : ''}`,
        );
      }

      const body: unknown = await response.json();
      if (!isRecord(body)) {
        throw new AdapterError('BackendError', `Unexpected response body from ${url}`);
      }
      return body;
    } catch (error) {
      if (error instanceof AdapterError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new AdapterError('Timeout', `Request to ${url} timed out`, error);
      }
      throw new AdapterError(
        'BackendError',
        `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function classifyStatus(status: number): 'NotFound' | 'Unauthorized' | 'BackendError' {
  if (status === 404) return 'NotFound';
  if (status === 401 || status === 403) return 'Unauthorized';
  return 'BackendError';
}
