// src/core/fetch/markup.ts
import axios, { type AxiosInstance } from 'axios';
import { DEFAULT_USER_AGENT, MARKUP_REQUEST_TIMEOUT } from '../config/constants.js';
import { BoostError, ErrorCode, toBoostError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { FetchOutcome } from '../types/index.js';
import { withRetry } from './retry.js';

export interface MarkupFetcherOptions {
  maxRetries: number;
  retryDelayMs: number;
  timeoutMs?: number;
  http?: AxiosInstance;
  logger?: Logger;
}

export class MarkupFetcher {
  private http: AxiosInstance;

  constructor(private options: MarkupFetcherOptions) {
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs ?? MARKUP_REQUEST_TIMEOUT,
        maxRedirects: 10,
        headers: {
          'User-Agent': DEFAULT_USER_AGENT,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
        },
      });
  }

  async fetch(url: string, signal?: AbortSignal): Promise<FetchOutcome> {
    const result = await withRetry(
      async () => {
        let body: string;
        try {
          const response = await this.http.get<string>(url, {
            responseType: 'text',
            // Keep the raw body even when a server labels it JSON
            transformResponse: (data: unknown) => data,
            signal,
          });
          body = typeof response.data === 'string' ? response.data : String(response.data ?? '');
        } catch (error) {
          throw toBoostError(error);
        }

        if (body.trim().length === 0) {
          throw new BoostError(ErrorCode.NETWORK_ERROR, 'Empty response body', true, undefined, { url });
        }
        return body;
      },
      {
        attempts: this.options.maxRetries,
        delayMs: this.options.retryDelayMs,
        label: 'Markup fetch',
        logger: this.options.logger,
        signal,
      }
    );

    if (result.ok) {
      this.options.logger?.debug(`Markup fetched: ${Buffer.byteLength(result.value)} bytes`);
      return { ok: true, content: result.value, attempts: result.attempts };
    }
    return { ok: false, error: result.error, attempts: result.attempts };
  }
}
