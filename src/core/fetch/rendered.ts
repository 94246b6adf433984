// src/core/fetch/rendered.ts
import type { Logger } from '../logging/logger.js';
import type { FetchOutcome } from '../types/index.js';
import type { PageSource } from './browser.js';
import { extractRenderedGoalText } from './rendered-text.js';
import { withDeadline, withRetry } from './retry.js';

export interface RenderedFetcherOptions {
  maxRetries: number;
  retryDelayMs: number;
  timeoutMs: number;  // per attempt; the browser is torn down when it elapses or the signal aborts
  logger?: Logger;
}

/**
 * Fetches the goal text of a JavaScript-rendered page. Each attempt renders the page
 * under a deadline; the browser is closed between failed attempts so the next one starts clean.
 */
export class RenderedFetcher {
  constructor(private source: PageSource, private options: RenderedFetcherOptions) {}

  async fetch(url: string, signal?: AbortSignal): Promise<FetchOutcome> {
    const { logger } = this.options;

    const result = await withRetry(
      async () => {
        try {
          const html = await withDeadline(
            this.source.render(url),
            this.options.timeoutMs,
            () => this.source.close(),
            signal
          );
          return extractRenderedGoalText(html);
        } catch (error) {
          await this.closeQuietly();
          throw error;
        }
      },
      {
        attempts: this.options.maxRetries,
        delayMs: this.options.retryDelayMs,
        label: 'Rendered fetch',
        logger,
        signal,
      }
    );

    if (result.ok) {
      logger?.debug(`Rendered goal text: ${result.value.split('\n').length} lines`);
      return { ok: true, content: result.value, attempts: result.attempts };
    }
    return { ok: false, error: result.error, attempts: result.attempts };
  }

  async close(): Promise<void> {
    await this.source.close();
  }

  private async closeQuietly(): Promise<void> {
    try {
      await this.source.close();
    } catch (error) {
      this.options.logger?.debug(`Browser close failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
