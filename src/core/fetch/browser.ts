// src/core/fetch/browser.ts
import { chromium, type Browser, type BrowserContext, type Page } from 'playwright';
import { DEFAULT_USER_AGENT } from '../config/constants.js';
import { BoostError, ErrorCode } from '../errors.js';
import type { Logger } from '../logging/logger.js';

type NavigationStrategy = { waitUntil: 'domcontentloaded' | 'load' | 'networkidle'; timeout: number };

const NAVIGATION_STRATEGIES: NavigationStrategy[] = [
  { waitUntil: 'domcontentloaded', timeout: 30000 },
  { waitUntil: 'load', timeout: 45000 },
  { waitUntil: 'networkidle', timeout: 60000 },
];

const BLOCKED_RESOURCES = new Set(['image', 'stylesheet', 'font', 'media']);
const SETTLE_DELAY_MS = 5000;

/** Something that can turn a URL into rendered HTML. */
export interface PageSource {
  render(url: string): Promise<string>;
  close(): Promise<void>;
}

export class BrowserManager {
  private browser?: Browser;
  private context?: BrowserContext;

  constructor(private logger?: Logger) {}

  async launch(): Promise<BrowserContext> {
    if (this.context) {
      return this.context;
    }

    try {
      this.logger?.debug('Launching headless browser');
      this.browser = await chromium.launch({
        headless: true,
        args: [
          '--no-sandbox',
          '--disable-dev-shm-usage',
          '--disable-gpu',
          '--disable-extensions',
          '--no-first-run',
        ],
      });
      this.context = await this.browser.newContext({
        userAgent: DEFAULT_USER_AGENT,
        viewport: { width: 1920, height: 1080 },
      });
    } catch (error) {
      await this.close();
      throw new BoostError(
        ErrorCode.BROWSER_FAILED,
        `Failed to launch browser: ${error instanceof Error ? error.message : 'Unknown error'}`,
        true,
        'Install a browser with `npx playwright install chromium`, or run with --no-js'
      );
    }

    return this.context;
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.context = undefined;
    this.browser = undefined;
    if (browser) {
      await browser.close();
    }
  }
}

export class PageRenderer implements PageSource {
  constructor(private manager: BrowserManager, private logger?: Logger) {}

  async render(url: string): Promise<string> {
    const context = await this.manager.launch();
    const page = await context.newPage();

    try {
      await page.route('**/*', (route) => {
        if (BLOCKED_RESOURCES.has(route.request().resourceType())) {
          return route.abort();
        }
        return route.continue();
      });

      await this.navigate(page, url);

      await page.waitForSelector('body', { timeout: 10000 }).catch(() => {
        // Continue even if body never attached
      });
      await page.waitForTimeout(SETTLE_DELAY_MS);

      return await page.content();
    } finally {
      await page.close().catch((error: unknown) => {
        this.logger?.debug(`Page close failed: ${error instanceof Error ? error.message : String(error)}`);
      });
    }
  }

  async close(): Promise<void> {
    await this.manager.close();
  }

  private async navigate(page: Page, url: string): Promise<void> {
    let lastError: unknown;
    for (const strategy of NAVIGATION_STRATEGIES) {
      try {
        await page.goto(url, strategy);
        this.logger?.debug(`Navigation succeeded with ${strategy.waitUntil}`);
        return;
      } catch (error) {
        lastError = error;
        this.logger?.debug(`Navigation with ${strategy.waitUntil} failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    throw new BoostError(
      ErrorCode.NETWORK_ERROR,
      `All navigation strategies failed for ${url}: ${lastError instanceof Error ? lastError.message : String(lastError)}`,
      true
    );
  }
}
