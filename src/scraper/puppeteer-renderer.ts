import puppeteer, { Browser, Page } from 'puppeteer-core';
import { config } from '../utils/config.js';
import { errorMessage, JobFatalError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { PageRenderer, RenderedPage, RenderOptions } from './page-renderer.js';

export interface PuppeteerRendererOptions {
  /** Remote browser to connect to (takes precedence) */
  wsEndpoint?: string;
  /** Local Chrome/Chromium binary to launch */
  executablePath?: string;
}

/**
 * PageRenderer backed by puppeteer-core.
 *
 * One browser is shared by every render; each render gets its own page,
 * closed when the render ends or its signal aborts.
 */
export class PuppeteerRenderer implements PageRenderer {
  private browser: Promise<Browser> | null = null;
  private readonly wsEndpoint: string;
  private readonly executablePath: string;

  constructor(options: PuppeteerRendererOptions = {}) {
    this.wsEndpoint = options.wsEndpoint ?? config.browser.wsEndpoint;
    this.executablePath = options.executablePath ?? config.browser.executablePath;
  }

  async render(url: string, options: RenderOptions, signal?: AbortSignal): Promise<RenderedPage> {
    signal?.throwIfAborted();

    const browser = await this.getBrowser();
    const page = await browser.newPage();
    const onAbort = (): void => {
      this.closePage(page, url);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      if (options.userAgent) {
        await page.setUserAgent(options.userAgent);
      }
      await page.setViewport({ width: 1920, height: 1080 });

      const response = await page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: options.navigationTimeoutMs,
      });

      let networkIdle = true;
      try {
        await page.waitForNetworkIdle({ idleTime: 500, timeout: options.navigationTimeoutMs });
      } catch (error) {
        signal?.throwIfAborted();
        networkIdle = false;
        logger.debug('Network did not go idle, continuing', { url, error: errorMessage(error) });
      }

      let selectorFound = false;
      if (options.waitForSelector) {
        try {
          await page.waitForSelector(options.waitForSelector, { timeout: options.selectorTimeoutMs });
          selectorFound = true;
        } catch (error) {
          signal?.throwIfAborted();
          logger.debug('Selector not found on page', {
            url,
            selector: options.waitForSelector,
            error: errorMessage(error),
          });
        }
      }

      const html = await page.content();
      const title = await page.title();
      const pageState = options.stateVariable
        ? await readPageState(page, options.stateVariable)
        : null;

      return {
        html,
        httpStatusCode: response ? response.status() : null,
        finalUrl: page.url(),
        title,
        pageState,
        signals: { networkIdle, selectorFound },
      };
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.closePage(page, url);
    }
  }

  async close(): Promise<void> {
    if (!this.browser) return;

    const browser = await this.browser;
    this.browser = null;

    if (this.wsEndpoint) {
      await browser.disconnect();
    } else {
      await browser.close();
    }
    logger.info('Browser released');
  }

  private getBrowser(): Promise<Browser> {
    if (!this.browser) {
      this.browser = this.openBrowser().catch((error: unknown) => {
        this.browser = null;
        throw error;
      });
    }
    return this.browser;
  }

  private async openBrowser(): Promise<Browser> {
    if (this.wsEndpoint) {
      logger.info('Connecting to remote browser');
      return puppeteer.connect({ browserWSEndpoint: this.wsEndpoint });
    }
    if (this.executablePath) {
      logger.info('Launching local browser', { executablePath: this.executablePath });
      return puppeteer.launch({
        executablePath: this.executablePath,
        headless: true,
        args: ['--no-sandbox', '--disable-dev-shm-usage'],
      });
    }
    throw new JobFatalError('Browser crawling needs BROWSER_WS_ENDPOINT or BROWSER_EXECUTABLE_PATH');
  }

  private closePage(page: Page, url: string): void {
    if (page.isClosed()) return;
    page.close().catch((error: unknown) => {
      logger.debug('Failed to close page', { url, error: errorMessage(error) });
    });
  }
}

async function readPageState(page: Page, variable: string): Promise<unknown> {
  const serialized = await page.evaluate((name: string) => {
    const value: unknown = Reflect.get(window, name);
    return value === undefined || value === null ? null : JSON.stringify(value);
  }, variable);

  if (!serialized) return null;

  try {
    return JSON.parse(serialized);
  } catch (error) {
    logger.debug('Page state is not valid JSON', { variable, error: errorMessage(error) });
    return null;
  }
}
