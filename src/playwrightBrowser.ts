import * as fs from 'fs';
import { chromium, type Browser, type BrowserContext, type Locator, type Page } from 'playwright';
import type { AppConfig } from './config/env';
import { UIInteractionError } from './errors';
import type { StorageStateSource } from './session/sessionPersistence';
import type { ClickOptions, ElementSet, UiDriver } from './types';
import logger from './utils/logger';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

async function wrap<T>(action: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new UIInteractionError(action, error);
  }
}

/** ElementSet over a Playwright locator. Every failure surfaces as UIInteractionError. */
export class PlaywrightElementSet implements ElementSet {
  constructor(
    private readonly locator: Locator,
    private readonly description: string,
  ) {}

  count(): Promise<number> {
    return wrap(`count ${this.description}`, () => this.locator.count());
  }

  first(): ElementSet {
    return new PlaywrightElementSet(this.locator.first(), `${this.description} >> first`);
  }

  nth(index: number): ElementSet {
    return new PlaywrightElementSet(this.locator.nth(index), `${this.description} >> nth=${index}`);
  }

  locate(selector: string): ElementSet {
    return new PlaywrightElementSet(this.locator.locator(selector), `${this.description} >> ${selector}`);
  }

  click(options?: ClickOptions): Promise<void> {
    return wrap(`click ${this.description}`, () => this.locator.click(options));
  }

  scriptClick(): Promise<void> {
    return wrap(`scripted click ${this.description}`, () =>
      this.locator.evaluate((element) => {
        if (element instanceof HTMLElement) {
          element.click();
        }
      }),
    );
  }

  fill(text: string): Promise<void> {
    return wrap(`fill ${this.description}`, () => this.locator.fill(text));
  }

  async selectOption(label: string): Promise<void> {
    await wrap(`select "${label}" in ${this.description}`, () => this.locator.selectOption({ label }));
  }

  check(options?: ClickOptions): Promise<void> {
    return wrap(`check ${this.description}`, () => this.locator.check(options));
  }

  uncheck(options?: ClickOptions): Promise<void> {
    return wrap(`uncheck ${this.description}`, () => this.locator.uncheck(options));
  }

  isChecked(): Promise<boolean> {
    return wrap(`read checked state of ${this.description}`, () => this.locator.isChecked());
  }

  getAttribute(name: string): Promise<string | null> {
    return wrap(`read ${name} of ${this.description}`, () => this.locator.getAttribute(name));
  }

  innerText(): Promise<string> {
    return wrap(`read text of ${this.description}`, () => this.locator.innerText());
  }

  innerHtml(): Promise<string> {
    return wrap(`read HTML of ${this.description}`, () => this.locator.innerHTML());
  }
}

export class PlaywrightDriver implements UiDriver {
  constructor(private readonly page: Page) {}

  locate(selector: string): ElementSet {
    return new PlaywrightElementSet(this.page.locator(selector), selector);
  }

  evaluate(script: string): Promise<unknown> {
    return wrap('evaluate script', () => this.page.evaluate(script));
  }

  waitForTimeout(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms);
  }

  currentUrl(): string {
    return this.page.url();
  }
}

/**
 * Owns the Chromium instance, its context and the single page the wizard
 * drives. Restores a saved session when one exists.
 */
export class PlaywrightBrowser implements StorageStateSource {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  constructor(
    private readonly options: AppConfig['browser'],
    private readonly sessionStatePath?: string,
  ) {}

  /**
   * Initialize browser and context
   */
  async initialize(): Promise<void> {
    try {
      this.browser = await chromium.launch({
        headless: this.options.headless,
        args: [
          '--no-sandbox',
          '--disable-setuid-sandbox',
          '--disable-dev-shm-usage',
          '--disable-accelerated-2d-canvas',
          '--no-first-run',
          '--no-zygote',
          '--disable-gpu',
        ],
      });

      const storageState =
        this.sessionStatePath && fs.existsSync(this.sessionStatePath) ? this.sessionStatePath : undefined;
      if (storageState) {
        logger.info(`Restoring session from ${storageState}`);
      }

      this.context = await this.browser.newContext({
        viewport: this.options.viewport,
        userAgent: USER_AGENT,
        storageState,
      });

      this.page = await this.context.newPage();
      this.page.setDefaultTimeout(this.options.timeout);

      logger.info('Playwright browser initialized successfully');
    } catch (error) {
      logger.error('Failed to initialize Playwright browser:', error);
      throw error;
    }
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new Error('Browser not initialized');
    }
    return this.page;
  }

  get driver(): UiDriver {
    return new PlaywrightDriver(this.requirePage());
  }

  /**
   * Navigate to a job posting
   */
  async openJob(url: string): Promise<void> {
    const page = this.requirePage();
    logger.info(`Navigating to job: ${url}`);
    await page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  async saveStorageState(filePath: string): Promise<void> {
    if (!this.context) {
      throw new Error('Browser not initialized');
    }
    await this.context.storageState({ path: filePath });
  }

  /**
   * Cleanup browser resources
   */
  async cleanup(): Promise<void> {
    try {
      if (this.page) {
        await this.page.close();
        this.page = null;
      }
      if (this.context) {
        await this.context.close();
        this.context = null;
      }
      if (this.browser) {
        await this.browser.close();
        this.browser = null;
      }
      logger.info('Browser cleanup completed');
    } catch (error) {
      logger.error('Error during browser cleanup:', error);
    }
  }
}
