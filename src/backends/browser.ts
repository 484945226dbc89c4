/**
 * src/backends/browser.ts
 * Headless browser over a remote DevTools endpoint (browserless or a
 * chrome started with --remote-debugging-port). Nothing is launched locally.
 */

import puppeteer, { type Browser, type HTTPResponse, type Page } from "puppeteer-core";
import { NotFoundError, ProviderUnavailableError, errorMessage } from "../errors.js";
import { createLogger } from "../server/logger.js";
import { abortReason } from "../utils/timeout.js";
import type { PageFetcher } from "./page-fetcher.js";

const log = createLogger("browser");

export interface FormSubmission {
  url: string;
  inputSelector: string;
  submitSelector: string;
  value: string;
  /** Present once the results have rendered. */
  resultSelector: string;
}

export interface BrowserSession extends PageFetcher {
  /** Fill a single-field form, submit it and return the resulting HTML. */
  submitForm(form: FormSubmission, signal?: AbortSignal): Promise<string>;
  close(): Promise<void>;
}

export class RemoteBrowserSession implements BrowserSession {
  private browser: Promise<Browser> | undefined;

  constructor(
    private readonly wsEndpoint: string,
    private readonly navigationTimeoutMs = 30_000,
  ) {}

  /** The cached connection while it is alive, otherwise a fresh one. */
  private async connect(): Promise<Browser> {
    const cached = this.browser && (await this.browser.catch(() => undefined));
    if (cached?.connected) return cached;

    const pending = puppeteer.connect({ browserWSEndpoint: this.wsEndpoint });
    this.browser = pending;
    pending.catch(() => {
      if (this.browser === pending) this.browser = undefined;
    });
    return pending;
  }

  private async withPage<T>(signal: AbortSignal | undefined, work: (page: Page) => Promise<T>): Promise<T> {
    if (signal?.aborted) throw abortReason(signal);

    let browser: Browser;
    try {
      browser = await this.connect();
    } catch (err) {
      throw new ProviderUnavailableError(`browser connect failed: ${errorMessage(err)}`, { cause: err });
    }

    const page = await browser.newPage();
    const closePage = () => {
      page.close().catch((err: unknown) => log.debug("page close failed", { error: errorMessage(err) }));
    };
    // aborted while connecting or opening the page
    if (signal?.aborted) {
      closePage();
      throw abortReason(signal);
    }
    page.setDefaultTimeout(this.navigationTimeoutMs);
    signal?.addEventListener("abort", closePage, { once: true });

    try {
      return await work(page);
    } catch (err) {
      if (signal?.aborted) throw abortReason(signal);
      if (err instanceof NotFoundError || err instanceof ProviderUnavailableError) throw err;
      throw new ProviderUnavailableError(`browser: ${errorMessage(err)}`, { cause: err });
    } finally {
      signal?.removeEventListener("abort", closePage);
      if (!page.isClosed()) closePage();
    }
  }

  fetchPage(url: string, signal?: AbortSignal): Promise<string> {
    return this.withPage(signal, async (page) => {
      const res = await page.goto(url, { waitUntil: "networkidle2" });
      checkStatus(url, res);
      return page.content();
    });
  }

  submitForm(form: FormSubmission, signal?: AbortSignal): Promise<string> {
    return this.withPage(signal, async (page) => {
      const res = await page.goto(form.url, { waitUntil: "domcontentloaded" });
      checkStatus(form.url, res);

      await page.waitForSelector(form.inputSelector);
      await page.$eval(form.inputSelector, (el) => {
        if (el instanceof HTMLInputElement) el.value = "";
      });
      await page.type(form.inputSelector, form.value);
      await page.click(form.submitSelector);

      try {
        await page.waitForSelector(form.resultSelector);
      } catch (err) {
        throw new ProviderUnavailableError(`no results rendered at ${form.url}`, { cause: err });
      }
      return page.content();
    });
  }

  async close(): Promise<void> {
    const pending = this.browser;
    this.browser = undefined;
    const browser = pending && (await pending.catch(() => undefined));
    if (browser?.connected) await browser.disconnect();
  }
}

function checkStatus(url: string, res: HTTPResponse | null) {
  if (!res) return;
  if (res.status() === 404) throw new NotFoundError(`${url} returned 404`);
  if (res.status() >= 400) throw new ProviderUnavailableError(`${url} returned ${res.status()}`);
}
