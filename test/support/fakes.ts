import type { BrowserSession, FormSubmission } from '../../src/backends/browser.js';
import type { CompletionBackend, CompletionRequest, CompletionResult } from '../../src/backends/completion.js';
import type { PageFetcher } from '../../src/backends/page-fetcher.js';
import { NotFoundError } from '../../src/errors.js';
import type { GroundingCitation } from '../../src/types/valuation.js';

/** Replies with canned text and records the prompts it was given. */
export class FakeCompletionBackend implements CompletionBackend {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly text: string | (() => Promise<string>), private readonly citations: GroundingCitation[] = []) {}

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    this.requests.push(request);
    const text = typeof this.text === 'string' ? this.text : await this.text();
    return { text, citations: this.citations };
  }
}

/** Serves pages from a url -> html map; unknown urls are 404s. */
export class FakePageFetcher implements PageFetcher {
  readonly urls: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetchPage(url: string): Promise<string> {
    this.urls.push(url);
    const html = this.pages[url];
    if (html === undefined) throw new NotFoundError(`${url} returned 404`);
    return html;
  }
}

export class FakeBrowserSession extends FakePageFetcher implements BrowserSession {
  readonly forms: FormSubmission[] = [];

  constructor(private readonly resultHtml: string, pages: Record<string, string> = {}) {
    super(pages);
  }

  async submitForm(form: FormSubmission): Promise<string> {
    this.forms.push(form);
    return this.resultHtml;
  }

  async close(): Promise<void> {}
}

/** A promise that settles only when the signal aborts. */
export function hang<T>(signal: AbortSignal): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
