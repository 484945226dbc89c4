import { NotFoundError, ProviderUnavailableError, errorMessage } from "../errors.js";
import { abortReason } from "../utils/timeout.js";

/** Raw HTML of a page. 404 means "no such listing page", anything else non-2xx is a fault. */
export interface PageFetcher {
  fetchPage(url: string, signal?: AbortSignal): Promise<string>;
}

const DEFAULT_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml",
  "Accept-Language": "es-CL,es;q=0.9",
};

export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly headers: Record<string, string> = DEFAULT_HEADERS) {}

  async fetchPage(url: string, signal?: AbortSignal): Promise<string> {
    let res: Response;
    try {
      res = await fetch(url, { headers: this.headers, redirect: "follow", signal });
    } catch (err) {
      if (signal?.aborted) throw abortReason(signal);
      throw new ProviderUnavailableError(`fetch ${url} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (res.status === 404) throw new NotFoundError(`${url} returned 404`);
    if (!res.ok) throw new ProviderUnavailableError(`${url} returned ${res.status}`);
    return res.text();
  }
}
