/**
 * src/backends/completion.ts
 * Text completion against an OpenAI-compatible chat API. Search-grounded
 * models (Perplexity sonar, OpenAI *-search-preview) return their sources
 * either as message annotations or as top-level `search_results`/`citations`.
 */

import OpenAI from "openai";
import type { ChatCompletion } from "openai/resources/chat/completions";
import { ProviderUnavailableError, errorMessage } from "../errors.js";
import { validateSearchMetadata } from "../schema/index.js";
import { abortReason } from "../utils/timeout.js";
import type { GroundingCitation } from "../types/valuation.js";

export interface CompletionRequest {
  prompt: string;
  /** Ask the model to search the web before answering. */
  grounded: boolean;
  signal?: AbortSignal;
}

export interface CompletionResult {
  text: string;
  citations: GroundingCitation[];
}

export interface CompletionBackend {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export interface CompletionSettings {
  apiKey?: string;
  baseUrl: string;
  model: string;
}

export function extractCitations(response: ChatCompletion): GroundingCitation[] {
  const out: GroundingCitation[] = [];

  for (const annotation of response.choices[0]?.message?.annotations ?? []) {
    if (annotation.type === "url_citation") {
      const { url, title } = annotation.url_citation;
      out.push({ title: title || url, uri: url });
    }
  }

  const meta: unknown = response;
  if (validateSearchMetadata(meta)) {
    for (const r of meta.search_results ?? []) out.push({ title: r.title || r.url, uri: r.url });
    for (const url of meta.citations ?? []) out.push({ title: url, uri: url });
  }
  return out;
}

export class OpenAICompletionBackend implements CompletionBackend {
  constructor(private readonly client: OpenAI, private readonly model: string) {}

  async complete({ prompt, grounded, signal }: CompletionRequest): Promise<CompletionResult> {
    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          temperature: 0.1,
          ...(grounded ? { web_search_options: {} } : {}),
        },
        { signal },
      );
    } catch (err) {
      if (signal?.aborted) throw abortReason(signal);
      throw new ProviderUnavailableError(`completion failed: ${errorMessage(err)}`, { cause: err });
    }

    const text = response.choices[0]?.message?.content?.trim() ?? "";
    if (!text) throw new ProviderUnavailableError("completion returned no text");
    return { text, citations: extractCitations(response) };
  }
}

/** undefined without an API key; providers that need it are then left out. */
export function createCompletionBackend(settings: CompletionSettings): CompletionBackend | undefined {
  if (!settings.apiKey) return undefined;
  const client = new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseUrl });
  return new OpenAICompletionBackend(client, settings.model);
}
