/**
 * Tavily web search as a news source.
 */

import { errorMessage } from "../../domain/failures";
import { NewsItem, NewsSource, wrapUntrusted } from "./NewsSource";

export const TAVILY_SEARCH_URL = "https://api.tavily.com/search";

export interface TavilyConfig {
    readonly apiKey: string;
    readonly maxResults: number;
    readonly maxChars: number;
    readonly lookbackDays: number;
    readonly timeoutMs?: number;
    readonly fetchImpl?: typeof fetch;
}

export class TavilyNewsSource implements NewsSource {
    readonly name = "tavily";
    readonly #config: TavilyConfig;
    readonly #fetch: typeof fetch;

    constructor(config: TavilyConfig) {
        this.#config = config;
        this.#fetch = config.fetchImpl ?? fetch;
    }

    async fetchNews(pair: string): Promise<readonly NewsItem[]> {
        const [base, quote] = pair.split("_");
        const body = {
            api_key: this.#config.apiKey,
            query: `${base}/${quote} exchange rate news central bank policy forecast analysis`,
            search_depth: "basic",
            max_results: this.#config.maxResults,
            days: this.#config.lookbackDays
        };

        try {
            const doFetch = this.#fetch;
            const response = await doFetch(TAVILY_SEARCH_URL, {
                method: "POST",
                headers: { "Content-Type": "application/json" },
                body: JSON.stringify(body),
                signal: AbortSignal.timeout(this.#config.timeoutMs ?? 10000)
            });
            if (!response.ok) {
                throw new Error(`HTTP ${response.status}`);
            }
            const payload: unknown = await response.json();
            return this.parseResults(payload);
        } catch (err) {
            console.warn(`[News] Tavily search failed for ${pair}: ${errorMessage(err)}`);
            return [];
        }
    }

    private parseResults(payload: unknown): NewsItem[] {
        if (typeof payload !== "object" || payload === null || !("results" in payload)) {
            return [];
        }
        const results = payload.results;
        if (!Array.isArray(results)) {
            return [];
        }

        const entries: unknown[] = results.slice(0, this.#config.maxResults);
        const items: NewsItem[] = [];
        for (const entry of entries) {
            if (typeof entry !== "object" || entry === null) continue;
            const title = "title" in entry && typeof entry.title === "string" ? entry.title : "No Title";
            const url = "url" in entry && typeof entry.url === "string" ? entry.url : "WebSearch";
            const content = "content" in entry && typeof entry.content === "string" ? entry.content : "";
            items.push({ title, source: url, body: wrapUntrusted(content, this.#config.maxChars) });
        }
        return items;
    }
}
