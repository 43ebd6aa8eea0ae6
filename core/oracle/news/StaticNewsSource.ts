import { NewsItem, NewsSource, wrapUntrusted } from "./NewsSource";

/**
 * Fixed headlines, used when no search API key is configured and in tests.
 */
export class StaticNewsSource implements NewsSource {
    readonly name = "static";
    readonly #items: readonly NewsItem[];

    constructor(headlines: readonly string[] = [], maxChars = 1000) {
        this.#items = headlines.map(h => ({ title: h, source: "static", body: wrapUntrusted(h, maxChars) }));
    }

    async fetchNews(): Promise<readonly NewsItem[]> {
        return this.#items;
    }
}
