/**
 * News for the oracle prompt. Everything fetched here is untrusted text.
 */

export const UNTRUSTED_BEGIN = "UNTRUSTED_NEWS_TEXT_BEGIN";
export const UNTRUSTED_END = "UNTRUSTED_NEWS_TEXT_END";

export interface NewsItem {
    readonly title: string;
    readonly source: string;
    /** Already wrapped in the untrusted markers */
    readonly body: string;
}

export interface NewsSource {
    readonly name: string;
    /** Never rejects; failures yield an empty list */
    fetchNews(pair: string): Promise<readonly NewsItem[]>;
}

export function wrapUntrusted(text: string, maxChars: number): string {
    return `${UNTRUSTED_BEGIN}\n${text.slice(0, maxChars)}\n${UNTRUSTED_END}`;
}

export function formatNewsDigest(items: readonly NewsItem[]): string {
    if (items.length === 0) {
        return "No recent news.";
    }
    return items.map((item, i) => `[${i + 1}] ${item.title} (${item.source})\n${item.body}`).join("\n\n");
}
