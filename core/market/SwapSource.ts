/**
 * Swap points (daily carry per lot) for the oracle prompt.
 *
 * The manual values in settings are the fallback; an optional JSON feed
 * takes precedence while its data is within the TTL it declares.
 */

import { errorMessage } from "../domain/failures";

export interface SwapPoints {
    readonly long: number;
    readonly short: number;
}

export interface SwapSource {
    readonly name: string;
    /** Never rejects; null when the source has nothing usable for the pair */
    getSwapPoints(pair: string): Promise<SwapPoints | null>;
}

// ============================================================================
// Manual
// ============================================================================

export class ManualSwapSource implements SwapSource {
    readonly name = "manual";
    readonly #points: Readonly<Record<string, SwapPoints>>;

    constructor(points: Readonly<Record<string, SwapPoints>>) {
        this.#points = points;
    }

    async getSwapPoints(pair: string): Promise<SwapPoints | null> {
        return this.#points[pair] ?? null;
    }
}

// ============================================================================
// HTTP JSON feed
// ============================================================================

export interface SwapFeed {
    readonly publishedAt: number;
    readonly expiresAt: number;
    readonly points: Readonly<Record<string, SwapPoints>>;
}

/**
 * Parse a feed document:
 *
 *   { "meta": { "timestamp_utc": "2026-10-18T00:00:00Z", "ttl_seconds": 86400 },
 *     "swap_points": { "MXN_JPY": { "long": 22, "short": -32 } } }
 *
 * Throws on any structural problem.
 */
export function parseSwapFeed(payload: unknown): SwapFeed {
    if (typeof payload !== "object" || payload === null) {
        throw new Error("feed is not an object");
    }
    const meta = "meta" in payload ? payload.meta : undefined;
    if (typeof meta !== "object" || meta === null) {
        throw new Error("feed has no meta");
    }
    const timestamp = "timestamp_utc" in meta ? meta.timestamp_utc : undefined;
    const ttl = "ttl_seconds" in meta ? meta.ttl_seconds : undefined;
    const publishedAt = typeof timestamp === "string" ? Date.parse(timestamp) : Number.NaN;
    if (Number.isNaN(publishedAt)) {
        throw new Error("meta.timestamp_utc is missing or not a date");
    }
    if (typeof ttl !== "number" || !Number.isInteger(ttl) || ttl <= 0) {
        throw new Error("meta.ttl_seconds must be a positive integer");
    }

    const table = "swap_points" in payload ? payload.swap_points : undefined;
    if (typeof table !== "object" || table === null || Array.isArray(table)) {
        throw new Error("feed has no swap_points");
    }
    const points: Record<string, SwapPoints> = {};
    const entries: Array<[string, unknown]> = Object.entries(table);
    for (const [pair, entry] of entries) {
        if (
            typeof entry !== "object" || entry === null ||
            !("long" in entry) || typeof entry.long !== "number" ||
            !("short" in entry) || typeof entry.short !== "number"
        ) {
            throw new Error(`swap_points.${pair} needs numeric long and short`);
        }
        points[pair] = { long: entry.long, short: entry.short };
    }

    return { publishedAt, expiresAt: publishedAt + ttl * 1000, points };
}

export interface HttpSwapSourceConfig {
    readonly url: string;
    readonly timeoutMs?: number;
    readonly fetchImpl?: typeof fetch;
    readonly now?: () => number;
}

export class HttpJsonSwapSource implements SwapSource {
    readonly name = "http";
    readonly #config: HttpSwapSourceConfig;
    readonly #fetch: typeof fetch;
    readonly #now: () => number;
    #cached: SwapFeed | null = null;

    constructor(config: HttpSwapSourceConfig) {
        this.#config = config;
        this.#fetch = config.fetchImpl ?? fetch;
        this.#now = config.now ?? Date.now;
    }

    async getSwapPoints(pair: string): Promise<SwapPoints | null> {
        const now = this.#now();
        if (this.#cached && now <= this.#cached.expiresAt) {
            return this.#cached.points[pair] ?? null;
        }
        this.#cached = null;

        let feed: SwapFeed;
        try {
            feed = await this.fetchFeed();
        } catch (err) {
            console.warn(`[Swap] Feed ${this.#config.url} unusable: ${errorMessage(err)}`);
            return null;
        }

        if (now > feed.expiresAt) {
            console.warn(`[Swap] Feed data from ${new Date(feed.publishedAt).toISOString()} is past its TTL`);
            return null;
        }

        this.#cached = feed;
        return feed.points[pair] ?? null;
    }

    private async fetchFeed(): Promise<SwapFeed> {
        const doFetch = this.#fetch;
        const response = await doFetch(this.#config.url, {
            method: "GET",
            headers: { Accept: "application/json" },
            signal: AbortSignal.timeout(this.#config.timeoutMs ?? 10000)
        });
        if (!response.ok) {
            throw new Error(`HTTP ${response.status}`);
        }
        const payload: unknown = await response.json();
        return parseSwapFeed(payload);
    }
}

// ============================================================================
// Fallback chain
// ============================================================================

export class FallbackSwapSource implements SwapSource {
    readonly name: string;
    readonly #primary: SwapSource;
    readonly #fallback: SwapSource;

    constructor(primary: SwapSource, fallback: SwapSource) {
        this.#primary = primary;
        this.#fallback = fallback;
        this.name = `${primary.name}+${fallback.name}`;
    }

    async getSwapPoints(pair: string): Promise<SwapPoints | null> {
        const primary = await this.#primary.getSwapPoints(pair);
        if (primary) {
            return primary;
        }
        const fallback = await this.#fallback.getSwapPoints(pair);
        if (fallback) {
            console.warn(`[Swap] ${this.#primary.name} has nothing for ${pair}; using ${this.#fallback.name} values`);
        } else {
            console.error(`[Swap] No swap points for ${pair} from any source`);
        }
        return fallback;
    }
}
