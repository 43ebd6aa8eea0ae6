/**
 * Trading Settings
 *
 * Loaded from a JSON file (config/settings.json by default), merged over
 * defaults and validated. `enableLiveTrading` is also re-read from the
 * same file on every arming check, see safety/lock_state.ts.
 */

import fs from "fs";
import { resolveSettingsPath } from "./env";

// ============================================================================
// Types
// ============================================================================

export type BrokerKind = "gmo" | "paper";

export interface KillSwitchSettings {
    /** Force close when margin ratio (fraction, 1.0 = 100%) falls below this */
    readonly minMarginRatio: number;
    /** No new entries for this long after the margin kill fired */
    readonly cooldownMinutes: number;
}

export interface RateLimitSettings {
    readonly capacity: number;
    readonly refillPerSecond: number;
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
}

export interface SwapSettings {
    /** YYYY-MM-DD the manual swap points were last checked */
    readonly updatedAt: string;
    readonly overrides: Readonly<Record<string, { readonly long: number; readonly short: number }>>;
    /** JSON feed consulted before the overrides; empty for overrides only */
    readonly sourceUrl: string;
    readonly timeoutMs: number;
}

export interface VixSettings {
    /** Above this level the market counts as risk-off */
    readonly threshold: number;
    /** Fixed reading until a live feed is wired in */
    readonly value: number;
}

export interface Settings {
    readonly broker: BrokerKind;
    readonly pair: string;
    readonly enableLiveTrading: boolean;
    readonly intervalSeconds: number;
    readonly aiIntervalMinutes: number;
    readonly oracle: {
        readonly model: string;
        readonly timeoutMs: number;
        readonly promptPath: string;
    };
    readonly news: {
        readonly maxItems: number;
        readonly maxChars: number;
        readonly lookbackDays: number;
    };
    readonly maxLeverage: number;
    readonly lotUnit: number;
    readonly killSwitch: KillSwitchSettings;
    readonly proposal: {
        readonly maxAgeSeconds: number;
        readonly maxRationaleLength: number;
    };
    readonly rateLimit: RateLimitSettings;
    readonly swap: SwapSettings;
    readonly vix: VixSettings;
    readonly dataDir: string;
    readonly observer: {
        readonly port: number;
    };
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SETTINGS: Omit<Settings, "killSwitch"> & { killSwitch: Omit<KillSwitchSettings, "minMarginRatio"> } = {
    broker: "paper",
    pair: "MXN_JPY",
    enableLiveTrading: false,
    intervalSeconds: 60,
    aiIntervalMinutes: 60,
    oracle: {
        model: "gpt-4o-mini",
        timeoutMs: 30000,
        promptPath: "config/system_prompt.md"
    },
    news: {
        maxItems: 5,
        maxChars: 1000,
        lookbackDays: 3
    },
    maxLeverage: 3,
    lotUnit: 10000,
    killSwitch: {
        cooldownMinutes: 60
    },
    proposal: {
        maxAgeSeconds: 300,
        maxRationaleLength: 2000
    },
    rateLimit: {
        capacity: 1,
        refillPerSecond: 0.9,
        maxAttempts: 5,
        baseDelayMs: 500,
        maxDelayMs: 8000
    },
    swap: {
        updatedAt: "2000-01-01",
        overrides: {},
        sourceUrl: "",
        timeoutMs: 10000
    },
    vix: {
        threshold: 20,
        value: 15
    },
    dataDir: "data",
    observer: {
        port: 3000
    }
};

export class SettingsError extends Error {
    readonly errors: readonly string[];

    constructor(source: string, errors: readonly string[]) {
        super(`Invalid settings (${source}): ${errors.join("; ")}`);
        this.name = "SettingsError";
        this.errors = errors;
    }
}

// ============================================================================
// Parsing
// ============================================================================

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

class Reader {
    readonly errors: string[] = [];

    section(obj: Json, key: string): Json {
        const value = obj[key];
        if (value === undefined) return {};
        if (isObject(value)) return value;
        this.errors.push(`${key} must be an object`);
        return {};
    }

    number(obj: Json, key: string, fallback: number, label = key): number {
        const value = obj[key];
        if (value === undefined) return fallback;
        if (typeof value === "number" && Number.isFinite(value)) return value;
        this.errors.push(`${label} must be a number`);
        return fallback;
    }

    requiredNumber(obj: Json, key: string, label = key): number {
        const value = obj[key];
        if (typeof value === "number" && Number.isFinite(value)) return value;
        this.errors.push(value === undefined ? `${label} is required` : `${label} must be a number`);
        return Number.NaN;
    }

    string(obj: Json, key: string, fallback: string, label = key): string {
        const value = obj[key];
        if (value === undefined) return fallback;
        if (typeof value === "string") return value;
        this.errors.push(`${label} must be a string`);
        return fallback;
    }

    boolean(obj: Json, key: string, fallback: boolean, label = key): boolean {
        const value = obj[key];
        if (value === undefined) return fallback;
        if (typeof value === "boolean") return value;
        this.errors.push(`${label} must be a boolean`);
        return fallback;
    }
}

/**
 * Merge raw JSON over defaults. Type errors are collected, not thrown.
 */
export function parseSettings(raw: unknown): { settings: Settings; errors: string[] } {
    const r = new Reader();
    const root = isObject(raw) ? raw : {};
    if (!isObject(raw)) {
        r.errors.push("settings root must be an object");
    }

    const d = DEFAULT_SETTINGS;
    const oracle = r.section(root, "oracle");
    const news = r.section(root, "news");
    const kill = r.section(root, "killSwitch");
    const proposal = r.section(root, "proposal");
    const rate = r.section(root, "rateLimit");
    const swap = r.section(root, "swap");
    const vix = r.section(root, "vix");
    const observer = r.section(root, "observer");

    const brokerRaw = r.string(root, "broker", d.broker);
    let broker: BrokerKind = d.broker;
    if (brokerRaw === "gmo" || brokerRaw === "paper") {
        broker = brokerRaw;
    } else {
        r.errors.push(`broker must be "gmo" or "paper", got "${brokerRaw}"`);
    }

    const overrides: Record<string, { long: number; short: number }> = {};
    const rawOverrides = r.section(swap, "overrides");
    for (const [pair, value] of Object.entries(rawOverrides)) {
        if (!isObject(value)) {
            r.errors.push(`swap.overrides.${pair} must be an object`);
            continue;
        }
        overrides[pair] = {
            long: r.number(value, "long", 0, `swap.overrides.${pair}.long`),
            short: r.number(value, "short", 0, `swap.overrides.${pair}.short`)
        };
    }

    const settings: Settings = {
        broker,
        pair: r.string(root, "pair", d.pair),
        enableLiveTrading: r.boolean(root, "enableLiveTrading", d.enableLiveTrading),
        intervalSeconds: r.number(root, "intervalSeconds", d.intervalSeconds),
        aiIntervalMinutes: r.number(root, "aiIntervalMinutes", d.aiIntervalMinutes),
        oracle: {
            model: r.string(oracle, "model", d.oracle.model, "oracle.model"),
            timeoutMs: r.number(oracle, "timeoutMs", d.oracle.timeoutMs, "oracle.timeoutMs"),
            promptPath: r.string(oracle, "promptPath", d.oracle.promptPath, "oracle.promptPath")
        },
        news: {
            maxItems: r.number(news, "maxItems", d.news.maxItems, "news.maxItems"),
            maxChars: r.number(news, "maxChars", d.news.maxChars, "news.maxChars"),
            lookbackDays: r.number(news, "lookbackDays", d.news.lookbackDays, "news.lookbackDays")
        },
        maxLeverage: r.number(root, "maxLeverage", d.maxLeverage),
        lotUnit: r.number(root, "lotUnit", d.lotUnit),
        killSwitch: {
            minMarginRatio: r.requiredNumber(kill, "minMarginRatio", "killSwitch.minMarginRatio"),
            cooldownMinutes: r.number(kill, "cooldownMinutes", d.killSwitch.cooldownMinutes, "killSwitch.cooldownMinutes")
        },
        proposal: {
            maxAgeSeconds: r.number(proposal, "maxAgeSeconds", d.proposal.maxAgeSeconds, "proposal.maxAgeSeconds"),
            maxRationaleLength: r.number(proposal, "maxRationaleLength", d.proposal.maxRationaleLength, "proposal.maxRationaleLength")
        },
        rateLimit: {
            capacity: r.number(rate, "capacity", d.rateLimit.capacity, "rateLimit.capacity"),
            refillPerSecond: r.number(rate, "refillPerSecond", d.rateLimit.refillPerSecond, "rateLimit.refillPerSecond"),
            maxAttempts: r.number(rate, "maxAttempts", d.rateLimit.maxAttempts, "rateLimit.maxAttempts"),
            baseDelayMs: r.number(rate, "baseDelayMs", d.rateLimit.baseDelayMs, "rateLimit.baseDelayMs"),
            maxDelayMs: r.number(rate, "maxDelayMs", d.rateLimit.maxDelayMs, "rateLimit.maxDelayMs")
        },
        swap: {
            updatedAt: r.string(swap, "updatedAt", d.swap.updatedAt, "swap.updatedAt"),
            overrides,
            sourceUrl: r.string(swap, "sourceUrl", d.swap.sourceUrl, "swap.sourceUrl"),
            timeoutMs: r.number(swap, "timeoutMs", d.swap.timeoutMs, "swap.timeoutMs")
        },
        vix: {
            threshold: r.number(vix, "threshold", d.vix.threshold, "vix.threshold"),
            value: r.number(vix, "value", d.vix.value, "vix.value")
        },
        dataDir: r.string(root, "dataDir", d.dataDir),
        observer: {
            port: r.number(observer, "port", d.observer.port, "observer.port")
        }
    };

    return { settings, errors: r.errors };
}

// ============================================================================
// Validation
// ============================================================================

export interface ConfigValidationResult {
    readonly valid: boolean;
    readonly errors: readonly string[];
    readonly warnings: readonly string[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function validateSettings(settings: Settings, now: number = Date.now()): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!/^[A-Z]{3}_[A-Z]{3}$/.test(settings.pair)) {
        errors.push(`pair must look like MXN_JPY, got "${settings.pair}"`);
    }
    if (settings.intervalSeconds <= 0) {
        errors.push("intervalSeconds must be positive");
    }
    if (settings.aiIntervalMinutes < 0) {
        errors.push("aiIntervalMinutes must not be negative");
    }
    if (settings.oracle.timeoutMs <= 0) {
        errors.push("oracle.timeoutMs must be positive");
    }
    if (settings.maxLeverage <= 0) {
        errors.push("maxLeverage must be positive");
    }
    if (settings.lotUnit <= 0) {
        errors.push("lotUnit must be positive");
    }
    if (!(settings.killSwitch.minMarginRatio > 0)) {
        errors.push("killSwitch.minMarginRatio must be a positive fraction (1.0 = 100%)");
    }
    if (settings.killSwitch.cooldownMinutes < 0) {
        errors.push("killSwitch.cooldownMinutes must not be negative");
    }
    if (settings.proposal.maxAgeSeconds <= 0) {
        errors.push("proposal.maxAgeSeconds must be positive");
    }
    if (settings.rateLimit.capacity < 1) {
        errors.push("rateLimit.capacity must be at least 1");
    }
    if (settings.rateLimit.refillPerSecond <= 0) {
        errors.push("rateLimit.refillPerSecond must be positive");
    }
    if (settings.rateLimit.maxAttempts < 1) {
        errors.push("rateLimit.maxAttempts must be at least 1");
    }
    if (settings.swap.sourceUrl !== "" && !/^https?:\/\/\S+$/.test(settings.swap.sourceUrl)) {
        errors.push(`swap.sourceUrl must be an http(s) URL, got "${settings.swap.sourceUrl}"`);
    }
    if (settings.swap.timeoutMs <= 0) {
        errors.push("swap.timeoutMs must be positive");
    }
    if (!(settings.vix.threshold > 0)) {
        errors.push("vix.threshold must be positive");
    }
    if (settings.vix.value < 0) {
        errors.push("vix.value must not be negative");
    }
    if (settings.rateLimit.baseDelayMs > settings.rateLimit.maxDelayMs) {
        warnings.push("rateLimit.baseDelayMs > rateLimit.maxDelayMs");
    }

    if (settings.maxLeverage > 25) {
        warnings.push(`maxLeverage ${settings.maxLeverage} exceeds the venue maximum of 25`);
    }
    if (settings.killSwitch.minMarginRatio > 0 && settings.killSwitch.minMarginRatio < 1) {
        warnings.push("killSwitch.minMarginRatio below 1.0 leaves the venue's own loss-cut to fire first");
    }
    if (settings.rateLimit.refillPerSecond > 1) {
        warnings.push("rateLimit.refillPerSecond above 1 exceeds the private API allowance");
    }
    if (settings.enableLiveTrading && settings.broker === "paper") {
        warnings.push("enableLiveTrading has no effect with the paper broker");
    }

    const updated = Date.parse(settings.swap.updatedAt);
    if (Number.isNaN(updated)) {
        errors.push(`swap.updatedAt must be YYYY-MM-DD, got "${settings.swap.updatedAt}"`);
    } else {
        const ageDays = Math.floor((now - updated) / DAY_MS);
        if (ageDays > 14) {
            warnings.push(`swap points are ${ageDays} days old; refresh them before trading`);
        } else if (ageDays > 7) {
            warnings.push(`swap points are ${ageDays} days old`);
        }
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings
    };
}

// ============================================================================
// Loader
// ============================================================================

export function readSettingsFile(filePath: string): unknown {
    const content = fs.readFileSync(filePath, "utf-8");
    return JSON.parse(content);
}

/**
 * Load, merge and validate settings. Throws SettingsError on any error.
 */
export function loadSettings(filePath: string = resolveSettingsPath(), now: number = Date.now()): Settings {
    let raw: unknown;
    try {
        raw = readSettingsFile(filePath);
    } catch (error) {
        throw new SettingsError(filePath, [error instanceof Error ? error.message : String(error)]);
    }

    const { settings, errors } = parseSettings(raw);
    if (errors.length > 0) {
        throw new SettingsError(filePath, errors);
    }

    const validation = validateSettings(settings, now);
    for (const warning of validation.warnings) {
        console.warn(`[CONFIG] ${warning}`);
    }
    if (!validation.valid) {
        throw new SettingsError(filePath, validation.errors);
    }

    console.log(`[CONFIG] Loaded settings from: ${filePath} (broker=${settings.broker}, pair=${settings.pair})`);
    return settings;
}
