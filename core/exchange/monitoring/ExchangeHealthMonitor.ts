/**
 * Polls the venue status endpoint through the gateway, so checks share the
 * order rate limiter. The trading cycle reads the last known market status
 * to skip the oracle while the market is not open.
 *
 * Events:
 *  - "health" (HealthStatus) after every check
 *  - "market" (from, to) when a successful check sees a new market status
 */

import { EventEmitter } from "node:events";
import { MarketStatus } from "../adapters/base/ExchangeAdapter";
import { ExchangeGateway } from "../gateway/ExchangeGateway";
import { Notifier, notifyInBackground } from "../../notify/Notifier";

export interface HealthStatus {
    readonly exchange: string;
    readonly healthy: boolean;
    /** Last status the venue reported; carried over through failed checks. */
    readonly marketStatus?: MarketStatus;
    readonly latencyMs?: number;
    readonly checkedAt: number;
    readonly error?: string;
    readonly consecutiveFailures: number;
}

export interface HealthMonitorConfig {
    readonly pollIntervalMs: number;
    readonly alertAfterFailures: number;
}

const DEFAULT_CONFIG: HealthMonitorConfig = {
    pollIntervalMs: 60_000,
    alertAfterFailures: 3
};

export class ExchangeHealthMonitor extends EventEmitter {
    readonly #gateway: ExchangeGateway;
    readonly #notifier: Notifier;
    readonly #config: HealthMonitorConfig;
    readonly #now: () => number;

    #timer?: NodeJS.Timeout;
    #last?: HealthStatus;
    #failures = 0;
    #outageReported = false;

    constructor(
        gateway: ExchangeGateway,
        notifier: Notifier,
        config: Partial<HealthMonitorConfig> = {},
        now: () => number = Date.now
    ) {
        super();
        this.#gateway = gateway;
        this.#notifier = notifier;
        this.#config = { ...DEFAULT_CONFIG, ...config };
        this.#now = now;
    }

    start(): void {
        if (this.#timer) return;
        const tick = () => {
            void this.checkHealth();
        };
        tick();
        this.#timer = setInterval(tick, this.#config.pollIntervalMs);
        this.#timer.unref();
        console.log(`[HealthMonitor] Polling ${this.#gateway.exchange} every ${this.#config.pollIntervalMs}ms`);
    }

    stop(): void {
        if (!this.#timer) return;
        clearInterval(this.#timer);
        this.#timer = undefined;
    }

    getLastStatus(): HealthStatus | undefined {
        return this.#last;
    }

    /**
     * An unknown status does not block; gateway reads fail on their own.
     */
    isMarketOpen(): boolean {
        const status = this.#last?.marketStatus;
        return status === undefined || status === "OPEN";
    }

    /** Never throws. */
    async checkHealth(): Promise<HealthStatus> {
        const checkedAt = this.#now();
        const previous = this.#last?.marketStatus;
        let next: HealthStatus;

        try {
            const marketStatus = await this.#gateway.getMarketStatus();
            next = {
                exchange: this.#gateway.exchange,
                healthy: true,
                marketStatus,
                latencyMs: this.#now() - checkedAt,
                checkedAt,
                consecutiveFailures: 0
            };
            this.#onSuccess();
            if (previous !== undefined && previous !== marketStatus) {
                console.log(`[HealthMonitor] Market ${previous} -> ${marketStatus}`);
                this.emit("market", previous, marketStatus);
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            next = {
                exchange: this.#gateway.exchange,
                healthy: false,
                marketStatus: previous,
                checkedAt,
                error: message,
                consecutiveFailures: ++this.#failures
            };
            console.error(`[HealthMonitor] Status check failed (${this.#failures}): ${message}`);
            this.#onFailure(message);
        }

        this.#last = next;
        this.emit("health", next);
        return next;
    }

    #onSuccess(): void {
        if (this.#outageReported) {
            notifyInBackground(this.#notifier, {
                type: "EXCHANGE_UP",
                level: "INFO",
                message: `${this.#gateway.exchange} status checks recovered after ${this.#failures} failures`
            });
        }
        this.#failures = 0;
        this.#outageReported = false;
    }

    #onFailure(message: string): void {
        if (this.#outageReported || this.#failures < this.#config.alertAfterFailures) return;
        this.#outageReported = true;
        notifyInBackground(this.#notifier, {
            type: "EXCHANGE_DOWN",
            level: "WARNING",
            message: `Exchange status check failed ${this.#failures} times: ${message}`
        });
    }
}
