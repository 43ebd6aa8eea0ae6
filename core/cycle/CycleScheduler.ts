/**
 * Fixed-interval driver. A tick that fires while the previous one is still
 * running is skipped, so cycles never overlap.
 */

export interface Runnable {
    runOnce(): Promise<unknown>;
}

export class CycleScheduler {
    readonly #cycle: Runnable;
    readonly #intervalMs: number;

    #timer?: NodeJS.Timeout;
    #running: Promise<void> | null = null;
    #skipped = 0;

    constructor(cycle: Runnable, intervalMs: number) {
        this.#cycle = cycle;
        this.#intervalMs = intervalMs;
    }

    get isRunning(): boolean {
        return this.#running !== null;
    }

    get skippedTicks(): number {
        return this.#skipped;
    }

    start(): void {
        if (this.#timer) {
            return;
        }
        void this.tick();
        this.#timer = setInterval(() => {
            void this.tick();
        }, this.#intervalMs);
        console.log(`[Scheduler] Started, interval ${this.#intervalMs}ms`);
    }

    /**
     * Stop scheduling and wait for a running tick to finish.
     */
    async stop(): Promise<void> {
        if (this.#timer) {
            clearInterval(this.#timer);
            this.#timer = undefined;
            console.log("[Scheduler] Stopped");
        }
        await this.#running;
    }

    /**
     * Run one tick unless one is in progress.
     *
     * @returns false when the tick was skipped
     */
    async tick(): Promise<boolean> {
        if (this.#running) {
            this.#skipped++;
            console.warn("[Scheduler] Previous cycle still running, skipping tick");
            return false;
        }

        this.#running = this.#cycle.runOnce().then(
            () => undefined,
            (err: unknown) => {
                console.error("[Scheduler] Cycle failed:", err);
            }
        );
        try {
            await this.#running;
        } finally {
            this.#running = null;
        }
        return true;
    }
}
