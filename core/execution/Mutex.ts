/**
 * Promise-chain mutex. Callers run one at a time in arrival order.
 */
export class Mutex {
    #tail: Promise<unknown> = Promise.resolve();

    runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        const run = this.#tail.then(fn);
        this.#tail = run.catch(() => undefined);
        return run;
    }
}
