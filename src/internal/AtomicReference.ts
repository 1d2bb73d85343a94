/**
 * A cell with the read-modify-write operations of an atomic reference. Each operation finishes
 * before any other callback on the event loop runs, so producers completing from timers, I/O or
 * worker messages see a transition entirely or not at all.
 */
export class AtomicReference<T> {
    #value: T

    constructor(value: T) {
        this.#value = value
    }

    load(): T {
        return this.#value
    }

    store(value: T) {
        this.#value = value
    }

    exchange(value: T): T {
        const previous = this.#value
        this.#value = value
        return previous
    }

    /**
     * Replaces the value with desired if it is identical to expected. Returns the value observed
     * before the operation; the exchange happened iff that equals expected.
     */
    compareExchange(expected: T, desired: T): T {
        const observed = this.#value
        if (observed === expected) this.#value = desired
        return observed
    }
}
