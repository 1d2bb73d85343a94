import { performance } from "node:perf_hooks"
import { WaitTimeoutError } from "./Errors.js"

const UNSIGNALED = 0
const SIGNALED = 1

/**
 * One-shot flag that threads can block on until another thread sets it. The flag lives in a
 * SharedArrayBuffer: pass `buffer` to a worker and wrap it with `new EventSignal(buffer)` there to
 * share the same signal.
 */
export class EventSignal {
    readonly buffer: SharedArrayBuffer
    readonly #cell: Int32Array

    constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
        this.buffer = buffer
        this.#cell = new Int32Array(buffer, 0, 1)
    }

    isSet(): boolean {
        return Atomics.load(this.#cell, 0) === SIGNALED
    }

    /**
     * Blocks the calling thread until the signal is set.
     */
    wait() {
        while (!this.isSet()) {
            Atomics.wait(this.#cell, 0, UNSIGNALED)
        }
    }

    /**
     * Blocks for at most millis milliseconds. Returns whether the signal was set. A NaN timeout
     * does not block.
     */
    waitFor(millis: number): boolean {
        if (Number.isNaN(millis)) return this.isSet()
        const deadline = performance.now() + millis

        for (; ;) {
            if (this.isSet()) return true
            const remaining = deadline - performance.now()
            if (remaining <= 0) return false
            Atomics.wait(this.#cell, 0, UNSIGNALED, remaining)
        }
    }

    waitForOrThrow(millis: number) {
        if (!this.waitFor(millis)) throw new WaitTimeoutError()
    }

    /**
     * Sets the signal and wakes every waiter. Setting it again has no effect.
     */
    set() {
        Atomics.store(this.#cell, 0, SIGNALED)
        Atomics.notify(this.#cell, 0)
    }
}
