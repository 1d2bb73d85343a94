import { toAwaiter } from "../Awaitable.js"
import { InvalidOperationError } from "../Errors.js"
import { Awaiter, Continuation, Coroutine, Yield } from "../Types.js"
import { debug } from "./Config.js"

/**
 * Receives the outcome of a coroutine frame. returnValue() or unhandledException() is called once,
 * then finalSuspend(), unless unhandledException() throws.
 */
export interface FramePromise<T> {
    returnValue(value: T): void

    unhandledException(error: unknown): void

    finalSuspend(): void
}

type Step<T> = (coroutine: Coroutine<T>) => IteratorResult<Yield, T>

function starting<T>(): Step<T> {
    return (coroutine) => coroutine.next()
}

function throwing<T>(error: unknown): Step<T> {
    return (coroutine) => coroutine.throw(error)
}

function resuming<T>(awaiter: Awaiter<unknown>): Step<T> {
    let value: unknown
    try {
        value = awaiter.awaitResume()
    } catch (error) {
        return throwing(error)
    }
    return (coroutine) => coroutine.next(value)
}

/**
 * Drives a generator through its suspension points. The frame is the continuation registered
 * with whatever the coroutine is waiting on; resuming it runs the coroutine inline until the next
 * suspension or until it finishes.
 */
export class CoroutineFrame<T> implements Continuation {
    readonly #id: string = Math.random().toString(36).substring(7)
    #coroutine: Coroutine<T> | null
    #promise: FramePromise<T> | null
    #awaiter: Awaiter<unknown> | null = null
    #isStarted = false

    constructor(coroutine: Coroutine<T>, promise: FramePromise<T>) {
        this.#coroutine = coroutine
        this.#promise = promise
    }

    /**
     * Runs the coroutine on the caller's stack until its first suspension.
     */
    start() {
        if (this.#isStarted) throw new InvalidOperationError(`Coroutine frame has already been started.`)
        this.#isStarted = true
        this.#run(starting())
    }

    resume() {
        if (debug) console.log(`${this} CoroutineFrame.resume()`)
        const awaiter = this.#awaiter
        if (awaiter === null) throw new InvalidOperationError(`Coroutine is not suspended.`)
        this.#awaiter = null
        this.#run(resuming(awaiter))
    }

    #run(step: Step<T>) {
        const coroutine = this.#coroutine
        const promise = this.#promise
        if (coroutine === null || promise === null) throw new InvalidOperationError(`Coroutine has already completed.`)

        for (; ;) {
            let iteratorResult: IteratorResult<Yield, T>

            try {
                iteratorResult = step(coroutine)
            } catch (error) {
                this.#release()
                promise.unhandledException(error)
                promise.finalSuspend()
                return
            }

            // completed with result
            if (iteratorResult.done) {
                this.#release()
                promise.returnValue(iteratorResult.value)
                promise.finalSuspend()
                return
            }

            // suspension point
            let awaiter: Awaiter<unknown>
            try {
                awaiter = toAwaiter(iteratorResult.value)
            } catch (error) {
                step = throwing(error)
                continue
            }

            let isReady: boolean
            try {
                isReady = awaiter.awaitReady()
            } catch (error) {
                step = throwing(error)
                continue
            }

            if (!isReady) {
                this.#awaiter = awaiter
                let isSuspended: boolean

                try {
                    isSuspended = awaiter.awaitSuspend(this)
                } catch (error) {
                    this.#awaiter = null
                    step = throwing(error)
                    continue
                }

                if (isSuspended) {
                    if (debug) console.log(`${this} CoroutineFrame suspended`)
                    return
                }

                this.#awaiter = null
            }

            step = resuming(awaiter)
        }
    }

    // the frame is finished; the outcome now lives only where the promise put it
    #release() {
        this.#coroutine = null
        this.#promise = null
    }

    toString(): string {
        return `CoroutineFrame@${this.#id}{${this.#coroutine === null ? "completed" : "running"}}`
    }
}
