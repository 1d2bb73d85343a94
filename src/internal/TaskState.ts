import { AwaitableResult } from "../AwaitableResult.js"
import { InvalidStateError } from "../Errors.js"
import { Continuation } from "../Types.js"
import { AtomicReference } from "./AtomicReference.js"
import { debug, terminate } from "./Config.js"

type Running = { readonly tag: "running" }
type Ready = { readonly tag: "ready" }
type Done = { readonly tag: "done" }
type Suspended = { readonly tag: "suspended", readonly continuation: Continuation }

export type StateOrContinuation = Running | Ready | Done | Suspended

// Sentinels are compared by identity. A continuation is always wrapped in a new Suspended record,
// so it can never be mistaken for one of them.
export const RUNNING: Running = Object.freeze({ tag: "running" })
export const READY: Ready = Object.freeze({ tag: "ready" })
export const DONE: Done = Object.freeze({ tag: "done" })

export function suspended(continuation: Continuation): Suspended {
    return { tag: "suspended", continuation }
}

/**
 * State shared by the producer of a task and the handle that consumes it: the result slot plus a
 * cell that moves running -> (suspended ->) ready -> done.
 */
export class TaskState<T> {
    readonly #id: string = Math.random().toString(36).substring(7)
    readonly stateOrContinuation = new AtomicReference<StateOrContinuation>(RUNNING)
    readonly result = new AwaitableResult<T>()

    static create<T>(): TaskState<T> {
        return new TaskState<T>()
    }

    isRunning(): boolean {
        return this.stateOrContinuation.load() === RUNNING
    }

    isReady(): boolean {
        return this.stateOrContinuation.load() === READY
    }

    isDone(): boolean {
        return this.stateOrContinuation.load() === DONE
    }

    /**
     * Announces that the result slot is populated. Returns the continuation that was waiting for
     * it, if any; the caller is responsible for resuming it.
     */
    markReady(): Continuation | null {
        if (debug) console.log(`${this} TaskState.markReady()`)
        if (this.isDone()) throw new InvalidStateError(`markReady() must not be called after the task is done.`)

        const previous = this.stateOrContinuation.exchange(READY)
        return previous.tag === "suspended" ? previous.continuation : null
    }

    toString(): string {
        return `TaskState@${this.#id}{${this.stateOrContinuation.load().tag}}`
    }
}

/**
 * Resumes a continuation on the producer's stack. Nothing above a producer can handle an error
 * thrown out of the consumer, so one that escapes goes to the terminate handler.
 */
export function resumeOrTerminate(continuation: Continuation) {
    try {
        continuation.resume()
    } catch (error) {
        terminate(error)
    }
}
