import { suspend } from "./Awaitable.js"
import { InvalidOperationError } from "./Errors.js"
import { debug } from "./internal/Config.js"
import { CoroutineFrame, FramePromise } from "./internal/CoroutineFrame.js"
import { DONE, READY, resumeOrTerminate, RUNNING, suspended, TaskState } from "./internal/TaskState.js"
import { Awaiter, Continuation, Coroutine } from "./Types.js"

/**
 * Continuation that never needs resuming. Passing it to awaitSuspend() asks to continue inline.
 */
export const noopContinuation: Continuation = Object.freeze({
    resume() {
    },
})

/**
 * Handle to the eventual result of a coroutine or a TaskCompletionSource. A task may be awaited
 * once: a second awaitSuspend() or awaitResume() throws InvalidOperationError.
 *
 * Dropping the handle does not stop the producer. If the producer fails and no one awaits the
 * task, the failure is discarded.
 */
export class Task<T> implements Awaiter<T> {
    #state: TaskState<T> | null

    constructor(state: TaskState<T>) {
        this.#state = state
    }

    static fromValue<T>(value: T): Task<T> {
        const state = TaskState.create<T>()
        state.result.setValue(value)
        state.markReady()
        return new Task(state)
    }

    static fromException<T = never>(error: unknown): Task<T> {
        const state = TaskState.create<T>()
        state.result.setException(error)
        state.markReady()
        return new Task(state)
    }

    awaitReady(): boolean {
        const current = this.#requireState().stateOrContinuation.load()
        return current === READY || current === DONE
    }

    awaitSuspend(continuation: Continuation): boolean {
        const state = this.#requireState()
        if (debug) console.log(`${state} Task.awaitSuspend()`)
        if (continuation === noopContinuation) return false

        const observed = state.stateOrContinuation.compareExchange(RUNNING, suspended(continuation))
        if (observed === RUNNING) return true

        // the producer finished first
        if (observed === READY) return false

        throw new InvalidOperationError(`Task may be awaited (or have awaitSuspend() used) only once.`)
    }

    awaitResume(): T {
        const state = this.#requireState()
        if (debug) console.log(`${state} Task.awaitResume()`)

        const observed = state.stateOrContinuation.compareExchange(READY, DONE)
        if (observed !== READY) {
            if (observed === DONE) {
                throw new InvalidOperationError(`Task may be awaited (or have awaitResume() used) only once.`)
            }
            throw new InvalidOperationError(`Task.awaitResume() may not be called before awaitReady() returns true.`)
        }

        return state.result.get()
    }

    /**
     * Suspends the calling coroutine until this task completes.
     */
    * await(): Coroutine<T> {
        return yield* suspend(this)
    }

    /**
     * Transfers the right to await to a new handle. This handle can no longer be used.
     */
    move(): Task<T> {
        const state = this.#requireState()
        this.#state = null
        return new Task(state)
    }

    #requireState(): TaskState<T> {
        if (this.#state === null) throw new InvalidOperationError(`Task has been moved.`)
        return this.#state
    }

    toString(): string {
        return `Task{${this.#state ?? "moved"}}`
    }
}

/**
 * Links a coroutine frame to its task state. The frame is the only thing holding the promise, and
 * it drops both once the coroutine finishes, so the result then lives on in the state alone.
 */
class TaskPromise<T> implements FramePromise<T> {
    readonly #state: TaskState<T>

    constructor(state: TaskState<T>) {
        this.#state = state
    }

    returnValue(value: T) {
        this.#state.result.setValue(value)
    }

    unhandledException(error: unknown) {
        this.#state.result.setException(error)
    }

    finalSuspend() {
        const continuation = this.#state.markReady()
        if (continuation !== null) resumeOrTerminate(continuation)
    }
}

/**
 * Runs a coroutine as a task. The coroutine runs synchronously until it first suspends; its return
 * value or thrown error completes the task.
 * @param coroutine generator function producing the task's value
 */
export function startTask<T>(coroutine: () => Coroutine<T>): Task<T> {
    const state = TaskState.create<T>()
    const task = new Task(state)
    new CoroutineFrame(coroutine(), new TaskPromise(state)).start()
    return task
}

/**
 * Wraps a generator function so that each call starts it as a task.
 */
export function taskFunction<A extends unknown[], T>(fn: (...args: A) => Coroutine<T>): (...args: A) => Task<T> {
    return (...args) => startTask(() => fn(...args))
}
