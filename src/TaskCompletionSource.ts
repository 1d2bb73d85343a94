import { AlreadyCompletedError, InvalidArgumentError } from "./Errors.js"
import { AtomicReference } from "./internal/AtomicReference.js"
import { debug } from "./internal/Config.js"
import { resumeOrTerminate, TaskState } from "./internal/TaskState.js"
import { Task } from "./Task.js"

enum COMPLETION_STATE {
    UNSET, // Initial state. Any setter may still complete the source.
    SETTING, // A setter won and is writing the result.
    SET, // Final state. The result is written and the task has been marked ready.
}

/**
 * Producer side of a task for code that is not itself a coroutine. The first successful setter
 * completes the task; every later one fails.
 *
 * A continuation waiting on the task runs synchronously inside the setter that completes it. If
 * that continuation throws, the error is handed to the terminate handler: the setter still reports
 * success and does not rethrow.
 *
 * task() may be called more than once, but every handle shares one state, so only one of them may
 * be awaited.
 */
export class TaskCompletionSource<T> {
    readonly #taskState: TaskState<T> = TaskState.create()
    readonly #completionState = new AtomicReference<COMPLETION_STATE>(COMPLETION_STATE.UNSET)

    task(): Task<T> {
        return new Task(this.#taskState)
    }

    isCompleted(): boolean {
        return this.#completionState.load() !== COMPLETION_STATE.UNSET
    }

    setValue(value: T) {
        if (!this.trySetValue(value)) throw new AlreadyCompletedError()
    }

    trySetValue(value: T): boolean {
        if (!this.#beginSetting()) return false
        this.#taskState.result.setValue(value)
        this.#complete()
        return true
    }

    setException(error: unknown) {
        if (error === undefined || error === null) throw new InvalidArgumentError()
        if (!this.trySetException(error)) throw new AlreadyCompletedError()
    }

    /**
     * Returns false if the source was already completed or if error is absent.
     */
    trySetException(error: unknown): boolean {
        if (error === undefined || error === null) return false
        if (!this.#beginSetting()) return false
        this.#taskState.result.setException(error)
        this.#complete()
        return true
    }

    #beginSetting(): boolean {
        const observed = this.#completionState.compareExchange(COMPLETION_STATE.UNSET, COMPLETION_STATE.SETTING)
        if (debug) console.log(`${this.#taskState} TaskCompletionSource completion state ${COMPLETION_STATE[observed]}`)
        return observed === COMPLETION_STATE.UNSET
    }

    #complete() {
        this.#completionState.store(COMPLETION_STATE.SET)
        const continuation = this.#taskState.markReady()
        if (continuation !== null) resumeOrTerminate(continuation)
    }
}
