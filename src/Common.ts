import { awaitableThen } from "./AwaitableThen.js"
import { InvalidArgumentError, TaskCanceledError } from "./Errors.js"
import { Failure } from "./Failure.js"
import { Task } from "./Task.js"
import { TaskCompletionSource } from "./TaskCompletionSource.js"
import { Awaitable, Coroutine, ResultCallback } from "./Types.js"

/**
 * Converts a callback API to a coroutine. Only the first call of the result callback counts.
 * @param register starts the operation and arranges for the callback to receive its result
 */
export function* suspendCoroutine<T>(register: (resultCallback: ResultCallback<T>) => void): Coroutine<T> {
    const source = new TaskCompletionSource<T>()

    register((result) => {
        if (result instanceof Failure) {
            source.trySetException(result.value ?? new InvalidArgumentError(`Failure carried no error.`))
        } else {
            source.trySetValue(result)
        }
    })

    return yield* source.task().await()
}

/**
 * Suspends the coroutine for a given number of milliseconds.
 */
export function* delay(millis?: number): Coroutine<void> {
    yield* suspendCoroutine<void>((resultCallback) => {
        setTimeout(() => resultCallback(undefined), millis)
    })
}

/**
 * Converts a Promise<T> to a Coroutine<T>. A rejection is thrown at the point of suspension.
 */
export function* awaitPromise<T>(promise: PromiseLike<T>): Coroutine<T> {
    return yield* suspendCoroutine<T>((resultCallback) => {
        promise.then(
            (value) => resultCallback(value),
            (error: unknown) => resultCallback(new Failure(error)),
        )
    })
}

/**
 * Races an awaitable against a timer. The returned task fails with TaskCanceledError if the timer
 * fires first; the awaitable's own outcome is then discarded.
 */
export function withTimeout<T>(awaitable: Awaitable<T>, millis: number): Task<T> {
    const source = new TaskCompletionSource<T>()
    const timeout = setTimeout(() => source.trySetException(new TaskCanceledError()), millis)

    awaitableThen(awaitable, (result) => {
        clearTimeout(timeout)
        let value: T

        try {
            value = result.get()
        } catch (error) {
            source.trySetException(error ?? new InvalidArgumentError(`Awaitable failed without an error.`))
            return
        }

        source.trySetValue(value)
    })

    return source.task()
}
