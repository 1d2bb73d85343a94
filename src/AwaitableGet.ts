import { getAwaiter, suspend } from "./Awaitable.js"
import { AwaitableResult } from "./AwaitableResult.js"
import { EventSignal } from "./EventSignal.js"
import { CoroutineFrame, FramePromise } from "./internal/CoroutineFrame.js"
import { Task } from "./Task.js"
import { Awaitable, Awaiter, Coroutine } from "./Types.js"

class GetPromise<T> implements FramePromise<T> {
    readonly result = new AwaitableResult<T>()
    readonly done = new EventSignal()

    returnValue(value: T) {
        this.result.setValue(value)
    }

    unhandledException(error: unknown) {
        this.result.setException(error)
    }

    finalSuspend() {
        this.done.set()
    }
}

function* getCoroutine<T>(awaiter: Awaiter<T>): Coroutine<T> {
    return yield* suspend(awaiter)
}

/**
 * Synchronously obtains the result of an awaitable, blocking the calling thread for at most
 * timeoutMillis while waiting for it to complete.
 *
 * A task's producer completes it on the event loop that owns it, and that loop cannot run while
 * this call blocks it. Only an awaitable that completes synchronously yields a result; for any
 * other, WaitTimeoutError is thrown once the timeout (0 by default) has elapsed. A task that times
 * out is left untouched and may still be awaited.
 * @throws the awaitable's failure, or WaitTimeoutError
 */
export function awaitableGet<T>(awaitable: Awaitable<T>, timeoutMillis: number = 0): T {
    const awaiter = getAwaiter(awaitable)

    // nothing on this thread can complete the task while it blocks
    if (awaiter instanceof Task && !awaiter.awaitReady()) {
        new EventSignal().waitForOrThrow(timeoutMillis)
    }

    const promise = new GetPromise<T>()
    new CoroutineFrame(getCoroutine(awaiter), promise).start()
    promise.done.waitForOrThrow(timeoutMillis)
    return promise.result.get()
}
