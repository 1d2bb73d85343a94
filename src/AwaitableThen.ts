import { suspend } from "./Awaitable.js"
import { AwaitableResult } from "./AwaitableResult.js"
import { CoroutineFrame, FramePromise } from "./internal/CoroutineFrame.js"
import { Awaitable, Coroutine } from "./Types.js"

// An error thrown by the callback goes to whoever resumed it.
const thenPromise: FramePromise<void> = {
    returnValue() {
    },
    unhandledException(error: unknown) {
        throw error
    },
    finalSuspend() {
    },
}

function* thenCoroutine<T>(
    awaitable: Awaitable<T>,
    continuation: (result: AwaitableResult<T>) => void,
): Coroutine<void> {
    const result = new AwaitableResult<T>()

    try {
        result.setValue(yield* suspend(awaitable))
    } catch (error) {
        result.setException(error)
    }

    continuation(result)
}

/**
 * Calls continuation with the outcome of an awaitable once it completes, without suspending the
 * caller. If the awaitable is already complete, continuation runs before awaitableThen() returns.
 *
 * An error thrown by continuation propagates to the caller in that case. Otherwise it escapes into
 * the producer that completed the awaitable, where it is fatal.
 */
export function awaitableThen<T>(awaitable: Awaitable<T>, continuation: (result: AwaitableResult<T>) => void) {
    new CoroutineFrame(thenCoroutine(awaitable, continuation), thenPromise).start()
}
