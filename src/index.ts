export type {
    Awaitable,
    AwaitedResult,
    Awaiter,
    AwaiterProvider,
    Continuation,
    Coroutine,
    Result,
    ResultCallback,
    Yield,
} from "./Types.js"
export { coAwait } from "./Types.js"

export {
    AlreadyCompletedError,
    InvalidArgumentError,
    InvalidOperationError,
    InvalidStateError,
    TaskCanceledError,
    UnrecoverableError,
    WaitTimeoutError,
} from "./Errors.js"
export { Failure } from "./Failure.js"

export { getAwaiter, isAwaitable, suspend } from "./Awaitable.js"
export { AwaitableResult } from "./AwaitableResult.js"
export { EventSignal } from "./EventSignal.js"
export { noopContinuation, startTask, Task, taskFunction } from "./Task.js"
export { TaskCompletionSource } from "./TaskCompletionSource.js"
export { awaitableGet } from "./AwaitableGet.js"
export { awaitableThen } from "./AwaitableThen.js"
export { toFuture } from "./ToFuture.js"
export { awaitPromise, delay, suspendCoroutine, withTimeout } from "./Common.js"
export { setDebug, setTerminateHandler, type TerminateHandler } from "./internal/Config.js"
