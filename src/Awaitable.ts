import { Awaitable, Awaiter, AwaiterProvider, coAwait, Coroutine } from "./Types.js"

export function isAwaiter(value: unknown): value is Awaiter<unknown> {
    return typeof value === "object" && value !== null &&
        "awaitReady" in value && typeof value.awaitReady === "function" &&
        "awaitSuspend" in value && typeof value.awaitSuspend === "function" &&
        "awaitResume" in value && typeof value.awaitResume === "function"
}

export function isAwaiterProvider(value: unknown): value is AwaiterProvider<unknown> {
    return typeof value === "object" && value !== null && coAwait in value && typeof value[coAwait] === "function"
}

export function isAwaitable(value: unknown): value is Awaitable<unknown> {
    return isAwaiterProvider(value) || isAwaiter(value)
}

/**
 * Returns the awaiter for an awaitable. A [coAwait]() method takes precedence over the object's
 * own awaiter methods.
 */
export function getAwaiter<T>(awaitable: Awaitable<T>): Awaiter<T> {
    return isAwaiterProvider(awaitable) ? awaitable[coAwait]() : awaitable
}

/**
 * Resolves whatever a coroutine yielded into an awaiter, or throws a TypeError that is delivered
 * back into the coroutine at its yield.
 */
export function toAwaiter(value: unknown): Awaiter<unknown> {
    if (isAwaiterProvider(value)) {
        const awaiter = value[coAwait]()
        if (isAwaiter(awaiter)) return awaiter
        throw new TypeError(`[coAwait]() did not return an awaiter`)
    }
    if (isAwaiter(value)) return value
    throw new TypeError(`Coroutine yielded a value that is not awaitable: ${String(value)}`)
}

/**
 * Suspends the current coroutine on an awaitable and returns its result.
 */
export function* suspend<T>(awaitable: Awaitable<T>): Coroutine<T> {
    return (yield awaitable) as T
}
