import { Failure } from "./Failure.js"

/**
 * Key of the method that converts an object into the awaiter a coroutine suspends on.
 */
export const coAwait: unique symbol = Symbol("coAwait")

/**
 * Handle to suspended work. A producer calls resume() once its result is ready.
 */
export interface Continuation {
    resume(): void
}

/**
 * Suspend/resume protocol between a waiting coroutine and the producer of a value.
 *
 * awaitReady() returns true when no suspension is needed. Otherwise awaitSuspend() registers the
 * continuation and returns true if the coroutine is now suspended, or false if it should continue
 * inline. awaitResume() produces the value, or throws the failure.
 */
export interface Awaiter<T> {
    awaitReady(): boolean

    awaitSuspend(continuation: Continuation): boolean

    awaitResume(): T
}

/**
 * An object that is not itself an awaiter but can produce one.
 */
export interface AwaiterProvider<T> {
    [coAwait](): Awaiter<T>
}

export type Awaitable<T> = Awaiter<T> | AwaiterProvider<T>

/**
 * Type a coroutine receives when it suspends on an awaitable of type A.
 */
export type AwaitedResult<A> =
    A extends AwaiterProvider<infer T> ? T :
        A extends Awaiter<infer T> ? T :
            never

/**
 * Use yield on this in a coroutine to suspend the coroutine until the awaitable resolves.
 * In TypeScript use yield* suspend(awaitable) to help the type checker get the resolved type.
 */
export type Yield = Awaitable<unknown>

/**
 * Instance of a coroutine.
 */
export type Coroutine<T> = Generator<Yield, T, unknown>

/**
 * Value or error of a resolved callback-based operation.
 */
export type Result<T> = Failure | T

/**
 * Callback function called with result of an asynchronous operation.
 */
export type ResultCallback<T> = (result: Result<T>) => void
