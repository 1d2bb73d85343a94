import { awaitableThen } from "./AwaitableThen.js"
import { Awaitable } from "./Types.js"

/**
 * Bridges an awaitable to a Promise that settles with its value or rejects with the same error
 * the awaitable would have thrown.
 */
export function toFuture<T>(awaitable: Awaitable<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        awaitableThen(awaitable, (result) => {
            try {
                resolve(result.get())
            } catch (error) {
                reject(error)
            }
        })
    })
}
