import { UnrecoverableError } from "../Errors.js"

/**
 * Trace logging for task states and coroutine frames. Enabled with `COTASK_DEBUG=1` or
 * `setDebug(true)`.
 */
export let debug: boolean = process.env["COTASK_DEBUG"] === "1"

export function setDebug(enabled: boolean) {
    debug = enabled
}

/**
 * Receives an error that escaped a continuation while a producer was resuming it. There is no
 * caller left to report it to, so the handler is expected not to return control to user code.
 */
export type TerminateHandler = (error: unknown) => void

const defaultTerminateHandler: TerminateHandler = (error) => {
    console.error(`Unrecoverable error thrown by a continuation: ${error}`)
    process.nextTick(() => {
        throw new UnrecoverableError(error)
    })
}

let terminateHandler: TerminateHandler = defaultTerminateHandler

/**
 * Replaces the terminate handler and returns the previous one. Passing null restores the default,
 * which ends the process through an uncaught `UnrecoverableError`.
 */
export function setTerminateHandler(handler: TerminateHandler | null): TerminateHandler {
    const previous = terminateHandler
    terminateHandler = handler ?? defaultTerminateHandler
    return previous
}

export function terminate(error: unknown) {
    if (debug) console.log(`terminate(${error})`)
    terminateHandler(error)
}
