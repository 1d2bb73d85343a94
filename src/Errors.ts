/**
 * Thrown by a TaskCompletionSource setter when the source was already completed.
 */
export class AlreadyCompletedError extends Error {
    override name = `AlreadyCompletedError`

    constructor() {
        super(`The TaskCompletionSource has already been completed.`)
    }
}

/**
 * Thrown when an exception setter is given no exception.
 */
export class InvalidArgumentError extends Error {
    override name = `InvalidArgumentError`

    constructor(message: string = `The exception must not be empty.`) {
        super(message)
    }
}

/**
 * Thrown when a task is awaited twice, resumed before it is ready, or resumed twice.
 */
export class InvalidOperationError extends Error {
    override name = `InvalidOperationError`
}

/**
 * Internal consistency fault, such as reading a result that was never written. Indicates a bug in
 * the caller rather than a condition to recover from.
 */
export class InvalidStateError extends Error {
    override name = `InvalidStateError`
}

/**
 * Distinguished failure carried through the exception channel of a canceled task.
 */
export class TaskCanceledError extends Error {
    override name = `TaskCanceledError`

    constructor() {
        super(`task canceled`)
    }
}

export class WaitTimeoutError extends Error {
    override name = `WaitTimeoutError`

    constructor() {
        super(`Wait timed out.`)
    }
}

/**
 * Thrown out of the event loop by the default terminate handler, wrapping the error that escaped
 * a continuation.
 */
export class UnrecoverableError extends Error {
    override name = `UnrecoverableError`

    constructor(cause: unknown) {
        super(`Unrecoverable error thrown by a continuation.`, { cause })
    }
}
