import { InvalidStateError } from "./Errors.js"

type Storage<T> =
    | { readonly kind: "unset" }
    | { readonly kind: "value", readonly value: T }
    | { readonly kind: "exception", readonly error: unknown }
    | { readonly kind: "consumed" }

const UNSET = { kind: "unset" } as const
const CONSUMED = { kind: "consumed" } as const

/**
 * One-shot slot holding either the value or the failure of an awaitable. It is written once and
 * read once; reading moves the content out.
 *
 * Objects are stored by reference, so the reader receives the same instance the writer set.
 */
export class AwaitableResult<T> {
    #storage: Storage<T> = UNSET

    static fromValue<T>(value: T): AwaitableResult<T> {
        const result = new AwaitableResult<T>()
        result.setValue(value)
        return result
    }

    static fromException<T = never>(error: unknown): AwaitableResult<T> {
        const result = new AwaitableResult<T>()
        result.setException(error)
        return result
    }

    isUnset(): boolean {
        return this.#storage.kind === "unset"
    }

    hasValue(): boolean {
        return this.#storage.kind === "value"
    }

    hasException(): boolean {
        return this.#storage.kind === "exception"
    }

    setValue(value: T) {
        this.#assertUnset()
        this.#storage = { kind: "value", value }
    }

    setException(error: unknown) {
        this.#assertUnset()
        this.#storage = { kind: "exception", error }
    }

    /**
     * Moves the value out, or throws the stored failure.
     */
    get(): T {
        const storage = this.#storage
        switch (storage.kind) {
            case "value":
                this.#storage = CONSUMED
                return storage.value
            case "exception":
                this.#storage = CONSUMED
                throw storage.error
            case "unset":
                throw new InvalidStateError(`Awaitable result is not yet available.`)
            case "consumed":
                throw new InvalidStateError(`Awaitable result has already been consumed.`)
        }
    }

    #assertUnset() {
        if (this.#storage.kind !== "unset") {
            throw new InvalidStateError(`Awaitable result may be set only once.`)
        }
    }
}
