import { assert } from "chai"
import { awaitableThen } from "../AwaitableThen.js"
import { AlreadyCompletedError, InvalidArgumentError } from "../Errors.js"
import { setTerminateHandler } from "../internal/Config.js"
import { startTask } from "../Task.js"
import { TaskCompletionSource } from "../TaskCompletionSource.js"
import { Coroutine } from "../Types.js"
import { startWorker, TerminateRecorder } from "./Helpers.js"

type Item = { index: number, payload: string }

describe("TaskCompletionSource tests", () => {
    it("setValue() completes the task with the value", () => {
        const source = new TaskCompletionSource<number>()
        const task = source.task()

        assert(!source.isCompleted())
        source.setValue(42)
        assert(source.isCompleted())
        assert(task.awaitReady())
        assert.strictEqual(task.awaitResume(), 42)
    })

    it("An object value arrives as the same reference", () => {
        const value = { name: "shared" }
        const source = new TaskCompletionSource<{ name: string }>()
        source.setValue(value)
        assert.strictEqual(source.task().awaitResume(), value)
    })

    it("A second setValue() throws and the first value is kept", () => {
        const source = new TaskCompletionSource<number>()
        source.setValue(1)

        assert.throws(
            () => source.setValue(2),
            AlreadyCompletedError,
            "The TaskCompletionSource has already been completed.",
        )
        assert.strictEqual(source.task().awaitResume(), 1)
    })

    it("setException() after setValue() throws AlreadyCompletedError", () => {
        const source = new TaskCompletionSource<string>()
        source.setValue("first")
        assert.throws(() => source.setException(new Error("late")), AlreadyCompletedError)
        assert.strictEqual(source.task().awaitResume(), "first")
    })

    it("trySetValue() and trySetException() report whether they completed the source", () => {
        const source = new TaskCompletionSource<number>()
        assert(source.trySetValue(1))
        assert(!source.trySetValue(2))
        assert(!source.trySetException(new Error("late")))
        assert.strictEqual(source.task().awaitResume(), 1)
    })

    it("setException() rejects an absent exception", () => {
        const source = new TaskCompletionSource<number>()
        assert.throws(() => source.setException(undefined), InvalidArgumentError, "The exception must not be empty.")
        assert.throws(() => source.setException(null), InvalidArgumentError)
        assert(!source.isCompleted())
    })

    it("trySetException() returns false for an absent exception and leaves the source open", () => {
        const source = new TaskCompletionSource<number>()
        assert(!source.trySetException(undefined))
        assert(!source.isCompleted())
        assert(source.trySetValue(5))
    })

    it("setException() hands the same error to the consumer", () => {
        const source = new TaskCompletionSource<number>()
        const error = new RangeError("out of range")

        const task = startTask(function* (): Coroutine<unknown> {
            try {
                return yield* source.task().await()
            } catch (caught) {
                return caught
            }
        })

        source.setException(error)
        assert.strictEqual(task.awaitResume(), error)
    })

    it("A void source completes without a value", () => {
        const source = new TaskCompletionSource<void>()
        source.setValue()
        assert.isUndefined(source.task().awaitResume())
    })

    it("A setter called from the resumed continuation finds the source completed", () => {
        const source = new TaskCompletionSource<number>()

        const task = startTask(function* () {
            const first = yield* source.task().await()
            try {
                source.setValue(2)
                return "second set succeeded"
            } catch (error) {
                return error instanceof AlreadyCompletedError ? `rejected after ${first}` : "unexpected error"
            }
        })

        source.setValue(1)
        assert.strictEqual(task.awaitResume(), "rejected after 1")
    })

    it("A continuation that throws inside setValue() is fatal and setValue() still succeeds", () => {
        const recorder = new TerminateRecorder()
        const previous = setTerminateHandler(recorder.handler)

        try {
            const source = new TaskCompletionSource<number>()
            const task = source.task()
            const error = new Error("continuation failed")

            task.awaitSuspend({
                resume() {
                    throw error
                },
            })

            assert.doesNotThrow(() => source.setValue(1))
            assert.deepEqual(recorder.errors, [error])
            assert.strictEqual(task.awaitResume(), 1)
        } finally {
            setTerminateHandler(previous)
        }
    })

    it("A consumer suspended on the task resumes with a value posted by a worker thread", (done) => {
        const source = new TaskCompletionSource<number>()

        const consumer = startTask(function* () {
            return yield* source.task().await()
        })

        assert(!consumer.awaitReady())

        awaitableThen(consumer, (result) => {
            try {
                assert.strictEqual(result.get(), 42)
                done()
            } catch (error) {
                done(error)
            }
        })

        const worker = startWorker(`require("node:worker_threads").parentPort.postMessage(42)`)
        worker.once("message", (value: number) => source.setValue(value))
    }).timeout(10_000)

    it("Exactly one of several producer threads completes the source", (done) => {
        const producers = 8
        const source = new TaskCompletionSource<number>()
        const winners: number[] = []
        let rejected = 0
        let settled = 0

        const onProducerMessage = (id: number) => {
            // even producers use the throwing setter, odd ones the try variant
            if (id % 2 === 0) {
                try {
                    source.setValue(id)
                    winners.push(id)
                } catch (error) {
                    if (!(error instanceof AlreadyCompletedError)) throw error
                    rejected++
                }
            } else if (source.trySetValue(id)) {
                winners.push(id)
            } else {
                rejected++
            }

            if (++settled < producers) return

            try {
                assert.strictEqual(winners.length, 1)
                assert.strictEqual(rejected, producers - 1)
                assert.strictEqual(source.task().awaitResume(), winners[0])
                done()
            } catch (error) {
                done(error)
            }
        }

        for (let id = 0; id < producers; id++) {
            const worker = startWorker(
                `const { parentPort, workerData } = require("node:worker_threads"); parentPort.postMessage(workerData)`,
                id,
            )
            worker.once("message", onProducerMessage)
        }
    }).timeout(20_000)

    it("A consumer observes every value produced on another thread unmodified", (done) => {
        const count = 5_000
        const sources = Array.from({ length: count }, () => new TaskCompletionSource<Item>())

        const consumer = startTask(function* () {
            let checked = 0

            for (let index = 0; index < count; index++) {
                const item = yield* sources[index].task().await()
                assert.strictEqual(item.index, index)
                assert.strictEqual(item.payload, `payload-${index}`)
                checked++
            }

            return checked
        })

        awaitableThen(consumer, (result) => {
            try {
                assert.strictEqual(result.get(), count)
                done()
            } catch (error) {
                done(error)
            }
        })

        const worker = startWorker(
            `const { parentPort, workerData } = require("node:worker_threads")
            for (let index = 0; index < workerData; index++) {
                parentPort.postMessage({ index, payload: "payload-" + index })
            }`,
            count,
        )
        worker.on("message", (item: Item) => sources[item.index].setValue(item))
    }).timeout(20_000)
})
