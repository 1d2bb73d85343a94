import { Worker } from "node:worker_threads"

/**
 * Starts a worker thread running inline CommonJS source. The source can read workerData and post
 * to parentPort through require("node:worker_threads").
 */
export function startWorker(source: string, workerData?: unknown): Worker {
    return new Worker(source, { eval: true, workerData })
}

/**
 * Collects errors passed to the terminate handler while installed.
 */
export class TerminateRecorder {
    readonly errors: unknown[] = []

    readonly handler = (error: unknown) => {
        this.errors.push(error)
    }
}
