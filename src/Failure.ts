/**
 * Marks a callback result as an error rather than a value.
 */
export class Failure {
    constructor(readonly value: unknown) {
    }
}
