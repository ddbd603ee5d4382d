/**
 * A value shared between request handlers and the dispatch loop that can only
 * be read or mutated inside `with()`.
 *
 * Sections run one after another in the order `with()` was called, so two
 * producers touching the same value see each other's writes in call order.
 * Callers never get a reference that outlives their section.
 */
export class Guarded<T> {
    /** Settles when the last queued section has finished, whatever its outcome. */
    private tail: Promise<void> = Promise.resolve()

    constructor(private readonly value: T) {}

    with<R>(fn: (value: T) => R | Promise<R>): Promise<R> {
        const section = this.tail.then(() => fn(this.value))
        this.tail = section.then(noop, noop)
        return section
    }
}

function noop(): void {}
