import { Guarded } from '../../core/lock.js'
import { InvalidCommandError } from './errors.js'
import { commandProblem } from './utils.js'

export type EnqueueResult =
    | { ok: true; queueLength: number }
    | { ok: false; error: InvalidCommandError }

/**
 * FIFO of validated commands. Unbounded: a paused or slow consumer lets it
 * grow. Every operation holds the queue lock for exactly one read/mutation.
 */
export class CommandQueue {
    private readonly items = new Guarded<string[]>([])

    async enqueue(raw: string): Promise<EnqueueResult> {
        const problem = commandProblem(raw)
        if (problem) return { ok: false, error: new InvalidCommandError(problem) }

        const queueLength = await this.items.with((q) => q.push(raw))
        return { ok: true, queueLength }
    }

    async dequeueFront(): Promise<string | null> {
        return this.items.with((q) => q.shift() ?? null)
    }

    /** Put an in-flight command back at the head after the link failed. */
    async requeueFront(command: string): Promise<void> {
        await this.items.with((q) => { q.unshift(command) })
    }

    /** Drops everything; returns how many commands were dropped. */
    async clear(): Promise<number> {
        return this.items.with((q) => q.splice(0, q.length).length)
    }

    async length(): Promise<number> {
        return this.items.with((q) => q.length)
    }

    async snapshot(): Promise<string[]> {
        return this.items.with((q) => [...q])
    }
}
