/**
 * Level-triggered wake channel between producers and the single consumer.
 *
 * notify() sets a dirty flag; any number of notifications before the consumer
 * looks collapse into one. wait() resolves true when woken and false once the
 * channel is closed, after which it stays closed.
 */
export class WakeSignal {
    private dirty = false
    private closed = false
    private waiter: ((woken: boolean) => void) | null = null

    notify(): void {
        if (this.closed) return
        const w = this.waiter
        if (w) {
            this.waiter = null
            w(true)
            return
        }
        this.dirty = true
    }

    isPending(): boolean {
        return this.dirty
    }

    isClosed(): boolean {
        return this.closed
    }

    async wait(): Promise<boolean> {
        if (this.closed) return false
        if (this.dirty) {
            this.dirty = false
            return true
        }
        if (this.waiter) {
            throw new Error('WakeSignal supports a single consumer')
        }
        return await new Promise<boolean>((resolve) => {
            this.waiter = resolve
        })
    }

    close(): void {
        if (this.closed) return
        this.closed = true
        this.dirty = false
        const w = this.waiter
        this.waiter = null
        if (w) w(false)
    }
}
