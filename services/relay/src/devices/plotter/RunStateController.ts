import { Guarded } from '../../core/lock.js'
import type { WakeSignal } from '../../core/wake.js'
import type { RunState } from './types.js'

/**
 * Running / Paused flag. Starts Running; only pause() and resume() change it.
 * Resuming wakes the dispatch loop since commands may have piled up.
 */
export class RunStateController {
    private readonly state = new Guarded<{ value: RunState }>({ value: 'running' })

    constructor(private readonly wake: WakeSignal) {}

    async pause(): Promise<void> {
        await this.state.with((s) => { s.value = 'paused' })
    }

    async resume(): Promise<void> {
        await this.state.with((s) => { s.value = 'running' })
        this.wake.notify()
    }

    async current(): Promise<RunState> {
        return this.state.with((s) => s.value)
    }
}
