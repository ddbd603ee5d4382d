import { describe, expect, it } from 'vitest'
import { CommandQueue } from '../CommandQueue.js'
import { InvalidCommandError } from '../errors.js'

describe('CommandQueue', () => {
    it('appends valid commands and reports the new length', async () => {
        const queue = new CommandQueue()

        await expect(queue.enqueue('SP,1')).resolves.toEqual({ ok: true, queueLength: 1 })
        await expect(queue.enqueue('SM,200,40,40')).resolves.toEqual({ ok: true, queueLength: 2 })
        await expect(queue.snapshot()).resolves.toEqual(['SP,1', 'SM,200,40,40'])
    })

    it.each([
        ['', 'Invalid command: empty command'],
        ['SP,1\r', 'Invalid command: contains carriage return'],
        ['SP,1\nSP,0', 'Invalid command: contains line feed'],
    ])('rejects %j without touching the queue', async (raw, message) => {
        const queue = new CommandQueue()
        await queue.enqueue('SP,0')

        const res = await queue.enqueue(raw)

        expect(res.ok).toBe(false)
        if (!res.ok) {
            expect(res.error).toBeInstanceOf(InvalidCommandError)
            expect(res.error.code).toBe('InvalidCommand')
            expect(res.error.message).toBe(message)
        }
        await expect(queue.snapshot()).resolves.toEqual(['SP,0'])
    })

    it('keeps whitespace-only commands as they are', async () => {
        const queue = new CommandQueue()

        await expect(queue.enqueue('  ')).resolves.toEqual({ ok: true, queueLength: 1 })
        await expect(queue.dequeueFront()).resolves.toBe('  ')
    })

    it('dequeues in FIFO order and returns null when empty', async () => {
        const queue = new CommandQueue()
        await queue.enqueue('a')
        await queue.enqueue('b')

        await expect(queue.dequeueFront()).resolves.toBe('a')
        await expect(queue.dequeueFront()).resolves.toBe('b')
        await expect(queue.dequeueFront()).resolves.toBeNull()
    })

    it('puts a requeued command back at the head', async () => {
        const queue = new CommandQueue()
        await queue.enqueue('a')
        await queue.enqueue('b')
        const first = await queue.dequeueFront()
        expect(first).toBe('a')

        await queue.requeueFront('a')

        await expect(queue.snapshot()).resolves.toEqual(['a', 'b'])
    })

    it('clear drops everything and says how much', async () => {
        const queue = new CommandQueue()
        await queue.enqueue('a')
        await queue.enqueue('b')
        await queue.enqueue('c')

        await expect(queue.clear()).resolves.toBe(3)
        await expect(queue.length()).resolves.toBe(0)
        await expect(queue.clear()).resolves.toBe(0)
    })

    it('keeps call order for concurrent producers', async () => {
        const queue = new CommandQueue()
        const commands = ['c1', 'c2', 'c3', 'c4', 'c5']

        await Promise.all(commands.map((c) => queue.enqueue(c)))

        await expect(queue.snapshot()).resolves.toEqual(commands)
    })
})
