import { randomUUID } from 'node:crypto'
import type { SpanDelta } from './types.js'

type Waiter = (value: SpanDelta | null | undefined) => void

/**
 * Outbound channel of one viewer. Holds at most `capacity` deltas; when full
 * the oldest queued delta is dropped so `push` never waits on the consumer.
 */
export class ViewerConnection {
    readonly id = randomUUID()
    private queue: SpanDelta[] = []
    private waiter: Waiter | null = null
    private timer: NodeJS.Timeout | null = null
    private isClosed = false
    private droppedCount = 0

    constructor(
        readonly containerId: string,
        private capacity: number,
        private onOverflow?: (dropped: number) => void
    ) {}

    get closed(): boolean {
        return this.isClosed
    }

    get pending(): number {
        return this.queue.length
    }

    get dropped(): number {
        return this.droppedCount
    }

    push(delta: SpanDelta): boolean {
        if (this.isClosed) return false

        if (this.waiter) {
            this.settle(delta)
            return true
        }

        this.queue.push(delta)
        if (this.queue.length > this.capacity) {
            this.queue.shift()
            this.droppedCount++
            this.onOverflow?.(this.droppedCount)
        }
        return true
    }

    /**
     * Next delta in publish order. Resolves `null` when `timeoutMs` elapses
     * first and `undefined` once the connection is closed.
     */
    take(timeoutMs?: number): Promise<SpanDelta | null | undefined> {
        const next = this.queue.shift()
        if (next) return Promise.resolve(next)
        if (this.isClosed) return Promise.resolve(undefined)
        if (this.waiter) return Promise.reject(new Error(`viewer ${this.id} already has a pending take`))

        return new Promise((resolve) => {
            this.waiter = resolve
            if (timeoutMs !== undefined) {
                this.timer = setTimeout(() => this.settle(null), timeoutMs)
            }
        })
    }

    close(): void {
        if (this.isClosed) return
        this.isClosed = true
        this.queue = []
        this.settle(undefined)
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<SpanDelta> {
        while (true) {
            const delta = await this.take()
            if (delta === undefined) return
            if (delta) yield delta
        }
    }

    private settle(value: SpanDelta | null | undefined): void {
        if (this.timer) {
            clearTimeout(this.timer)
            this.timer = null
        }
        const waiter = this.waiter
        this.waiter = null
        waiter?.(value)
    }
}
