import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import { ViewerConnection } from './connection.js'
import type { SpanDelta } from './types.js'

export interface BroadcasterOptions {
    queueSize: number
}

/**
 * Fan-out of render deltas to every connected viewer, grouped by the
 * container id each viewer renders into. Publishing only appends to each
 * viewer's bounded queue, so one stalled viewer never holds up the others.
 */
export class UpdateBroadcaster {
    private containers = new Map<string, Set<ViewerConnection>>()

    constructor(
        private logger: Logger,
        private eventBus: TypedEventEmitter,
        private options: BroadcasterOptions
    ) {}

    subscribe(containerId: string): ViewerConnection {
        const connection: ViewerConnection = new ViewerConnection(containerId, this.options.queueSize, (dropped) => {
            // first drop and then every 100th, so a stuck viewer cannot flood the log
            if (dropped === 1 || dropped % 100 === 0) {
                this.logger.warn({ viewerId: connection.id, containerId, dropped }, 'viewer:overflow')
            }
            this.eventBus.emit('viewer:overflow', { viewerId: connection.id, containerId, dropped })
        })

        let viewers = this.containers.get(containerId)
        if (!viewers) {
            viewers = new Set()
            this.containers.set(containerId, viewers)
        }
        viewers.add(connection)

        this.logger.debug({ viewerId: connection.id, containerId }, 'viewer:connect')
        this.eventBus.emit('viewer:connect', { viewerId: connection.id, containerId })
        return connection
    }

    unsubscribe(connection: ViewerConnection): void {
        const viewers = this.containers.get(connection.containerId)
        const removed = viewers?.delete(connection) ?? false
        if (viewers && viewers.size === 0) this.containers.delete(connection.containerId)
        connection.close()

        if (removed) {
            this.logger.debug({ viewerId: connection.id, containerId: connection.containerId }, 'viewer:disconnect')
            this.eventBus.emit('viewer:disconnect', { viewerId: connection.id, containerId: connection.containerId })
        }
    }

    /** Returns the number of viewers the delta was queued for. */
    publish(containerId: string, delta: SpanDelta): number {
        const viewers = this.containers.get(containerId)
        if (!viewers) return 0
        let delivered = 0
        for (const connection of viewers) {
            if (connection.push(delta)) delivered++
        }
        return delivered
    }

    broadcast(delta: SpanDelta): number {
        let delivered = 0
        for (const containerId of this.containers.keys()) {
            delivered += this.publish(containerId, delta)
        }
        return delivered
    }

    viewerCount(containerId?: string): number {
        if (containerId !== undefined) return this.containers.get(containerId)?.size ?? 0
        let total = 0
        for (const viewers of this.containers.values()) total += viewers.size
        return total
    }

    containerIds(): string[] {
        return [...this.containers.keys()]
    }

    closeAll(): void {
        for (const viewers of [...this.containers.values()]) {
            for (const connection of [...viewers]) this.unsubscribe(connection)
        }
    }
}
