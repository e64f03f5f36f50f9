import type { SpanStatus } from '../spans/types.js'

export type EventMap = {
    'span:start': { spanId: string; parentId?: string; name: string }
    'span:end': { spanId: string; status: SpanStatus; duration: number }
    'span:rejected': { spanId?: string; phase: 'start' | 'end' | 'attributes'; reason: string }
    'render:fallback': { spanId: string; renderer: string; error: Error }
    'viewer:connect': { viewerId: string; containerId: string }
    'viewer:disconnect': { viewerId: string; containerId: string }
    'viewer:overflow': { viewerId: string; containerId: string; dropped: number }
}

type EventHandler<T> = (data: T) => void

export class TypedEventEmitter {
    private handlers = new Map<string, Set<EventHandler<unknown>>>()

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        let set = this.handlers.get(event)
        if (!set) {
            set = new Set()
            this.handlers.set(event, set)
        }
        set.add(handler as EventHandler<unknown>)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers.get(event)?.delete(handler as EventHandler<unknown>)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers.get(event)
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // listeners are observers; the span pipeline keeps going
            }
        }
    }

    removeAll(): void {
        this.handlers.clear()
    }
}
