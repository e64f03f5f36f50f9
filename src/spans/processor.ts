import { TelemetryError, errorMessage } from '../core/errors.js'
import type { EventMap, TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import type { SpanPainter } from '../render/painter.js'
import type { UpdateBroadcaster } from '../stream/broadcaster.js'
import type { DeltaTarget } from '../stream/types.js'
import { type SpanEndEvent, type SpanStartEvent, parseAttributes, parseEndEvent, parseStartEvent } from './events.js'
import type { SpanStore, StoreOutcome } from './store.js'
import type { SpanRecord } from './types.js'

export interface SpanProcessorDeps {
    store: SpanStore
    painter: SpanPainter
    broadcaster: UpdateBroadcaster
    eventBus: TypedEventEmitter
    logger: Logger
}

type Phase = EventMap['span:rejected']['phase']

function idOf(event: unknown): string | undefined {
    if (typeof event === 'object' && event !== null && 'id' in event && typeof event.id === 'string') return event.id
    return undefined
}

/**
 * Receives span lifecycle calls from the instrumentation layer and turns each
 * into store mutation, rendering and a broadcast delta. None of its public
 * methods throw: a telemetry fault must never surface in the traced code.
 */
export class SpanProcessor {
    private store: SpanStore
    private painter: SpanPainter
    private broadcaster: UpdateBroadcaster
    private eventBus: TypedEventEmitter
    private logger: Logger

    constructor(deps: SpanProcessorDeps) {
        this.store = deps.store
        this.painter = deps.painter
        this.broadcaster = deps.broadcaster
        this.eventBus = deps.eventBus
        this.logger = deps.logger
    }

    onStart(event: SpanStartEvent): void {
        this.guard('start', idOf(event), () => {
            const parsed = parseStartEvent(event)
            if (!parsed.ok) return this.invalid('start', event, parsed.error)

            const outcome = this.store.onStart(parsed.value)
            if (!outcome.applied) return this.reject('start', parsed.value.id, outcome.reason)
            const span = outcome.span

            // children that arrived before this span were shown as roots until now
            const subtree = this.store.subtree(span.id)
            if (!subtree) return
            const target: DeltaTarget =
                span.parentId !== undefined && this.store.has(span.parentId)
                    ? { position: 'child', parentId: span.parentId }
                    : { position: 'root' }

            const rendered = this.painter.renderSubtree(subtree, target.position === 'root')
            if (rendered) {
                // only children present in the new node may be removed from the root level
                this.broadcaster.broadcast({
                    kind: 'created',
                    spanId: span.id,
                    target,
                    adopted: rendered.childIds,
                    node: rendered.fragment,
                })
            }
            this.eventBus.emit('span:start', { spanId: span.id, parentId: span.parentId, name: span.name })
        })
    }

    onEnd(event: SpanEndEvent): void {
        this.guard('end', idOf(event), () => {
            const parsed = parseEndEvent(event)
            if (!parsed.ok) return this.invalid('end', event, parsed.error)

            const outcome = this.store.onEnd(parsed.value)
            const span = this.publishUpdate('end', parsed.value.id, outcome)
            if (span?.endTime !== undefined) {
                this.eventBus.emit('span:end', { spanId: span.id, status: span.status, duration: span.endTime - span.startTime })
            }
        })
    }

    /** Attributes set on a span while it is still open. */
    onAttributes(id: string, attributes: Record<string, unknown>): void {
        this.guard('attributes', id, () => {
            const parsed = parseAttributes(attributes)
            if (!parsed.ok) return this.invalid('attributes', { id }, parsed.error)
            this.publishUpdate('attributes', id, this.store.setAttributes(id, parsed.value))
        })
    }

    private publishUpdate(phase: Phase, id: string, outcome: StoreOutcome): SpanRecord | undefined {
        if (!outcome.applied) {
            this.reject(phase, id, outcome.reason)
            return undefined
        }
        const painted = this.painter.paint(outcome.span)
        if (painted) {
            this.broadcaster.broadcast({
                kind: 'updated',
                spanId: id,
                header: painted.header,
                status: painted.status,
                body: painted.body,
            })
        }
        return outcome.span
    }

    private reject(phase: Phase, spanId: string | undefined, reason: string): void {
        this.eventBus.emit('span:rejected', { spanId, phase, reason })
    }

    private invalid(phase: Phase, event: unknown, issues: string): void {
        const spanId = idOf(event)
        const err = new TelemetryError(`Malformed span ${phase} event: ${issues}`, spanId)
        this.logger.warn({ err, spanId, phase }, 'span:invalid')
        this.reject(phase, spanId, issues)
    }

    private guard(phase: Phase, spanId: string | undefined, fn: () => void): void {
        try {
            fn()
        } catch (error) {
            this.logger.error({ spanId, phase, error: errorMessage(error) }, 'span:processor-failed')
        }
    }
}
