import type { Logger } from '../logger/index.js'
import type { ParsedSpanEnd, ParsedSpanStart } from './events.js'
import type {
    AttributeValue,
    SpanAttributes,
    SpanEventRecord,
    SpanRecord,
    SpanStatus,
    SpanTreeNode,
    SpanTreeSnapshot,
} from './types.js'

interface MutableSpan {
    id: string
    parentId?: string
    name: string
    startTime: number
    endTime?: number
    status: SpanStatus
    statusMessage?: string
    attributes: Record<string, AttributeValue>
    events: SpanEventRecord[]
    seq: number
}

export type StoreOutcome =
    | { applied: true; span: SpanRecord }
    | { applied: false; reason: 'duplicate' | 'unknown' | 'closed' }

function freezeAttributes(attributes: Record<string, AttributeValue>): SpanAttributes {
    const copy: Record<string, AttributeValue> = {}
    for (const [key, value] of Object.entries(attributes)) {
        copy[key] = typeof value === 'object' ? Object.freeze([...value]) : value
    }
    return Object.freeze(copy)
}

function toRecord(span: MutableSpan): SpanRecord {
    return Object.freeze({
        id: span.id,
        parentId: span.parentId,
        name: span.name,
        startTime: span.startTime,
        endTime: span.endTime,
        status: span.status,
        statusMessage: span.statusMessage,
        attributes: freezeAttributes(span.attributes),
        events: Object.freeze(
            span.events.map((e) => Object.freeze({ ...e, attributes: freezeAttributes({ ...e.attributes }) }))
        ),
    })
}

function byStart(a: MutableSpan, b: MutableSpan): number {
    return a.startTime - b.startTime || a.seq - b.seq
}

/**
 * In-memory registry of every span seen by this process.
 *
 * All methods are synchronous: on the Node.js event loop each call runs to
 * completion before any other store call starts, so a mutation is never
 * observed half-applied by `snapshot()` or `childrenOf()`. Callers only ever
 * receive frozen copies.
 */
export class SpanStore {
    private spans = new Map<string, MutableSpan>()
    private children = new Map<string, Set<string>>()
    private seq = 0

    constructor(private logger: Logger) {}

    get size(): number {
        return this.spans.size
    }

    onStart(event: ParsedSpanStart): StoreOutcome {
        if (this.spans.has(event.id)) {
            this.logger.warn({ spanId: event.id, name: event.name }, 'span:duplicate-start')
            return { applied: false, reason: 'duplicate' }
        }

        let parentId = event.parentId
        if (parentId === event.id) {
            this.logger.warn({ spanId: event.id }, 'span:self-parent')
            parentId = undefined
        } else if (parentId !== undefined && this.reachesAncestor(parentId, event.id)) {
            this.logger.warn({ spanId: event.id, parentId }, 'span:parent-cycle')
            parentId = undefined
        }

        const span: MutableSpan = {
            id: event.id,
            parentId,
            name: event.name,
            startTime: event.startTime,
            status: 'unset',
            attributes: { ...event.attributes },
            events: [],
            seq: this.seq++,
        }
        this.spans.set(span.id, span)

        if (span.parentId !== undefined) {
            let siblings = this.children.get(span.parentId)
            if (!siblings) {
                siblings = new Set()
                this.children.set(span.parentId, siblings)
            }
            siblings.add(span.id)
        }

        this.logger.debug({ spanId: span.id, parentId: span.parentId, name: span.name }, 'span:start')
        return { applied: true, span: toRecord(span) }
    }

    onEnd(event: ParsedSpanEnd): StoreOutcome {
        const span = this.spans.get(event.id)
        if (!span) {
            this.logger.warn({ spanId: event.id }, 'span:end-unknown')
            return { applied: false, reason: 'unknown' }
        }
        if (span.endTime !== undefined) {
            this.logger.warn({ spanId: event.id }, 'span:end-closed')
            return { applied: false, reason: 'closed' }
        }

        span.endTime = event.endTime
        span.status = event.status
        span.statusMessage = event.statusMessage
        // end-time attributes win over values set while the span was open
        Object.assign(span.attributes, event.attributes)
        if (event.events) {
            span.events = event.events.map((e) => ({ name: e.name, time: e.time, attributes: { ...e.attributes } }))
        }

        this.logger.debug({ spanId: span.id, status: span.status, duration: span.endTime - span.startTime }, 'span:end')
        return { applied: true, span: toRecord(span) }
    }

    setAttributes(id: string, attributes: Record<string, AttributeValue>): StoreOutcome {
        const span = this.spans.get(id)
        if (!span) {
            this.logger.warn({ spanId: id }, 'span:attributes-unknown')
            return { applied: false, reason: 'unknown' }
        }
        if (span.endTime !== undefined) {
            this.logger.warn({ spanId: id }, 'span:attributes-closed')
            return { applied: false, reason: 'closed' }
        }
        Object.assign(span.attributes, attributes)
        return { applied: true, span: toRecord(span) }
    }

    get(id: string): SpanRecord | undefined {
        const span = this.spans.get(id)
        return span ? toRecord(span) : undefined
    }

    has(id: string): boolean {
        return this.spans.has(id)
    }

    childrenOf(id: string): SpanRecord[] {
        return this.sortedChildren(id).map(toRecord)
    }

    snapshot(): SpanTreeSnapshot {
        const records = new Map<string, SpanRecord>()
        for (const span of this.spans.values()) {
            records.set(span.id, toRecord(span))
        }

        const roots = [...this.spans.values()]
            .filter((span) => span.parentId === undefined || !this.spans.has(span.parentId))
            .sort(byStart)
            .map((span) => this.buildNode(span, records))

        return Object.freeze({ roots: Object.freeze(roots), spans: records, takenAt: Date.now() })
    }

    /** The span and everything currently known beneath it. */
    subtree(id: string): SpanTreeNode | undefined {
        const span = this.spans.get(id)
        return span ? this.buildNode(span, new Map()) : undefined
    }

    clear(): void {
        this.spans.clear()
        this.children.clear()
    }

    /** True when `target` is `from` or one of its stored ancestors. */
    private reachesAncestor(from: string, target: string): boolean {
        const seen = new Set<string>()
        let cursor: string | undefined = from
        while (cursor !== undefined && !seen.has(cursor)) {
            if (cursor === target) return true
            seen.add(cursor)
            cursor = this.spans.get(cursor)?.parentId
        }
        return false
    }

    private buildNode(span: MutableSpan, records: Map<string, SpanRecord>): SpanTreeNode {
        let record = records.get(span.id)
        if (!record) {
            record = toRecord(span)
            records.set(span.id, record)
        }
        return Object.freeze({
            span: record,
            children: Object.freeze(this.sortedChildren(span.id).map((child) => this.buildNode(child, records))),
        })
    }

    private sortedChildren(id: string): MutableSpan[] {
        const ids = this.children.get(id)
        if (!ids) return []
        const result: MutableSpan[] = []
        for (const childId of ids) {
            const child = this.spans.get(childId)
            if (child) result.push(child)
        }
        return result.sort(byStart)
    }
}
