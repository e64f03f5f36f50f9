export type SpanStatus = 'unset' | 'ok' | 'error'

export type AttributeScalar = string | number | boolean

export type AttributeValue = AttributeScalar | readonly AttributeScalar[]

export type SpanAttributes = Readonly<Record<string, AttributeValue>>

export interface SpanEventRecord {
    readonly name: string
    readonly time: number
    readonly attributes: SpanAttributes
}

/** Read-only view of a span as held by the store. Timestamps are in milliseconds. */
export interface SpanRecord {
    readonly id: string
    readonly parentId?: string
    readonly name: string
    readonly startTime: number
    readonly endTime?: number
    readonly status: SpanStatus
    readonly statusMessage?: string
    readonly attributes: SpanAttributes
    readonly events: readonly SpanEventRecord[]
}

export interface SpanTreeNode {
    readonly span: SpanRecord
    readonly children: readonly SpanTreeNode[]
}

export interface SpanTreeSnapshot {
    readonly roots: readonly SpanTreeNode[]
    readonly spans: ReadonlyMap<string, SpanRecord>
    readonly takenAt: number
}

export function isOpen(span: SpanRecord): boolean {
    return span.endTime === undefined
}

export function durationMs(span: SpanRecord): number | undefined {
    if (span.endTime === undefined) return undefined
    return span.endTime - span.startTime
}
