import type { SpanRecord } from '../spans/types.js'
import type { Fragment } from './fragment.js'

/**
 * Rendering strategy for one span. Each method returns the inner content of
 * a fixed slot in the span node (header, status badge, collapsible body), so
 * a slot can be replaced on its own when the span changes.
 */
export interface SpanRenderer {
    readonly name: string
    renderHeader(span: SpanRecord): Fragment
    renderStatus(span: SpanRecord): Fragment
    renderBody(span: SpanRecord): Fragment
}

/** A renderer that decides for itself which spans it handles. */
export interface MatchingSpanRenderer extends SpanRenderer {
    canRender(span: SpanRecord): boolean
}
