import type { Fragment } from '../render/fragment.js'

export type DeltaTarget = { position: 'root' } | { position: 'child'; parentId: string }

export interface CreatedDelta {
    kind: 'created'
    spanId: string
    target: DeltaTarget
    /** Spans previously shown at root level that now live inside this span's node. */
    adopted: readonly string[]
    node: Fragment
}

export interface UpdatedDelta {
    kind: 'updated'
    spanId: string
    header: Fragment
    status: Fragment
    body: Fragment
}

export type SpanDelta = CreatedDelta | UpdatedDelta
