import { slotIds } from '../render/painter.js'
import { type Fragment, div, group, toHtml } from '../render/fragment.js'
import type { SpanDelta } from './types.js'

/** SSE event name the container swaps on (`sse-swap`). */
export const TELEMETRY_EVENT = 'TelemetryEvent'
export const HEARTBEAT_EVENT = 'heartbeat'

function oob(id: string, swap: string, ...content: Fragment[]): Fragment {
    return div({ id, 'hx-swap-oob': swap }, ...content)
}

/**
 * Encodes a delta as htmx out-of-band markup for one container. Root-level
 * spans are appended to the container itself, child spans to their parent's
 * children container.
 */
export function encodeDelta(delta: SpanDelta, containerId: string): string {
    if (delta.kind === 'created') {
        const targetId = delta.target.position === 'root' ? containerId : slotIds.children(delta.target.parentId)
        return toHtml(
            group(
                ...delta.adopted.map((id) => oob(slotIds.node(id), 'delete')),
                oob(targetId, 'beforeend', delta.node)
            )
        )
    }

    return toHtml(
        group(
            oob(slotIds.header(delta.spanId), 'innerHTML', delta.header),
            oob(slotIds.status(delta.spanId), 'innerHTML', delta.status),
            oob(slotIds.body(delta.spanId), 'innerHTML', delta.body)
        )
    )
}

/** Replaces the whole container content; sent first on every (re)connect. */
export function encodeSnapshot(initial: Fragment, containerId: string): string {
    return toHtml(oob(containerId, 'innerHTML', initial))
}
