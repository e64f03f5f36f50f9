import { type Fragment, div, el } from '../render/fragment.js'
import type { SpanPainter } from '../render/painter.js'
import type { SpanStore } from '../spans/store.js'
import type { SpanTreeSnapshot } from '../spans/types.js'
import type { UpdateBroadcaster } from './broadcaster.js'
import type { ViewerConnection } from './connection.js'
import { TELEMETRY_EVENT } from './wire.js'

export interface BootstrapResult {
    initial: Fragment
    snapshot: SpanTreeSnapshot
    connection: ViewerConnection
}

export interface ContainerOptions {
    title?: string
    class?: string
}

/**
 * Entry point for a new viewer. Snapshot, render and subscribe happen in one
 * synchronous call, so no span event can be processed in between and every
 * delta after the snapshot reaches the new connection.
 */
export class ContainerBootstrap {
    constructor(
        private store: SpanStore,
        private painter: SpanPainter,
        private broadcaster: UpdateBroadcaster,
        private endpoint: string
    ) {}

    connect(containerId: string): BootstrapResult {
        const snapshot = this.store.snapshot()
        const initial = this.painter.renderForest(snapshot.roots)
        const connection = this.broadcaster.subscribe(containerId)
        return { initial, snapshot, connection }
    }

    /** Empty container wired to the event stream; filled by the first message. */
    renderContainer(containerId: string, options: ContainerOptions = {}): Fragment {
        const query = new URLSearchParams({ container: containerId })
        return div(
            {},
            options.title ? el('h2', { class: 'text-xl font-bold mb-4' }, options.title) : null,
            div({
                id: containerId,
                class: options.class ?? 'h-[70vh] overflow-y-auto p-4 bg-base-300 rounded-lg border',
                'hx-ext': 'sse',
                'sse-connect': `${this.endpoint}?${query.toString()}`,
                'sse-swap': TELEMETRY_EVENT,
                'hx-swap': 'beforeend',
            })
        )
    }
}
