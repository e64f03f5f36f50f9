import type { TypedEventEmitter } from './events.js'

export interface StreamStats {
    spansStarted: number
    spansEnded: number
    spansErrored: number
    rejected: { start: number; end: number; attributes: number }
    renderFallbacks: number
    viewersConnected: number
    viewersTotal: number
    deltasDropped: number
}

export class StreamMetrics {
    private stats: StreamStats = {
        spansStarted: 0,
        spansEnded: 0,
        spansErrored: 0,
        rejected: { start: 0, end: 0, attributes: 0 },
        renderFallbacks: 0,
        viewersConnected: 0,
        viewersTotal: 0,
        deltasDropped: 0,
    }
    private cleanups: Array<() => void> = []

    constructor(eventBus: TypedEventEmitter) {
        const onStart = () => {
            this.stats.spansStarted++
        }
        eventBus.on('span:start', onStart)
        this.cleanups.push(() => eventBus.off('span:start', onStart))

        const onEnd = ({ status }: { status: string }) => {
            this.stats.spansEnded++
            if (status === 'error') this.stats.spansErrored++
        }
        eventBus.on('span:end', onEnd)
        this.cleanups.push(() => eventBus.off('span:end', onEnd))

        const onRejected = ({ phase }: { phase: 'start' | 'end' | 'attributes' }) => {
            this.stats.rejected[phase]++
        }
        eventBus.on('span:rejected', onRejected)
        this.cleanups.push(() => eventBus.off('span:rejected', onRejected))

        const onFallback = () => {
            this.stats.renderFallbacks++
        }
        eventBus.on('render:fallback', onFallback)
        this.cleanups.push(() => eventBus.off('render:fallback', onFallback))

        const onConnect = () => {
            this.stats.viewersConnected++
            this.stats.viewersTotal++
        }
        eventBus.on('viewer:connect', onConnect)
        this.cleanups.push(() => eventBus.off('viewer:connect', onConnect))

        const onDisconnect = () => {
            this.stats.viewersConnected = Math.max(0, this.stats.viewersConnected - 1)
        }
        eventBus.on('viewer:disconnect', onDisconnect)
        this.cleanups.push(() => eventBus.off('viewer:disconnect', onDisconnect))

        const onOverflow = () => {
            this.stats.deltasDropped++
        }
        eventBus.on('viewer:overflow', onOverflow)
        this.cleanups.push(() => eventBus.off('viewer:overflow', onOverflow))
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    snapshot(): StreamStats {
        return { ...this.stats, rejected: { ...this.stats.rejected } }
    }

    formatStatus(): string {
        const s = this.stats
        const rejected = s.rejected.start + s.rejected.end + s.rejected.attributes
        const lines = [
            `Spans: ${s.spansStarted} started, ${s.spansEnded} ended (${s.spansErrored} errors), ${rejected} rejected`,
            `Viewers: ${s.viewersConnected} connected, ${s.viewersTotal} total, ${s.deltasDropped} deltas dropped`,
        ]
        if (s.renderFallbacks > 0) lines.push(`Render fallbacks: ${s.renderFallbacks}`)
        return lines.join('\n')
    }
}
