import { describe, it, expect, afterEach, vi } from 'vitest'
import { SpanStatusCode, context, trace } from '@opentelemetry/api'
import { BasicTracerProvider } from '@opentelemetry/sdk-trace-base'
import type { Container } from '../../src/core/container.js'
import { DemoWorkload } from '../../src/demo/workload.js'
import { toHtml } from '../../src/render/fragment.js'
import { GEN_AI_OPERATION_KEY, GenAiSpanRenderer } from '../../src/render/renderers/gen-ai.js'
import type { ViewerConnection } from '../../src/stream/connection.js'
import type { SpanDelta } from '../../src/stream/types.js'
import { encodeDelta } from '../../src/stream/wire.js'
import { createTestContainer, silentLogger } from '../helpers/stack.js'

async function drain(connection: ViewerConnection): Promise<SpanDelta[]> {
    const deltas: SpanDelta[] = []
    while (connection.pending > 0) {
        const next = await connection.take()
        if (next) deltas.push(next)
    }
    return deltas
}

describe('live view', () => {
    let container: Container | undefined
    let provider: BasicTracerProvider | undefined

    afterEach(async () => {
        await provider?.shutdown()
        await container?.shutdown()
        provider = undefined
        container = undefined
    })

    it('streams a traced agent run to two viewers in the same order', async () => {
        const live = createTestContainer()
        container = live
        live.registry.register(GEN_AI_OPERATION_KEY, new GenAiSpanRenderer())
        provider = new BasicTracerProvider({ spanProcessors: [live.otelProcessor] })
        const tracer = provider.getTracer('live-view-test')

        const first = live.bootstrap.connect('c1').connection
        const second = live.bootstrap.connect('c1').connection

        const root = tracer.startSpan('agent run')
        const chat = tracer.startSpan('chat', { attributes: { [GEN_AI_OPERATION_KEY]: 'chat' } }, trace.setSpan(context.active(), root))
        chat.setStatus({ code: SpanStatusCode.OK })
        chat.end()
        root.end()

        const seenByFirst = await drain(first)
        const seenBySecond = await drain(second)
        const order = seenByFirst.map((d) => `${d.kind}:${d.spanId}`)
        const rootId = root.spanContext().spanId
        const chatId = chat.spanContext().spanId

        expect(order).toEqual([`created:${rootId}`, `created:${chatId}`, `updated:${chatId}`, `updated:${rootId}`])
        expect(seenBySecond.map((d) => `${d.kind}:${d.spanId}`)).toEqual(order)

        const chatCreated = seenByFirst[1]
        expect(chatCreated && encodeDelta(chatCreated, 'c1')).toContain(`<div id="span-children-${rootId}" hx-swap-oob="beforeend">`)
        expect(chatCreated?.kind === 'created' && toHtml(chatCreated.node)).toContain('>chat</span>')
    })

    it('keeps an existing viewer streaming when a new one joins mid-trace', async () => {
        const live = createTestContainer()
        container = live
        provider = new BasicTracerProvider({ spanProcessors: [live.otelProcessor] })
        const tracer = provider.getTracer('live-view-test')

        const early = live.bootstrap.connect('c1').connection
        const root = tracer.startSpan('root')
        const late = live.bootstrap.connect('c1')
        root.end()

        expect(late.snapshot.spans.has(root.spanContext().spanId)).toBe(true)
        expect((await drain(early)).map((d) => d.kind)).toEqual(['created', 'updated'])
        expect((await drain(late.connection)).map((d) => d.kind)).toEqual(['updated'])
    })

    it('produces a complete agent run from the demo workload', async () => {
        const live = createTestContainer()
        container = live
        provider = new BasicTracerProvider({ spanProcessors: [live.otelProcessor] })
        const workload = new DemoWorkload(provider.getTracer('demo'), silentLogger, { intervalMs: 60_000, stepMs: 50 })

        workload.start()
        await vi.waitFor(
            () => {
                const roots = live.store.snapshot().roots
                expect(roots).toHaveLength(1)
                expect(roots[0]?.span.endTime).toBeDefined()
            },
            { timeout: 2000 }
        )
        await workload.stop()

        const [run] = live.store.snapshot().roots
        expect(run?.span.name).toBe('agent run')
        expect(run?.children.map((c) => c.span.name)).toEqual(['chat gpt-4o-mini', 'Tool: Roll a die', 'Tool: Check the time'])
        expect(live.metrics.snapshot().spansEnded).toBe(4)
    })
})
