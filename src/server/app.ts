import { Hono } from 'hono'
import { streamSSE } from 'hono/streaming'
import { ContainerIdSchema } from '../config/schema.js'
import type { Container } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { HEARTBEAT_EVENT, TELEMETRY_EVENT, encodeDelta, encodeSnapshot } from '../stream/wire.js'
import { renderPage } from './page.js'

/**
 * HTTP surface: the demo page, the per-container event stream and the
 * counters endpoint. All state lives in the container passed in.
 */
export function createApp(container: Container): Hono {
    const { config, logger, bootstrap, broadcaster, metrics } = container
    const app = new Hono()

    app.get('/', (c) => {
        const body = bootstrap.renderContainer(config.containerId, { title: config.title })
        return c.html(renderPage({ title: config.title, containerId: config.containerId, body }))
    })

    app.get(`${config.endpoint}/stats`, (c) => {
        return c.json({ ...metrics.snapshot(), spansInStore: container.store.size })
    })

    app.get(config.endpoint, (c) => {
        const requested = ContainerIdSchema.safeParse(c.req.query('container') ?? config.containerId)
        if (!requested.success) {
            return c.json({ error: 'container must be a valid HTML id' }, 400)
        }
        const containerId = requested.data

        return streamSSE(
            c,
            async (stream) => {
                const { initial, connection } = bootstrap.connect(containerId)
                stream.onAbort(() => broadcaster.unsubscribe(connection))

                try {
                    await stream.writeSSE({ event: TELEMETRY_EVENT, data: encodeSnapshot(initial, containerId) })
                    while (!stream.aborted && !connection.closed) {
                        const delta = await connection.take(config.heartbeatMs)
                        if (delta === undefined) break
                        if (delta === null) {
                            await stream.writeSSE({ event: HEARTBEAT_EVENT, data: '' })
                            continue
                        }
                        await stream.writeSSE({ event: TELEMETRY_EVENT, data: encodeDelta(delta, containerId) })
                    }
                } finally {
                    broadcaster.unsubscribe(connection)
                }
            },
            async (error) => {
                logger.warn({ containerId, error: errorMessage(error) }, 'viewer:stream-failed')
            }
        )
    })

    return app
}
