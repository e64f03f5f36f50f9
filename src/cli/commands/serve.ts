import { serve } from '@hono/node-server'
import { BasicTracerProvider } from '@opentelemetry/sdk-trace-base'
import type { ResolvedConfig } from '../../config/schema.js'
import { createContainer } from '../../core/container.js'
import { DemoWorkload } from '../../demo/workload.js'
import { GEN_AI_OPERATION_KEY, GenAiSpanRenderer } from '../../render/renderers/gen-ai.js'
import { createApp } from '../../server/app.js'
import { banner, colors, formatListening } from '../ui.js'

export interface ServeOptions {
    demo?: boolean
    version: string
}

export async function serveCommand(config: ResolvedConfig, options: ServeOptions): Promise<void> {
    const container = createContainer(config)
    container.registry.register(GEN_AI_OPERATION_KEY, new GenAiSpanRenderer())

    const provider = new BasicTracerProvider({ spanProcessors: [container.otelProcessor] })
    const workload = options.demo ? new DemoWorkload(provider.getTracer('livespan-demo'), container.logger) : null

    const app = createApp(container)
    const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host })

    console.log(banner(options.version))
    console.log(formatListening(config.host, config.port, config.endpoint))
    if (workload) {
        workload.start()
        console.log(colors.dim('  demo workload running'))
    }

    await new Promise<void>((resolve) => {
        const stop = () => {
            process.off('SIGINT', stop)
            process.off('SIGTERM', stop)
            resolve()
        }
        process.on('SIGINT', stop)
        process.on('SIGTERM', stop)
    })

    console.log(colors.dim('\nShutting down...'))
    console.log(container.metrics.formatStatus())
    await workload?.stop()
    await provider.shutdown()
    await container.shutdown()
    await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()))
    })
}
