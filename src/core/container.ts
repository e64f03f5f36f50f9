import type { ResolvedConfig } from '../config/schema.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { LiveSpanProcessor } from '../otel/span-processor.js'
import { SpanPainter } from '../render/painter.js'
import { RendererRegistry } from '../render/registry.js'
import { DefaultSpanRenderer } from '../render/renderers/default.js'
import type { SpanRenderer } from '../render/types.js'
import { SpanProcessor } from '../spans/processor.js'
import { SpanStore } from '../spans/store.js'
import { ContainerBootstrap } from '../stream/bootstrap.js'
import { UpdateBroadcaster } from '../stream/broadcaster.js'
import { TypedEventEmitter } from './events.js'
import { StreamMetrics } from './metrics.js'

/**
 * The single process-wide telemetry view. Build it once at startup and pass
 * it (or the parts a caller needs) by reference.
 */
export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    store: SpanStore
    registry: RendererRegistry
    painter: SpanPainter
    broadcaster: UpdateBroadcaster
    processor: SpanProcessor
    otelProcessor: LiveSpanProcessor
    bootstrap: ContainerBootstrap
    metrics: StreamMetrics
    shutdown(): Promise<void>
}

export interface ContainerOverrides {
    logger?: Logger
    defaultRenderer?: SpanRenderer
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const store = new SpanStore(logger)
    const registry = new RendererRegistry(overrides.defaultRenderer ?? new DefaultSpanRenderer(), logger)
    const painter = new SpanPainter(registry, logger, eventBus, { autoExpandPatterns: config.autoExpandPatterns })
    const broadcaster = new UpdateBroadcaster(logger, eventBus, { queueSize: config.queueSize })
    const processor = new SpanProcessor({ store, painter, broadcaster, eventBus, logger })
    const otelProcessor = new LiveSpanProcessor(processor)
    const bootstrap = new ContainerBootstrap(store, painter, broadcaster, config.endpoint)
    const metrics = new StreamMetrics(eventBus)

    return {
        config,
        logger,
        eventBus,
        store,
        registry,
        painter,
        broadcaster,
        processor,
        otelProcessor,
        bootstrap,
        metrics,

        async shutdown() {
            const errors: Error[] = []
            try {
                await otelProcessor.shutdown()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            try {
                broadcaster.closeAll()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            metrics.dispose()
            eventBus.removeAll()
            if (errors.length > 0) {
                logger.warn({ errors: errors.map((e) => e.message) }, 'Errors during shutdown')
            }
        },
    }
}
