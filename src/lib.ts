export { loadConfig } from './config/loader.js'
export { DEFAULT_CONFIG } from './config/defaults.js'
export type { Config, ResolvedConfig } from './config/schema.js'
export { createContainer, type Container, type ContainerOverrides } from './core/container.js'
export { ConfigError, LiveSpanError, RenderError, TelemetryError } from './core/errors.js'
export { TypedEventEmitter, type EventMap } from './core/events.js'
export { StreamMetrics, type StreamStats } from './core/metrics.js'
export { createLogger, type Logger } from './logger/index.js'
export { LiveSpanProcessor, toEndEvent, toStartEvent } from './otel/span-processor.js'
export { type Fragment, type FragmentChild, div, el, group, li, raw, span, toHtml, ul } from './render/fragment.js'
export { SpanPainter, slotIds } from './render/painter.js'
export { RendererRegistry } from './render/registry.js'
export { CompactSpanRenderer } from './render/renderers/compact.js'
export { DefaultSpanRenderer } from './render/renderers/default.js'
export { GEN_AI_OPERATION_KEY, GenAiSpanRenderer } from './render/renderers/gen-ai.js'
export type { MatchingSpanRenderer, SpanRenderer } from './render/types.js'
export { createApp } from './server/app.js'
export type { SpanEndEvent, SpanStartEvent } from './spans/events.js'
export { SpanProcessor } from './spans/processor.js'
export { SpanStore } from './spans/store.js'
export type { SpanRecord, SpanStatus, SpanTreeNode, SpanTreeSnapshot } from './spans/types.js'
export { ContainerBootstrap } from './stream/bootstrap.js'
export { UpdateBroadcaster } from './stream/broadcaster.js'
export { ViewerConnection } from './stream/connection.js'
export type { SpanDelta } from './stream/types.js'
export { encodeDelta, encodeSnapshot } from './stream/wire.js'
