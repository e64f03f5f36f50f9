import { type Attributes, type Context, SpanStatusCode, context } from '@opentelemetry/api'
import { hrTimeToMilliseconds, suppressTracing } from '@opentelemetry/core'
import type { ReadableSpan, Span, SpanProcessor as OtelSpanProcessor } from '@opentelemetry/sdk-trace-base'
import type { SpanEndEvent, SpanStartEvent } from '../spans/events.js'
import type { SpanProcessor } from '../spans/processor.js'
import type { AttributeScalar, SpanStatus } from '../spans/types.js'

function isScalar(value: unknown): value is AttributeScalar {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

export function toAttributes(attributes: Attributes | undefined): Record<string, AttributeScalar | AttributeScalar[]> {
    const result: Record<string, AttributeScalar | AttributeScalar[]> = {}
    if (!attributes) return result
    for (const [key, value] of Object.entries(attributes)) {
        if (isScalar(value)) {
            result[key] = value
        } else if (Array.isArray(value)) {
            // the SDK allows null holes in array attributes
            result[key] = value.filter(isScalar)
        }
    }
    return result
}

export function toStatus(code: SpanStatusCode): SpanStatus {
    if (code === SpanStatusCode.OK) return 'ok'
    if (code === SpanStatusCode.ERROR) return 'error'
    return 'unset'
}

export function toStartEvent(span: ReadableSpan): SpanStartEvent {
    return {
        id: span.spanContext().spanId,
        parentId: span.parentSpanContext?.spanId,
        name: span.name,
        startTime: hrTimeToMilliseconds(span.startTime),
        attributes: toAttributes(span.attributes),
    }
}

export function toEndEvent(span: ReadableSpan): SpanEndEvent {
    return {
        id: span.spanContext().spanId,
        endTime: hrTimeToMilliseconds(span.endTime),
        status: toStatus(span.status.code),
        statusMessage: span.status.message,
        attributes: toAttributes(span.attributes),
        events: span.events.map((event) => ({
            name: event.name,
            time: hrTimeToMilliseconds(event.time),
            attributes: toAttributes(event.attributes),
        })),
    }
}

/**
 * OpenTelemetry SDK span processor feeding the live view. Register it on a
 * tracer provider with `spanProcessors: [processor]`.
 */
export class LiveSpanProcessor implements OtelSpanProcessor {
    private stopped = false

    constructor(private processor: SpanProcessor) {}

    onStart(span: Span, _parentContext: Context): void {
        if (this.stopped) return
        this.untraced(() => this.processor.onStart(toStartEvent(span)))
    }

    onEnd(span: ReadableSpan): void {
        if (this.stopped) return
        this.untraced(() => this.processor.onEnd(toEndEvent(span)))
    }

    forceFlush(): Promise<void> {
        return Promise.resolve()
    }

    shutdown(): Promise<void> {
        this.stopped = true
        return Promise.resolve()
    }

    // work done while rendering must not produce spans of its own
    private untraced(fn: () => void): void {
        context.with(suppressTracing(context.active()), fn)
    }
}
