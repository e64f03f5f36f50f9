import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { SpanRecord } from '../spans/types.js'
import type { MatchingSpanRenderer, SpanRenderer } from './types.js'

/**
 * Chooses a renderer per span from its attributes.
 *
 * Resolution order: keyed renderers in the order their keys were first
 * registered, then matcher renderers in the order they were added, then the
 * default. Lookups always read the current registry, so a renderer registered
 * after a span started is used for that span's next render.
 */
export class RendererRegistry {
    private byKey = new Map<string, SpanRenderer>()
    private matchers: MatchingSpanRenderer[] = []

    constructor(
        private fallback: SpanRenderer,
        private logger: Logger
    ) {}

    get defaultRenderer(): SpanRenderer {
        return this.fallback
    }

    /** Re-registering a key replaces its renderer and keeps the key's position. */
    register(attributeKey: string, renderer: SpanRenderer): void {
        if (this.byKey.has(attributeKey)) {
            this.logger.debug({ attributeKey, renderer: renderer.name }, 'renderer:replace')
        }
        this.byKey.set(attributeKey, renderer)
    }

    unregister(attributeKey: string): boolean {
        return this.byKey.delete(attributeKey)
    }

    addMatcher(renderer: MatchingSpanRenderer): void {
        this.matchers.push(renderer)
    }

    keys(): string[] {
        return [...this.byKey.keys()]
    }

    resolve(span: SpanRecord): SpanRenderer {
        for (const [key, renderer] of this.byKey) {
            if (Object.hasOwn(span.attributes, key)) return renderer
        }
        for (const renderer of this.matchers) {
            try {
                if (renderer.canRender(span)) return renderer
            } catch (error) {
                this.logger.warn({ spanId: span.id, renderer: renderer.name, error: errorMessage(error) }, 'renderer:match-failed')
            }
        }
        return this.fallback
    }
}
