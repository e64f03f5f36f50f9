import { RenderError, errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import type { SpanRecord, SpanTreeNode } from '../spans/types.js'
import { type Fragment, div, group, input, label } from './fragment.js'
import type { RendererRegistry } from './registry.js'
import type { SpanRenderer } from './types.js'

export interface PaintedSpan {
    readonly renderer: string
    readonly header: Fragment
    readonly status: Fragment
    readonly body: Fragment
}

export interface RenderedSubtree {
    readonly fragment: Fragment
    readonly childIds: readonly string[]
}

export interface PainterOptions {
    /** Span names containing any of these (case-insensitive) start expanded. */
    autoExpandPatterns?: string[]
}

export const slotIds = {
    node: (spanId: string) => `span-${spanId}`,
    header: (spanId: string) => `span-header-${spanId}`,
    status: (spanId: string) => `span-status-${spanId}`,
    body: (spanId: string) => `span-body-${spanId}`,
    children: (spanId: string) => `span-children-${spanId}`,
    checkbox: (spanId: string) => `span-checkbox-${spanId}`,
}

function paintWith(renderer: SpanRenderer, span: SpanRecord): PaintedSpan {
    return {
        renderer: renderer.name,
        header: renderer.renderHeader(span),
        status: renderer.renderStatus(span),
        body: renderer.renderBody(span),
    }
}

/**
 * Turns spans into fragments: resolves a renderer, falls back to the default
 * renderer when the resolved one throws, and lays out the collapsible node
 * that holds the renderer's slots and the children container.
 */
export class SpanPainter {
    private autoExpand: string[]

    constructor(
        private registry: RendererRegistry,
        private logger: Logger,
        private eventBus: TypedEventEmitter,
        options: PainterOptions = {}
    ) {
        this.autoExpand = (options.autoExpandPatterns ?? []).map((p) => p.toLowerCase())
    }

    /** Returns undefined only when the default renderer itself fails. */
    paint(span: SpanRecord): PaintedSpan | undefined {
        const renderer = this.registry.resolve(span)
        const fallback = this.registry.defaultRenderer

        if (renderer !== fallback) {
            try {
                return paintWith(renderer, span)
            } catch (cause) {
                const error = new RenderError(`Renderer "${renderer.name}" failed: ${errorMessage(cause)}`, span.id, renderer.name, { cause })
                this.logger.warn({ spanId: span.id, renderer: renderer.name, error: error.message }, 'render:fallback')
                this.eventBus.emit('render:fallback', { spanId: span.id, renderer: renderer.name, error })
            }
        }

        try {
            return paintWith(fallback, span)
        } catch (cause) {
            this.logger.error({ spanId: span.id, renderer: fallback.name, error: errorMessage(cause) }, 'render:failed')
            return undefined
        }
    }

    shouldExpand(span: SpanRecord, isRoot: boolean): boolean {
        if (isRoot) return true
        const name = span.name.toLowerCase()
        return this.autoExpand.some((pattern) => name.includes(pattern))
    }

    /** A span node with its whole subtree; subtrees whose default rendering fails are left out. */
    renderNode(node: SpanTreeNode, isRoot: boolean): Fragment | undefined {
        return this.renderSubtree(node, isRoot)?.fragment
    }

    /** Like `renderNode`, also naming the direct children that made it into the fragment. */
    renderSubtree(node: SpanTreeNode, isRoot: boolean): RenderedSubtree | undefined {
        const painted = this.paint(node.span)
        if (!painted) return undefined

        const id = node.span.id
        const children: Fragment[] = []
        const childIds: string[] = []
        for (const child of node.children) {
            const rendered = this.renderNode(child, false)
            if (!rendered) continue
            children.push(rendered)
            childIds.push(child.span.id)
        }

        const fragment = div(
            { id: slotIds.node(id), class: 'my-1', 'data-span-id': id },
            div(
                { class: 'collapse collapse-arrow bg-base-100 border border-base-300 rounded-lg my-1' },
                input({ type: 'checkbox', class: 'collapse-checkbox', id: slotIds.checkbox(id), checked: this.shouldExpand(node.span, isRoot) }),
                label(
                    {
                        for: slotIds.checkbox(id),
                        class: 'collapse-title text-sm font-medium p-2 hover:bg-base-200 transition-colors cursor-pointer flex gap-2',
                    },
                    div({ id: slotIds.header(id), class: 'flex-1' }, painted.header),
                    div({ id: slotIds.status(id) }, painted.status)
                ),
                div({ id: slotIds.body(id), class: 'collapse-content pl-4 space-y-2' }, painted.body)
            ),
            div({ id: slotIds.children(id), class: 'pl-4 space-y-1 border-l border-base-300' }, ...children)
        )
        return { fragment, childIds }
    }

    renderForest(roots: readonly SpanTreeNode[]): Fragment {
        return group(...roots.map((root) => this.renderNode(root, true)))
    }
}
