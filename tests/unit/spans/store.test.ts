import { describe, it, expect } from 'vitest'
import { SpanStore } from '../../../src/spans/store.js'
import { parseEndEvent, parseStartEvent } from '../../../src/spans/events.js'
import type { SpanEndEvent, SpanStartEvent } from '../../../src/spans/events.js'
import type { SpanTreeNode } from '../../../src/spans/types.js'
import { end, silentLogger, start } from '../../helpers/stack.js'

function startSpan(store: SpanStore, event: SpanStartEvent) {
    const parsed = parseStartEvent(event)
    if (!parsed.ok) throw new Error(parsed.error)
    return store.onStart(parsed.value)
}

function endSpan(store: SpanStore, event: SpanEndEvent) {
    const parsed = parseEndEvent(event)
    if (!parsed.ok) throw new Error(parsed.error)
    return store.onEnd(parsed.value)
}

function collectIds(nodes: readonly SpanTreeNode[]): string[] {
    return nodes.flatMap((node) => [node.span.id, ...collectIds(node.children)])
}

describe('SpanStore', () => {
    it('shows a started root span as open', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('root', 100))

        const snapshot = store.snapshot()
        expect(snapshot.roots).toHaveLength(1)
        expect(snapshot.roots[0]?.span.id).toBe('root')
        expect(snapshot.roots[0]?.span.endTime).toBeUndefined()
        expect(snapshot.roots[0]?.span.status).toBe('unset')
    })

    it('closes a span with its final status', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('root', 100))
        endSpan(store, end('root', 150, { status: 'ok' }))

        const root = store.snapshot().roots[0]?.span
        expect(root?.endTime).toBe(150)
        expect(root?.status).toBe('ok')
    })

    it('nests a child under its parent', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('root', 100))
        startSpan(store, start('child', 110, { parentId: 'root' }))
        endSpan(store, end('child', 120))
        endSpan(store, end('root', 130))

        const snapshot = store.snapshot()
        expect(snapshot.roots).toHaveLength(1)
        const root = snapshot.roots[0]
        expect(root?.children.map((c) => c.span.id)).toEqual(['child'])
        expect(root?.span.endTime).toBe(130)
        expect(root?.children[0]?.span.endTime).toBe(120)
    })

    it('ignores a duplicate start without changing the span', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('a', 100, { name: 'first' }))
        const outcome = startSpan(store, start('a', 200, { name: 'second' }))

        expect(outcome).toEqual({ applied: false, reason: 'duplicate' })
        expect(store.size).toBe(1)
        expect(store.get('a')?.name).toBe('first')
        expect(store.get('a')?.startTime).toBe(100)
    })

    it('ignores an end for an unknown span', () => {
        const store = new SpanStore(silentLogger)
        const outcome = endSpan(store, end('ghost', 100))
        expect(outcome).toEqual({ applied: false, reason: 'unknown' })
        expect(store.size).toBe(0)
    })

    it('treats a second identical end as a no-op', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('a', 100, { attributes: { k: 'v' } }))
        endSpan(store, end('a', 140, { attributes: { k: 'final' } }))
        const afterOnce = store.snapshot()

        const outcome = endSpan(store, end('a', 140, { attributes: { k: 'final' } }))
        const afterTwice = store.snapshot()

        expect(outcome).toEqual({ applied: false, reason: 'closed' })
        expect(afterTwice.roots).toEqual(afterOnce.roots)
    })

    it('never reopens or rewrites a closed span', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('a', 100))
        endSpan(store, end('a', 140, { status: 'ok' }))
        endSpan(store, end('a', 999, { status: 'error' }))

        expect(store.get('a')?.endTime).toBe(140)
        expect(store.get('a')?.status).toBe('ok')
    })

    it('lets end-time attributes win over earlier values', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('a', 100, { attributes: { model: 'draft', kept: 1 } }))
        endSpan(store, end('a', 110, { attributes: { model: 'final', added: true } }))

        expect(store.get('a')?.attributes).toEqual({ model: 'final', kept: 1, added: true })
    })

    it('merges attributes while open and refuses them after close', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('a', 100))

        expect(store.setAttributes('a', { step: 1 }).applied).toBe(true)
        endSpan(store, end('a', 110))
        expect(store.setAttributes('a', { step: 2 })).toEqual({ applied: false, reason: 'closed' })
        expect(store.get('a')?.attributes).toEqual({ step: 1 })
    })

    it('shows an orphan as a root until its parent arrives', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('child', 110, { parentId: 'parent' }))
        expect(store.snapshot().roots.map((n) => n.span.id)).toEqual(['child'])

        startSpan(store, start('parent', 100))
        const roots = store.snapshot().roots
        expect(roots.map((n) => n.span.id)).toEqual(['parent'])
        expect(roots[0]?.children.map((n) => n.span.id)).toEqual(['child'])
    })

    it('orders children by start time regardless of arrival order', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('root', 0))
        startSpan(store, start('late', 30, { parentId: 'root' }))
        startSpan(store, start('early', 10, { parentId: 'root' }))
        startSpan(store, start('middle', 20, { parentId: 'root' }))

        expect(store.childrenOf('root').map((s) => s.id)).toEqual(['early', 'middle', 'late'])
    })

    it('breaks start time ties by arrival order', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('root', 0))
        startSpan(store, start('b', 5, { parentId: 'root' }))
        startSpan(store, start('a', 5, { parentId: 'root' }))

        expect(store.childrenOf('root').map((s) => s.id)).toEqual(['b', 'a'])
    })

    it('treats a span naming itself as parent as a root', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('loop', 0, { parentId: 'loop' }))

        const snapshot = store.snapshot()
        expect(snapshot.roots.map((n) => n.span.id)).toEqual(['loop'])
        expect(snapshot.roots[0]?.children).toEqual([])
    })

    it('breaks a parent cycle by making the closing span a root', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('a', 1, { parentId: 'b' }))
        startSpan(store, start('b', 2, { parentId: 'a' }))

        const snapshot = store.snapshot()
        expect(snapshot.spans.size).toBe(2)
        expect(snapshot.roots.map((n) => n.span.id)).toEqual(['b'])
        expect(snapshot.roots[0]?.children.map((n) => n.span.id)).toEqual(['a'])
        expect(store.get('b')?.parentId).toBeUndefined()
        expect(store.subtree('b')?.children.map((n) => n.span.id)).toEqual(['a'])
    })

    it('breaks a longer parent cycle', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('a', 1, { parentId: 'c' }))
        startSpan(store, start('b', 2, { parentId: 'a' }))
        startSpan(store, start('c', 3, { parentId: 'b' }))

        const roots = store.snapshot().roots
        expect(roots.map((n) => n.span.id)).toEqual(['c'])
        expect(collectIds(roots)).toEqual(['c', 'a', 'b'])
    })

    it('keeps earlier snapshots unchanged by later mutations', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('a', 100, { attributes: { n: 1 } }))
        const before = store.snapshot()

        store.setAttributes('a', { n: 2 })
        endSpan(store, end('a', 120))

        expect(before.roots[0]?.span.attributes).toEqual({ n: 1 })
        expect(before.roots[0]?.span.endTime).toBeUndefined()
        expect(Object.isFrozen(before.roots[0]?.span)).toBe(true)
    })

    it('returns the subtree of a span', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('a', 0))
        startSpan(store, start('b', 1, { parentId: 'a' }))
        startSpan(store, start('c', 2, { parentId: 'b' }))

        const subtree = store.subtree('b')
        expect(subtree && collectIds([subtree])).toEqual(['b', 'c'])
        expect(store.subtree('missing')).toBeUndefined()
    })

    it('survives a mixed sequence and reports exact counts', () => {
        const store = new SpanStore(silentLogger)
        const ids = ['s0', 's1', 's2', 's3', 's4', 's5']
        // parents refer to spans that may arrive later or never
        const parents = [undefined, 's0', 's9', 's1', 's5', undefined]

        endSpan(store, end('s3', 1))
        ids.forEach((id, i) => {
            startSpan(store, start(id, 10 + i, { parentId: parents[i] }))
            startSpan(store, start(id, 50 + i))
        })
        endSpan(store, end('s1', 100))
        endSpan(store, end('s1', 101))
        endSpan(store, end('s4', 102))
        endSpan(store, end('s5', 103))
        endSpan(store, end('nope', 104))

        const snapshot = store.snapshot()
        const treeIds = collectIds(snapshot.roots)
        expect(snapshot.spans.size).toBe(6)
        expect(treeIds).toHaveLength(6)
        expect(new Set(treeIds).size).toBe(6)
        expect([...snapshot.spans.values()].filter((s) => s.endTime !== undefined)).toHaveLength(3)
        expect(snapshot.roots.map((n) => n.span.id)).toEqual(['s0', 's2', 's5'])
    })

    it('places every span under its present parent and nowhere else', () => {
        const store = new SpanStore(silentLogger)
        startSpan(store, start('r', 0))
        startSpan(store, start('x', 1, { parentId: 'r' }))
        startSpan(store, start('y', 2, { parentId: 'x' }))
        startSpan(store, start('z', 3, { parentId: 'r' }))

        const snapshot = store.snapshot()
        const parentOf = new Map<string, string | undefined>()
        const walk = (nodes: readonly SpanTreeNode[], parent?: string) => {
            for (const node of nodes) {
                expect(parentOf.has(node.span.id)).toBe(false)
                parentOf.set(node.span.id, parent)
                walk(node.children, node.span.id)
            }
        }
        walk(snapshot.roots)

        for (const span of snapshot.spans.values()) {
            if (span.parentId !== undefined && snapshot.spans.has(span.parentId)) {
                expect(parentOf.get(span.id)).toBe(span.parentId)
            }
        }
    })
})
