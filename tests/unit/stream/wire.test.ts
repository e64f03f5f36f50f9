import { describe, it, expect } from 'vitest'
import { div, span } from '../../../src/render/fragment.js'
import { encodeDelta, encodeSnapshot } from '../../../src/stream/wire.js'

describe('wire encoding', () => {
    it('appends a root span to the container', () => {
        const html = encodeDelta(
            { kind: 'created', spanId: 'a', target: { position: 'root' }, adopted: [], node: div({ id: 'span-a' }) },
            'telemetry-container'
        )
        expect(html).toBe('<div id="telemetry-container" hx-swap-oob="beforeend"><div id="span-a"></div></div>')
    })

    it('appends a child span to its parent children slot', () => {
        const html = encodeDelta(
            {
                kind: 'created',
                spanId: 'b',
                target: { position: 'child', parentId: 'a' },
                adopted: [],
                node: div({ id: 'span-b' }),
            },
            'telemetry-container'
        )
        expect(html).toBe('<div id="span-children-a" hx-swap-oob="beforeend"><div id="span-b"></div></div>')
    })

    it('removes adopted root nodes before appending the parent', () => {
        const html = encodeDelta(
            { kind: 'created', spanId: 'p', target: { position: 'root' }, adopted: ['c1', 'c2'], node: div({ id: 'span-p' }) },
            'box'
        )
        expect(html).toBe(
            '<div id="span-c1" hx-swap-oob="delete"></div>' +
                '<div id="span-c2" hx-swap-oob="delete"></div>' +
                '<div id="box" hx-swap-oob="beforeend"><div id="span-p"></div></div>'
        )
    })

    it('replaces the three slots of an updated span', () => {
        const html = encodeDelta(
            { kind: 'updated', spanId: 'a', header: span({}, 'h'), status: span({}, 's'), body: span({}, 'b') },
            'box'
        )
        expect(html).toBe(
            '<div id="span-header-a" hx-swap-oob="innerHTML"><span>h</span></div>' +
                '<div id="span-status-a" hx-swap-oob="innerHTML"><span>s</span></div>' +
                '<div id="span-body-a" hx-swap-oob="innerHTML"><span>b</span></div>'
        )
    })

    it('replaces the container content with a snapshot', () => {
        expect(encodeSnapshot(div({ id: 'span-a' }), 'box')).toBe(
            '<div id="box" hx-swap-oob="innerHTML"><div id="span-a"></div></div>'
        )
    })
})
