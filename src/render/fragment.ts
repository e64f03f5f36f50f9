import { escapeToBuffer } from 'hono/utils/html'

export type AttrValue = string | number | boolean | undefined

export type FragmentChild = Fragment | RawMarkup | string | number | null | undefined | false

/** Trusted markup emitted verbatim; only for content the application itself writes. */
export interface RawMarkup {
    readonly raw: string
}

/**
 * Tree-structured markup produced by renderers. The span pipeline only passes
 * fragments around; `toHtml` is the single place they become text.
 * A `null` tag is a group: its children are emitted without a wrapper.
 */
export interface Fragment {
    readonly tag: string | null
    readonly attrs: Readonly<Record<string, AttrValue>>
    readonly children: readonly FragmentChild[]
}

const VOID_TAGS = new Set(['br', 'hr', 'img', 'input', 'link', 'meta'])

export function el(tag: string, attrs: Record<string, AttrValue> = {}, ...children: FragmentChild[]): Fragment {
    return { tag, attrs, children }
}

export function group(...children: FragmentChild[]): Fragment {
    return { tag: null, attrs: {}, children }
}

export const div = (attrs: Record<string, AttrValue> = {}, ...children: FragmentChild[]) => el('div', attrs, ...children)
export const span = (attrs: Record<string, AttrValue> = {}, ...children: FragmentChild[]) => el('span', attrs, ...children)
export const ul = (attrs: Record<string, AttrValue> = {}, ...children: FragmentChild[]) => el('ul', attrs, ...children)
export const li = (attrs: Record<string, AttrValue> = {}, ...children: FragmentChild[]) => el('li', attrs, ...children)
export const label = (attrs: Record<string, AttrValue> = {}, ...children: FragmentChild[]) => el('label', attrs, ...children)
export const input = (attrs: Record<string, AttrValue> = {}) => el('input', attrs)

export function raw(markup: string): RawMarkup {
    return { raw: markup }
}

export function escapeHtml(text: string): string {
    const buffer: [string] = ['']
    escapeToBuffer(text, buffer)
    return buffer[0]
}

function renderAttrs(attrs: Readonly<Record<string, AttrValue>>): string {
    let out = ''
    for (const [name, value] of Object.entries(attrs)) {
        if (value === undefined || value === false) continue
        out += value === true ? ` ${name}` : ` ${name}="${escapeHtml(String(value))}"`
    }
    return out
}

export function toHtml(node: FragmentChild): string {
    if (node === null || node === undefined || node === false) return ''
    if (typeof node === 'string') return escapeHtml(node)
    if (typeof node === 'number') return String(node)
    if ('raw' in node) return node.raw

    const inner = node.children.map((child) => toHtml(child)).join('')
    if (node.tag === null) return inner
    const open = `<${node.tag}${renderAttrs(node.attrs)}>`
    if (VOID_TAGS.has(node.tag)) return open
    return `${open}${inner}</${node.tag}>`
}
