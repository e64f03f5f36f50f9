import { type Fragment, el, raw, toHtml } from '../render/fragment.js'

const HEAD_ASSETS: Fragment[] = [
    el('script', { src: 'https://cdn.tailwindcss.com' }),
    el('link', { rel: 'stylesheet', href: 'https://cdn.jsdelivr.net/npm/daisyui@4.11.1/dist/full.min.css' }),
    el('script', { src: 'https://unpkg.com/htmx.org@2.0.4' }),
    el('script', { src: 'https://unpkg.com/htmx-ext-sse@2.2.1/sse.js' }),
]

// keeps the newest spans in view as they stream in
function autoScrollScript(containerId: string): Fragment {
    const id = JSON.stringify(containerId)
    return el(
        'script',
        {},
        raw(`document.addEventListener('htmx:sseMessage', function () {
  var el = document.getElementById(${id});
  if (el) el.scrollTop = el.scrollHeight;
});`)
    )
}

export function renderPage(options: { title: string; containerId: string; body: Fragment }): string {
    const doc = el(
        'html',
        { lang: 'en', 'data-theme': 'dark' },
        el('head', {}, el('meta', { charset: 'utf-8' }), el('title', {}, options.title), ...HEAD_ASSETS),
        el('body', { class: 'p-6' }, el('main', { class: 'max-w-5xl mx-auto' }, options.body), autoScrollScript(options.containerId))
    )
    return `<!doctype html>${toHtml(doc)}`
}
