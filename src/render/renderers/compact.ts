import type { SpanRecord } from '../../spans/types.js'
import { statusLabel } from '../format.js'
import { type Fragment, div, span } from '../fragment.js'
import type { SpanRenderer } from '../types.js'

const DOT_COLORS: Record<string, string> = {
    OK: 'text-green-500',
    ERROR: 'text-red-500',
}

/** Name and a status dot only; no attribute or event details. */
export class CompactSpanRenderer implements SpanRenderer {
    readonly name = 'compact'

    renderHeader(record: SpanRecord): Fragment {
        return div({ class: 'flex items-center' }, span({ class: 'font-medium text-sm' }, record.name))
    }

    renderStatus(record: SpanRecord): Fragment {
        const label = statusLabel(record)
        return span({ class: `${DOT_COLORS[label] ?? 'text-yellow-500'} mr-2`, title: label }, '●')
    }

    renderBody(): Fragment {
        return div()
    }
}
