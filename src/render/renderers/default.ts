import type { SpanEventRecord, SpanRecord } from '../../spans/types.js'
import { formatDuration, formatValue, statusColor, statusLabel } from '../format.js'
import { type Fragment, div, li, span, ul } from '../fragment.js'
import type { SpanRenderer } from '../types.js'

export class DefaultSpanRenderer implements SpanRenderer {
    readonly name: string = 'default'

    renderHeader(record: SpanRecord): Fragment {
        return div(
            { class: 'flex justify-between items-center gap-2' },
            span({ class: `font-semibold ${statusColor(record)}` }, record.name),
            span({ class: 'ml-auto text-xs text-neutral-content/60' }, formatDuration(record))
        )
    }

    renderStatus(record: SpanRecord): Fragment {
        return span({ class: `text-xs opacity-70 ${statusColor(record)}`, title: record.statusMessage }, statusLabel(record))
    }

    renderBody(record: SpanRecord): Fragment {
        return div({}, this.renderAttributes(record), this.renderEvents(record.events))
    }

    protected renderAttributes(record: SpanRecord): Fragment {
        const entries = Object.entries(record.attributes)
        if (entries.length === 0) return div()
        return ul(
            { class: 'pl-1 space-y-[1px]' },
            ...entries.map(([key, value]) =>
                li(
                    { class: 'flex text-xs py-[1px]' },
                    span({ class: 'text-neutral-content/70 mr-1' }, key),
                    span({ class: 'font-mono text-xs text-base-content/80 break-all' }, formatValue(value))
                )
            )
        )
    }

    protected renderEvents(events: readonly SpanEventRecord[]): Fragment {
        if (events.length === 0) return div()
        return div(
            { class: 'space-y-1' },
            ...events.map((event) =>
                div(
                    { class: 'border-l-2 border-info pl-2 py-1' },
                    span({ class: 'font-medium text-xs' }, event.name),
                    span({ class: 'text-xs opacity-60' }, ` @ ${new Date(event.time).toISOString()}`)
                )
            )
        )
    }
}
