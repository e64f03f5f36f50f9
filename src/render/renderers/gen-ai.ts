import type { AttributeValue, SpanRecord } from '../../spans/types.js'
import { formatDuration, formatValue, statusColor } from '../format.js'
import { type Fragment, div, li, span, ul } from '../fragment.js'
import { DefaultSpanRenderer } from './default.js'

export const GEN_AI_OPERATION_KEY = 'gen_ai.operation.name'

const GEN_AI_PREFIX = 'gen_ai.'

function titleCase(key: string): string {
    return key
        .slice(GEN_AI_PREFIX.length)
        .replace(/[._]/g, ' ')
        .replace(/\b\w/g, (c) => c.toUpperCase())
}

function formatGenAiValue(key: string, value: AttributeValue): string {
    if (key.startsWith('gen_ai.usage.') && key.endsWith('_tokens')) return `${formatValue(value)} tokens`
    if (typeof value === 'object') return `${value.length} items`
    return formatValue(value)
}

/**
 * Spans following the OpenTelemetry GenAI conventions: the header shows the
 * operation, model and provider, and `gen_ai.*` attributes are listed first
 * under an "AI Metrics" heading.
 */
export class GenAiSpanRenderer extends DefaultSpanRenderer {
    override readonly name = 'gen-ai'

    override renderHeader(record: SpanRecord): Fragment {
        const attrs = record.attributes
        const operation = attrs[GEN_AI_OPERATION_KEY] ?? record.name
        const model = attrs['gen_ai.request.model']
        const system = attrs['gen_ai.system'] ?? attrs['gen_ai.provider.name']

        const title = model === undefined ? formatValue(operation) : `${formatValue(operation)} (${formatValue(model)})`

        return div(
            { class: 'flex justify-between items-center gap-2' },
            span({ class: `font-semibold ${statusColor(record)}` }, title),
            system === undefined ? null : span({ class: 'text-xs opacity-70 ml-1' }, ` • ${formatValue(system)}`),
            span({ class: 'ml-auto text-xs text-neutral-content/60' }, formatDuration(record))
        )
    }

    protected override renderAttributes(record: SpanRecord): Fragment {
        const aiEntries: Array<[string, AttributeValue]> = []
        const otherEntries: Array<[string, AttributeValue]> = []
        for (const entry of Object.entries(record.attributes)) {
            if (entry[0].startsWith(GEN_AI_PREFIX)) aiEntries.push(entry)
            else otherEntries.push(entry)
        }
        if (aiEntries.length === 0 && otherEntries.length === 0) return div()

        return div(
            {},
            aiEntries.length > 0 ? div({ class: 'mb-2' }, span({ class: 'font-medium text-sm text-primary' }, 'AI Metrics')) : null,
            aiEntries.length > 0
                ? ul(
                      { class: 'pl-1 space-y-[1px]' },
                      ...aiEntries.map(([key, value]) =>
                          li(
                              { class: 'flex text-xs py-[1px]' },
                              span({ class: 'text-primary/70 mr-2 text-xs' }, titleCase(key)),
                              span({ class: 'font-mono text-xs text-base-content/80' }, formatGenAiValue(key, value))
                          )
                      )
                  )
                : null,
            otherEntries.length > 0
                ? ul(
                      { class: aiEntries.length > 0 ? 'pl-1 space-y-[1px] mt-3' : 'pl-1 space-y-[1px]' },
                      ...otherEntries.map(([key, value]) =>
                          li(
                              { class: 'flex text-xs py-[1px]' },
                              span({ class: 'text-neutral-content/70 mr-1' }, key),
                              span({ class: 'font-mono text-xs text-base-content/80 break-all' }, formatValue(value))
                          )
                      )
                  )
                : null
        )
    }
}
