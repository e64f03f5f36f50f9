import type { AttributeValue, SpanRecord } from '../spans/types.js'
import { durationMs } from '../spans/types.js'

export const OPEN_DURATION = '...'

export function formatDuration(span: SpanRecord): string {
    const ms = durationMs(span)
    if (ms === undefined) return OPEN_DURATION
    return `${ms.toFixed(1)} ms`
}

export function formatValue(value: AttributeValue): string {
    if (typeof value === 'object') return value.map(String).join(', ')
    return String(value)
}

export function statusLabel(span: SpanRecord): string {
    if (span.endTime === undefined) return 'OPEN'
    return span.status.toUpperCase()
}

export const STATUS_COLORS: Record<string, string> = {
    OPEN: 'text-info',
    OK: 'text-success',
    ERROR: 'text-error',
    UNSET: 'text-warning',
}

export function statusColor(span: SpanRecord): string {
    return STATUS_COLORS[statusLabel(span)] ?? 'text-neutral'
}
