import { z } from 'zod'
import { err, ok, type Result } from '../core/result.js'

const AttributeScalarSchema = z.union([z.string(), z.number(), z.boolean()])

export const AttributeValueSchema = z.union([AttributeScalarSchema, z.array(AttributeScalarSchema)])

export const AttributesSchema = z.record(AttributeValueSchema)

const TimestampSchema = z.number().finite().nonnegative()

export const SpanEventRecordSchema = z.object({
    name: z.string(),
    time: TimestampSchema,
    attributes: AttributesSchema.default({}),
})

export const SpanStartEventSchema = z.object({
    id: z.string().min(1),
    parentId: z.string().min(1).optional(),
    name: z.string().min(1),
    startTime: TimestampSchema,
    attributes: AttributesSchema.default({}),
})

export const SpanEndEventSchema = z.object({
    id: z.string().min(1),
    endTime: TimestampSchema,
    status: z.enum(['unset', 'ok', 'error']).default('unset'),
    statusMessage: z.string().optional(),
    attributes: AttributesSchema.default({}),
    events: z.array(SpanEventRecordSchema).optional(),
})

/** span-started(id, parentId, name, startTime, attributes) */
export type SpanStartEvent = z.input<typeof SpanStartEventSchema>
/** span-ended(id, endTime, status, attributes) */
export type SpanEndEvent = z.input<typeof SpanEndEventSchema>

export type ParsedSpanStart = z.output<typeof SpanStartEventSchema>
export type ParsedSpanEnd = z.output<typeof SpanEndEventSchema>

function describeIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

export function parseStartEvent(input: unknown): Result<ParsedSpanStart> {
    const result = SpanStartEventSchema.safeParse(input)
    if (!result.success) return err(describeIssues(result.error))
    return ok(result.data)
}

export function parseEndEvent(input: unknown): Result<ParsedSpanEnd> {
    const result = SpanEndEventSchema.safeParse(input)
    if (!result.success) return err(describeIssues(result.error))
    return ok(result.data)
}

export function parseAttributes(input: unknown): Result<Record<string, z.infer<typeof AttributeValueSchema>>> {
    const result = AttributesSchema.safeParse(input)
    if (!result.success) return err(describeIssues(result.error))
    return ok(result.data)
}
