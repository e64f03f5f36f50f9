import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const ContainerIdSchema = z.string().regex(/^[A-Za-z][\w-]*$/, 'must be a valid HTML id')

export const ConfigSchema = z.object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65535).optional(),
    containerId: ContainerIdSchema.optional(),
    endpoint: z.string().regex(/^\/[\w\-/]*[\w-]$/, 'must be an absolute path without a trailing slash').optional(),
    title: z.string().optional(),
    queueSize: z.number().int().positive().optional(),
    heartbeatMs: z.number().int().positive().optional(),
    autoExpandPatterns: z.array(z.string()).optional(),
    logLevel: LogLevelSchema.optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export type LogLevel = z.infer<typeof LogLevelSchema>

export interface ResolvedConfig {
    host: string
    port: number
    containerId: string
    endpoint: string
    title: string
    queueSize: number
    heartbeatMs: number
    autoExpandPatterns: string[]
    logLevel: LogLevel
    projectDir: string
}
