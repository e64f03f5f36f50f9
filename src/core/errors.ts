export type ErrorKind = 'telemetry' | 'render' | 'config'

export class LiveSpanError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'LiveSpanError'
        this.kind = kind
    }
}

/** A span event the store cannot accept: bad shape, unknown id, duplicate start. */
export class TelemetryError extends LiveSpanError {
    readonly spanId?: string

    constructor(message: string, spanId?: string, options?: ErrorOptions) {
        super(message, 'telemetry', options)
        this.name = 'TelemetryError'
        this.spanId = spanId
    }
}

export class RenderError extends LiveSpanError {
    readonly spanId: string
    readonly renderer: string

    constructor(message: string, spanId: string, renderer: string, options?: ErrorOptions) {
        super(message, 'render', options)
        this.name = 'RenderError'
        this.spanId = spanId
        this.renderer = renderer
    }
}

export class ConfigError extends LiveSpanError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'config', options)
        this.name = 'ConfigError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}
