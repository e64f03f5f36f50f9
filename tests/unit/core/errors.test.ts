import { describe, it, expect } from 'vitest'
import { ConfigError, LiveSpanError, RenderError, TelemetryError, errorMessage } from '../../../src/core/errors.js'

describe('errors', () => {
    it('tags telemetry errors with their span', () => {
        const error = new TelemetryError('bad event', 'abc')
        expect(error).toBeInstanceOf(LiveSpanError)
        expect(error.kind).toBe('telemetry')
        expect(error.name).toBe('TelemetryError')
        expect(error.spanId).toBe('abc')
    })

    it('keeps the renderer and cause of a render error', () => {
        const cause = new Error('boom')
        const error = new RenderError('failed', 'abc', 'gen-ai', { cause })
        expect(error.kind).toBe('render')
        expect(error.renderer).toBe('gen-ai')
        expect(error.cause).toBe(cause)
    })

    it('marks config errors', () => {
        expect(new ConfigError('nope').kind).toBe('config')
    })

    it('extracts a message from anything thrown', () => {
        expect(errorMessage(new Error('x'))).toBe('x')
        expect(errorMessage('plain')).toBe('plain')
        expect(errorMessage(42)).toBe('42')
    })
})
