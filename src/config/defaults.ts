import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir'> = {
    host: '127.0.0.1',
    port: 5001,
    containerId: 'telemetry-container',
    endpoint: '/telemetry',
    title: 'Live Telemetry',
    queueSize: 256,
    heartbeatMs: 1000,
    autoExpandPatterns: [],
    logLevel: 'info',
}

export const LOCAL_CONFIG_FILE = 'livespan.config.json'
