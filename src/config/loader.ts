import path from 'node:path'
import { ConfigError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { DEFAULT_CONFIG, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}
    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(filePath)
    } catch (error) {
        throw new ConfigError(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error })
    }
    return parseConfig(raw, filePath)
}

function parseConfig(raw: unknown, source: string): Config {
    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
        throw new ConfigError(`Invalid config from ${source}: ${issues}`, { cause: parsed.error })
    }
    return parsed.data
}

function envConfig(env: NodeJS.ProcessEnv): Config {
    const fromEnv: Record<string, unknown> = {}
    if (env.LIVESPAN_HOST) fromEnv.host = env.LIVESPAN_HOST
    if (env.LIVESPAN_PORT) fromEnv.port = Number(env.LIVESPAN_PORT)
    if (env.LIVESPAN_CONTAINER_ID) fromEnv.containerId = env.LIVESPAN_CONTAINER_ID
    if (env.LIVESPAN_LOG_LEVEL) fromEnv.logLevel = env.LIVESPAN_LOG_LEVEL
    return parseConfig(fromEnv, 'environment')
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        for (const [key, value] of Object.entries(cfg)) {
            if (value !== undefined) {
                ;(merged as Record<string, unknown>)[key] = value
            }
        }
    }
    return merged
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > defaults
    const merged = mergeConfigs(localConfig, envConfig(env), parseConfig(cliFlags, 'command line'))

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        autoExpandPatterns: merged.autoExpandPatterns ?? DEFAULT_CONFIG.autoExpandPatterns,
        projectDir,
    }
}
