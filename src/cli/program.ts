import { Command, InvalidArgumentError } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config, LogLevel } from '../config/schema.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { serveCommand } from './commands/serve.js'
import { colors, formatError } from './ui.js'

const VERSION = '0.1.0'

function parsePort(value: string): number {
    const port = Number(value)
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new InvalidArgumentError('Port must be an integer between 0 and 65535.')
    }
    return port
}

interface ServeFlags {
    port?: number
    host?: string
    container?: string
    demo?: boolean
    debug?: boolean
}

function toConfigFlags(flags: ServeFlags): Partial<Config> {
    const logLevel: LogLevel | undefined = flags.debug ? 'debug' : undefined
    return {
        port: flags.port,
        host: flags.host,
        containerId: flags.container,
        logLevel,
    }
}

export function createProgram(): Command {
    const program = new Command()

    program.name('livespan').description('Stream trace spans to the browser as a live, collapsible tree').version(VERSION)

    program
        .command('serve')
        .description('Start the live span viewer')
        .option('-p, --port <port>', 'Port to listen on', parsePort)
        .option('-H, --host <host>', 'Interface to bind')
        .option('-c, --container <id>', 'Default container id')
        .option('--demo', 'Generate demo spans')
        .option('--debug', 'Enable debug logging')
        .action(async (flags: ServeFlags) => {
            try {
                const config = await loadConfig({ fs: new NodeFileSystem(), cliFlags: toConfigFlags(flags) })
                await serveCommand(config, { demo: flags.demo, version: VERSION })
            } catch (error) {
                console.error(formatError(errorMessage(error)))
                process.exit(1)
            }
        })

    program
        .command('config')
        .description('Print the resolved configuration')
        .action(async () => {
            try {
                const config = await loadConfig({ fs: new NodeFileSystem() })
                console.log(colors.bold('Resolved configuration'))
                console.log(JSON.stringify(config, null, 2))
            } catch (error) {
                console.error(formatError(errorMessage(error)))
                process.exit(1)
            }
        })

    return program
}
