import pc from 'picocolors'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    url: (text: string) => pc.cyan(pc.underline(text)),
}

export function banner(version: string): string {
    return `${colors.brand('livespan')} ${colors.dim(`v${version}`)} ${colors.dim('live trace viewer')}`
}

export function formatListening(host: string, port: number, endpoint: string): string {
    const base = `http://${host}:${port}`
    return [
        `${colors.success('Listening')} on ${colors.url(base)}`,
        colors.dim(`  event stream: ${base}${endpoint}`),
        colors.dim(`  counters:     ${base}${endpoint}/stats`),
    ].join('\n')
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}
