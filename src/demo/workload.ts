import { type Span, SpanStatusCode, type Tracer, context, trace } from '@opentelemetry/api'
import type { Logger } from '../logger/index.js'

export interface WorkloadOptions {
    /** Pause between two demo runs. */
    intervalMs?: number
    /** Upper bound for the simulated latency of a single step. */
    stepMs?: number
}

const QUESTIONS = ['What is 17 * 23?', 'Roll two dice for me', 'What time is it?', 'Summarize the last run']

/** Resolves after `ms`, or early on abort; leaves no listener on the signal either way. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal.aborted) return resolve()
        const onAbort = () => {
            clearTimeout(timer)
            resolve()
        }
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort)
            resolve()
        }, ms)
        signal.addEventListener('abort', onAbort, { once: true })
    })
}

function randomInt(min: number, max: number): number {
    return min + Math.floor(Math.random() * (max - min + 1))
}

/**
 * Generates a small agent-shaped trace over and over: an agent run with a
 * model call and a couple of tool calls, some of which fail.
 */
export class DemoWorkload {
    private controller: AbortController | null = null
    private loop: Promise<void> | null = null

    constructor(
        private tracer: Tracer,
        private logger: Logger,
        private options: WorkloadOptions = {}
    ) {}

    start(): void {
        if (this.loop) return
        const controller = new AbortController()
        this.controller = controller
        this.loop = this.run(controller.signal).catch((error: unknown) => {
            this.logger.error({ error }, 'demo:failed')
        })
    }

    async stop(): Promise<void> {
        this.controller?.abort()
        await this.loop
        this.loop = null
        this.controller = null
    }

    private async run(signal: AbortSignal): Promise<void> {
        let runNumber = 0
        while (!signal.aborted) {
            runNumber++
            await this.agentRun(runNumber, signal)
            await sleep(this.options.intervalMs ?? 4000, signal)
        }
    }

    private step(signal: AbortSignal): Promise<void> {
        return sleep(randomInt(50, this.options.stepMs ?? 600), signal)
    }

    private child(parent: Span, name: string, attributes: Record<string, string | number | boolean> = {}): Span {
        return this.tracer.startSpan(name, { attributes }, trace.setSpan(context.active(), parent))
    }

    private async agentRun(runNumber: number, signal: AbortSignal): Promise<void> {
        const question = QUESTIONS[runNumber % QUESTIONS.length] ?? ''
        const root = this.tracer.startSpan('agent run', { attributes: { 'demo.run': runNumber, prompt: question } })

        const chat = this.child(root, 'chat gpt-4o-mini', {
            'gen_ai.operation.name': 'chat',
            'gen_ai.system': 'openai',
            'gen_ai.request.model': 'gpt-4o-mini',
        })
        await this.step(signal)
        const inputTokens = randomInt(40, 400)
        chat.setAttributes({ 'gen_ai.usage.input_tokens': inputTokens, 'gen_ai.usage.output_tokens': randomInt(10, 120) })
        chat.setStatus({ code: SpanStatusCode.OK })
        chat.end()

        const dice = this.child(root, 'Tool: Roll a die', { sides: 6 })
        await this.step(signal)
        const result = randomInt(1, 6)
        dice.setAttributes({ result, returning: `You rolled a ${result}` })
        dice.addEvent('dice.rolled', { result })
        dice.setStatus({ code: SpanStatusCode.OK })
        dice.end()

        const clock = this.child(root, 'Tool: Check the time')
        await this.step(signal)
        if (Math.random() < 0.25) {
            clock.setStatus({ code: SpanStatusCode.ERROR, message: 'clock service unavailable' })
        } else {
            clock.setAttribute('time', new Date().toISOString().slice(11, 19))
            clock.setStatus({ code: SpanStatusCode.OK })
        }
        clock.end()

        root.setStatus({ code: SpanStatusCode.OK })
        root.end()
    }
}
