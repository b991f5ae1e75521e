import type {
    ChatCompletionAssistantMessageParam,
    ChatCompletionMessage,
    ChatCompletionMessageParam,
} from 'openai/resources/chat/completions'
import { createLogger } from '@pacer/shared'
import type { CapabilityContext, CapabilityInput, CapabilityOutput, CapabilityRegistry } from '@pacer/tools'
import { z } from 'zod'
import { emptyUsage, addUsage, type TokenUsage } from './execution-summary'
import { generationFields, type CompletionFn, type GenerationParams } from './model-router'

const log = createLogger('Engine')

export interface TurnRequest {
    instructions: string
    message: string
    capabilities: CapabilityRegistry
    context: CapabilityContext
}

export interface ToolCallRecord {
    name: string
    input: CapabilityInput
    success: boolean
}

export interface TurnResult {
    text: string
    toolCalls: ToolCallRecord[]
    rounds: number
    // Absent when the model finished by answering without tool calls
    stopReason?: 'halted' | 'max_rounds'
    usage: TokenUsage
}

export interface ReasoningEngine {
    runTurn(request: TurnRequest): Promise<TurnResult>
    // Fresh engine with the same model settings and an empty history
    fork(): ReasoningEngine
}

export class ReasoningEngineError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'ReasoningEngineError'
    }
}

export interface EngineSettings {
    model: string
    generation: GenerationParams
    maxToolRounds?: number
}

const ToolArguments = z.record(z.unknown())

type ParsedArguments = { ok: true; value: CapabilityInput } | { ok: false; error: string }

function parseArguments(raw: string): ParsedArguments {
    let value: unknown
    try {
        value = JSON.parse(raw.trim() === '' ? '{}' : raw)
    } catch {
        return { ok: false, error: 'Tool arguments were not valid JSON' }
    }
    const parsed = ToolArguments.safeParse(value)
    return parsed.success ? { ok: true, value: parsed.data } : { ok: false, error: 'Tool arguments must be a JSON object' }
}

export function formatToolOutput(output: CapabilityOutput): string {
    if (!output.success) return `ERROR: ${output.error ?? 'unknown error'}`
    if (typeof output.result === 'string') return output.result
    return JSON.stringify(output.result ?? 'ok', null, 2)
}

function toAssistantParam(message: ChatCompletionMessage): ChatCompletionAssistantMessageParam {
    const calls = message.tool_calls ?? []
    return calls.length > 0
        ? { role: 'assistant', content: message.content, tool_calls: calls }
        : { role: 'assistant', content: message.content ?? '' }
}

/**
 * Function-calling loop over an OpenAI-compatible chat completion API. The
 * conversation history persists across turns; the system message is replaced
 * with the instructions of the current turn on every request.
 */
export class OpenAIReasoningEngine implements ReasoningEngine {
    private readonly history: ChatCompletionMessageParam[] = []
    private readonly maxToolRounds: number

    constructor(
        private readonly complete: CompletionFn,
        private readonly settings: EngineSettings,
    ) {
        this.maxToolRounds = settings.maxToolRounds ?? 25
    }

    get messageCount(): number {
        return this.history.length
    }

    fork(): OpenAIReasoningEngine {
        return new OpenAIReasoningEngine(this.complete, this.settings)
    }

    async runTurn({ instructions, message, capabilities, context }: TurnRequest): Promise<TurnResult> {
        this.history.push({ role: 'user', content: message })

        const tools = capabilities.toFunctionTools()
        const toolCalls: ToolCallRecord[] = []
        let usage = emptyUsage()
        let text = ''

        for (let round = 1; round <= this.maxToolRounds; round++) {
            const completion = await this.complete({
                model: this.settings.model,
                messages: [{ role: 'system', content: instructions }, ...this.history],
                ...(tools.length > 0 ? { tools } : {}),
                ...generationFields(this.settings.generation),
            })

            if (completion.usage) {
                usage = addUsage(usage, {
                    promptTokens: completion.usage.prompt_tokens,
                    completionTokens: completion.usage.completion_tokens,
                    totalTokens: completion.usage.total_tokens,
                })
            }

            const choice = completion.choices[0]
            if (!choice) throw new ReasoningEngineError('Model returned no choices')

            const reply = choice.message
            this.history.push(toAssistantParam(reply))
            if (reply.content) text = reply.content

            const calls = reply.tool_calls ?? []
            if (calls.length === 0) return { text, toolCalls, rounds: round, usage }

            let halted = false
            for (const call of calls) {
                // Every call id needs a tool message before the next request
                if (halted) {
                    this.history.push({ role: 'tool', tool_call_id: call.id, content: 'Skipped: the run was stopped' })
                    continue
                }

                const args = parseArguments(call.function.arguments)
                const output: CapabilityOutput = args.ok
                    ? await capabilities.invoke(call.function.name, args.value, context)
                    : { success: false, error: args.error }

                toolCalls.push({ name: call.function.name, input: args.ok ? args.value : {}, success: output.success })
                this.history.push({ role: 'tool', tool_call_id: call.id, content: formatToolOutput(output) })
                if (output.halt) halted = true
            }

            if (halted) return { text, toolCalls, rounds: round, stopReason: 'halted', usage }
        }

        log.warn(`Tool round limit (${this.maxToolRounds}) reached; ending turn`)
        return { text, toolCalls, rounds: this.maxToolRounds, stopReason: 'max_rounds', usage }
    }
}
