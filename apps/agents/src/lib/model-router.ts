import OpenAI from 'openai'
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions'
import { ConfigError, type BackendMode, type EnvConfig } from '@pacer/shared'

// Ollama speaks the OpenAI wire format under /v1
const DEFAULT_MODELS: Record<BackendMode, string> = {
    remote: 'gpt-4o',
    local: 'llama3.2:3b',
}

const REASONING_MODEL = /^(o1|o3|o4|gpt-5)/

export type GenerationParams =
    | { kind: 'reasoning'; reasoning_effort: 'low' | 'medium' | 'high'; max_completion_tokens: number }
    | { kind: 'sampling'; temperature: number; top_p: number; max_tokens: number }

export interface ModelSettings {
    backend: BackendMode
    model: string
    baseURL?: string
    apiKey?: string
    thinking: boolean
    generation: GenerationParams
}

export type CompletionFn = (params: ChatCompletionCreateParamsNonStreaming) => Promise<ChatCompletion>

export function supportsThinking(backend: BackendMode, model: string): boolean {
    return backend === 'remote' && REASONING_MODEL.test(model)
}

export function resolveModelSettings(
    options: { backend: BackendMode; model?: string; thinking: boolean },
    env: EnvConfig,
): ModelSettings {
    const model = options.model ?? DEFAULT_MODELS[options.backend]
    const thinking = options.thinking && supportsThinking(options.backend, model)

    const generation: GenerationParams = thinking
        ? { kind: 'reasoning', reasoning_effort: 'medium', max_completion_tokens: 16_384 }
        : { kind: 'sampling', temperature: 0.95, top_p: 0.95, max_tokens: 4096 }

    if (options.backend === 'local') {
        return {
            backend: 'local',
            model,
            baseURL: `${env.ollamaHost.replace(/\/+$/, '')}/v1`,
            apiKey: 'ollama',
            thinking,
            generation,
        }
    }

    return {
        backend: 'remote',
        model,
        baseURL: env.openai.baseUrl,
        apiKey: env.openai.apiKey,
        thinking,
        generation,
    }
}

export type GenerationFields = Pick<
    ChatCompletionCreateParamsNonStreaming,
    'reasoning_effort' | 'max_completion_tokens' | 'temperature' | 'top_p' | 'max_tokens'
>

// Request fields carrying the generation settings; `kind` never goes on the wire
export function generationFields(generation: GenerationParams): GenerationFields {
    if (generation.kind === 'reasoning') {
        return { reasoning_effort: generation.reasoning_effort, max_completion_tokens: generation.max_completion_tokens }
    }
    return { temperature: generation.temperature, top_p: generation.top_p, max_tokens: generation.max_tokens }
}

export function createCompletionFn(settings: ModelSettings): CompletionFn {
    if (!settings.apiKey) {
        throw new ConfigError(['OPENAI_API_KEY: required for the remote backend'])
    }
    const client = new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseURL })
    return params => client.chat.completions.create(params)
}
