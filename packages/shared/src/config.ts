import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`)
        this.name = 'ConfigError'
    }
}

// Unset and empty variables are treated the same (.env files leave keys blank)
const optionalString = z.preprocess(v => (v === '' ? undefined : v), z.string().optional())

const EnvSchema = z.object({
    OPENAI_API_KEY: optionalString,
    OPENAI_BASE_URL: z.preprocess(v => (v === '' ? undefined : v), z.string().url().optional()),
    OLLAMA_HOST: z.preprocess(v => (v === '' ? undefined : v), z.string().url().default('http://localhost:11434')),
    PACER_MEMORY_BACKEND: z.preprocess(v => (v === '' ? undefined : v), z.enum(['file', 'supabase']).default('file')),
    PACER_MEMORY_PATH: optionalString,
    PACER_SESSION_ID: z.preprocess(v => (v === '' ? undefined : v), z.string().default('pacer')),
    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_KEY: optionalString,
    PYTHON_PATH: z.preprocess(v => (v === '' ? undefined : v), z.string().default('python3')),
    PACER_COMMAND_TIMEOUT_MS: z.preprocess(v => (v === '' ? undefined : v), z.coerce.number().int().positive().default(30_000)),
})

export interface EnvConfig {
    openai: { apiKey?: string; baseUrl?: string }
    ollamaHost: string
    memory: {
        backend: 'file' | 'supabase'
        path: string
        sessionId: string
    }
    supabase: { url?: string; serviceKey?: string }
    pythonPath: string
    commandTimeoutMs: number
}

export const DEFAULT_MEMORY_DIR = path.join(os.homedir(), '.pacer', 'memory')

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    const parsed = EnvSchema.safeParse(env)
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`))
    }
    const e = parsed.data

    if (e.PACER_MEMORY_BACKEND === 'supabase') {
        const missing: string[] = []
        if (!e.SUPABASE_URL) missing.push('SUPABASE_URL')
        if (!e.SUPABASE_SERVICE_KEY) missing.push('SUPABASE_SERVICE_KEY')
        if (missing.length > 0) {
            throw new ConfigError(missing.map(k => `${k}: required when PACER_MEMORY_BACKEND=supabase`))
        }
    }

    return {
        openai: { apiKey: e.OPENAI_API_KEY, baseUrl: e.OPENAI_BASE_URL },
        ollamaHost: e.OLLAMA_HOST,
        memory: {
            backend: e.PACER_MEMORY_BACKEND,
            path: e.PACER_MEMORY_PATH ?? DEFAULT_MEMORY_DIR,
            sessionId: e.PACER_SESSION_ID,
        },
        supabase: { url: e.SUPABASE_URL, serviceKey: e.SUPABASE_SERVICE_KEY },
        pythonPath: e.PYTHON_PATH,
        commandTimeoutMs: e.PACER_COMMAND_TIMEOUT_MS,
    }
}
