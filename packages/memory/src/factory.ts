import { getSupabase } from '@pacer/db'
import type { EnvConfig } from '@pacer/shared'
import { createOpenAIEmbedder } from './embeddings'
import { FileMemoryStore } from './file-store'
import { SupabaseMemoryStore } from './supabase-store'
import type { MemoryStore } from './types'

export function createMemoryStore(config: EnvConfig, pathOverride?: string): MemoryStore {
    if (config.memory.backend === 'supabase') {
        const supabase = getSupabase({ url: config.supabase.url, serviceKey: config.supabase.serviceKey })
        return new SupabaseMemoryStore(supabase, createOpenAIEmbedder({ apiKey: config.openai.apiKey, baseURL: config.openai.baseUrl }))
    }
    return new FileMemoryStore(pathOverride ?? config.memory.path)
}
