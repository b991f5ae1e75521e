/**
 * Remote memory store on the `agent_memories` table (sql/001_agent_memories.sql).
 *
 * Records are embedded with OpenAI and searched through the
 * `match_agent_memories` RPC. When embedding fails the store still saves the
 * record without a vector, and retrieval falls back to recency.
 */

import type { SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'
import { createLogger, errorMessage, MemoryMetadataSchema } from '@pacer/shared'
import type { MemoryMetadata } from '@pacer/shared'
import type { Embedder } from './embeddings'
import type { MemoryRecord, MemoryStore, RetrieveOptions } from './types'

const log = createLogger('agent-memory')

const TABLE = 'agent_memories'
const COLUMNS = 'id, session_id, content, metadata, created_at'

const MemoryRowSchema = z.object({
    id: z.string(),
    session_id: z.string(),
    content: z.string(),
    metadata: MemoryMetadataSchema.nullish(),
    created_at: z.string(),
    similarity: z.number().nullish(),
})

export function toMemoryRecord(row: unknown): MemoryRecord {
    const r = MemoryRowSchema.parse(row)
    return {
        id: r.id,
        sessionId: r.session_id,
        content: r.content,
        metadata: r.metadata ?? MemoryMetadataSchema.parse({}),
        createdAt: r.created_at,
        ...(r.similarity != null ? { score: r.similarity } : {}),
    }
}

export class SupabaseMemoryStore implements MemoryStore {
    readonly kind = 'supabase'

    constructor(
        private readonly supabase: SupabaseClient,
        private readonly embed: Embedder,
        private readonly threshold = 0.65,
    ) {}

    async store(content: string, sessionId: string, metadata: Partial<MemoryMetadata> = {}): Promise<MemoryRecord> {
        let embedding: number[] | null = null
        try {
            embedding = await this.embed(content)
        } catch (err) {
            log.warn('embed failed, saving without vector:', errorMessage(err))
        }

        const { data, error } = await this.supabase
            .from(TABLE)
            .insert({
                session_id: sessionId,
                content,
                embedding,
                metadata: MemoryMetadataSchema.parse(metadata),
            })
            .select(COLUMNS)
            .single()

        if (error) throw new Error(`Memory save failed: ${error.message}`)
        return toMemoryRecord(data)
    }

    async retrieve(query: string, sessionId: string, options: RetrieveOptions = {}): Promise<MemoryRecord[]> {
        const { limit = 5 } = options

        let queryEmbedding: number[]
        try {
            queryEmbedding = await this.embed(query)
        } catch (err) {
            log.warn('embed failed for search, falling back to recency:', errorMessage(err))
            return this.list(sessionId, { limit })
        }

        const { data, error } = await this.supabase.rpc('match_agent_memories', {
            query_embedding: queryEmbedding,
            match_threshold: this.threshold,
            match_count: limit,
            p_session_id: sessionId,
        })

        if (error) throw new Error(`Memory search failed: ${error.message}`)
        return z.array(z.unknown()).parse(data ?? []).map(toMemoryRecord)
    }

    async list(sessionId: string, options: RetrieveOptions = {}): Promise<MemoryRecord[]> {
        const { limit = 20 } = options

        const { data, error } = await this.supabase
            .from(TABLE)
            .select(COLUMNS)
            .eq('session_id', sessionId)
            .order('created_at', { ascending: false })
            .limit(limit)

        if (error) throw new Error(`Memory list failed: ${error.message}`)
        return (data ?? []).map(toMemoryRecord)
    }

    async forget(sessionId: string, memoryId: string): Promise<void> {
        const { error } = await this.supabase
            .from(TABLE)
            .delete()
            .eq('id', memoryId)
            .eq('session_id', sessionId)   // a session can only delete its own memories

        if (error) throw new Error(`Memory forget failed: ${error.message}`)
    }
}
