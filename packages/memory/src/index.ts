// Everything the rest of the system needs — single import point
export { FileMemoryStore, tokenize } from './file-store'
export { SupabaseMemoryStore, toMemoryRecord } from './supabase-store'
export { createOpenAIEmbedder, estimateTokens } from './embeddings'
export type { Embedder, EmbedderOptions, EmbeddingsClient } from './embeddings'
export { retrieveMemories, formatPriorKnowledge } from './memory-bridge'
export type { RetrievalResult } from './memory-bridge'
export { createMemoryStore } from './factory'
export type { MemoryRecord, MemoryStore, RetrieveOptions } from './types'
