import type { MemoryMetadata } from '@pacer/shared'

export interface MemoryRecord {
    id: string
    sessionId: string
    content: string
    metadata: MemoryMetadata
    createdAt: string
    score?: number               // populated after retrieval
}

export interface RetrieveOptions {
    limit?: number
}

/**
 * Cross-session knowledge store. Records are keyed by a session id that is
 * shared by every run of the same operator, so one run can read what an
 * earlier run stored.
 */
export interface MemoryStore {
    readonly kind: string
    store(content: string, sessionId: string, metadata?: Partial<MemoryMetadata>): Promise<MemoryRecord>
    retrieve(query: string, sessionId: string, options?: RetrieveOptions): Promise<MemoryRecord[]>
    list(sessionId: string, options?: RetrieveOptions): Promise<MemoryRecord[]>
    forget(sessionId: string, memoryId: string): Promise<void>
}
