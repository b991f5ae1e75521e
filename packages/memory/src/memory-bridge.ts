import { estimateTokens } from './embeddings'
import type { MemoryRecord, MemoryStore } from './types'

export type RetrievalResult =
    | { ok: true; records: MemoryRecord[] }
    | { ok: false; error: Error }

/**
 * Session-start lookup of prior knowledge for an objective. This is the one
 * place where a memory failure is turned into a value instead of an exception;
 * callers decide how to report it.
 */
export async function retrieveMemories(
    store: MemoryStore,
    objective: string,
    sessionId: string,
    limit = 5,
): Promise<RetrievalResult> {
    try {
        const records = await store.retrieve(objective, sessionId, { limit })
        return { ok: true, records }
    } catch (err) {
        return { ok: false, error: err instanceof Error ? err : new Error(String(err)) }
    }
}

// One line per record, most relevant first, capped to a rough token budget
export function formatPriorKnowledge(records: MemoryRecord[], maxTokens = 1500): string[] {
    const lines: string[] = []
    let used = 0

    for (const r of records) {
        const badge = `[${r.metadata.type.toUpperCase()}]`
        const domain = r.metadata.domain ? ` (${r.metadata.domain})` : ''
        const line = `${badge}${domain} ${r.content.replace(/\s+/g, ' ').trim()}`
        const cost = estimateTokens(line)
        if (used + cost > maxTokens) break
        lines.push(line)
        used += cost
    }

    return lines
}
