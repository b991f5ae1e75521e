import { randomUUID } from 'node:crypto'
import { promises as fs } from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { MemoryMetadataSchema } from '@pacer/shared'
import type { MemoryMetadata } from '@pacer/shared'
import type { MemoryRecord, MemoryStore, RetrieveOptions } from './types'

const RecordSchema = z.object({
    id: z.string(),
    sessionId: z.string(),
    content: z.string(),
    metadata: MemoryMetadataSchema,
    createdAt: z.string(),
})

const MemoryFileSchema = z.object({
    version: z.literal(1),
    records: z.array(RecordSchema),
})

type MemoryFile = z.infer<typeof MemoryFileSchema>

const STOPWORDS = new Set([
    'the', 'and', 'for', 'with', 'that', 'this', 'from', 'into', 'are', 'was', 'were', 'has', 'have',
    'had', 'not', 'but', 'you', 'your', 'our', 'its', 'can', 'will', 'how', 'what', 'when', 'which',
])

export function tokenize(text: string): Set<string> {
    const tokens = text.toLowerCase().split(/[^a-z0-9]+/)
    return new Set(tokens.filter(t => t.length >= 3 && !STOPWORDS.has(t)))
}

function isNotFound(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT'
}

const byNewest = (a: MemoryRecord, b: MemoryRecord) => b.createdAt.localeCompare(a.createdAt)

/**
 * Memory store backed by a single JSON document under a directory.
 * Retrieval ranks records by the share of query keywords they contain.
 */
export class FileMemoryStore implements MemoryStore {
    readonly kind = 'file'
    readonly filePath: string
    private queue: Promise<unknown> = Promise.resolve()

    constructor(
        readonly directory: string,
        private readonly now: () => Date = () => new Date(),
    ) {
        this.filePath = path.join(directory, 'memories.json')
    }

    async store(content: string, sessionId: string, metadata: Partial<MemoryMetadata> = {}): Promise<MemoryRecord> {
        if (!content.trim()) throw new Error('Memory content must not be empty')

        return this.exclusive(async () => {
            const doc = await this.read()
            const record: MemoryRecord = {
                id: randomUUID(),
                sessionId,
                content,
                metadata: MemoryMetadataSchema.parse(metadata),
                createdAt: this.now().toISOString(),
            }
            doc.records.push(record)
            await this.write(doc)
            return record
        })
    }

    async retrieve(query: string, sessionId: string, options: RetrieveOptions = {}): Promise<MemoryRecord[]> {
        const { limit = 5 } = options
        const terms = tokenize(query)
        if (terms.size === 0) return this.list(sessionId, { limit })

        const doc = await this.read()
        return doc.records
            .filter(r => r.sessionId === sessionId)
            .map(r => {
                const words = tokenize(r.content)
                let hits = 0
                for (const term of terms) if (words.has(term)) hits += 1
                return { ...r, score: hits / terms.size }
            })
            .filter(r => r.score > 0)
            .sort((a, b) => b.score - a.score || byNewest(a, b))
            .slice(0, limit)
    }

    async list(sessionId: string, options: RetrieveOptions = {}): Promise<MemoryRecord[]> {
        const { limit = 20 } = options
        const doc = await this.read()
        return doc.records
            .filter(r => r.sessionId === sessionId)
            .sort(byNewest)
            .slice(0, limit)
    }

    async forget(sessionId: string, memoryId: string): Promise<void> {
        await this.exclusive(async () => {
            const doc = await this.read()
            const kept = doc.records.filter(r => !(r.id === memoryId && r.sessionId === sessionId))
            if (kept.length === doc.records.length) throw new Error(`Memory ${memoryId} not found`)
            await this.write({ ...doc, records: kept })
        })
    }

    private async read(): Promise<MemoryFile> {
        let raw: string
        try {
            raw = await fs.readFile(this.filePath, 'utf8')
        } catch (err) {
            if (isNotFound(err)) return { version: 1, records: [] }
            throw err
        }
        return MemoryFileSchema.parse(JSON.parse(raw))
    }

    private async write(doc: MemoryFile): Promise<void> {
        await fs.mkdir(this.directory, { recursive: true })
        const tmp = `${this.filePath}.${process.pid}.tmp`
        await fs.writeFile(tmp, JSON.stringify(doc, null, 2), 'utf8')
        await fs.rename(tmp, this.filePath)
    }

    // Read-modify-write cycles run one at a time; a failed cycle does not block the next one
    private exclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task)
        this.queue = run.catch(() => undefined)
        return run
    }
}
