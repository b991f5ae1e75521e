import type { MemoryRecord } from '@pacer/memory'
import { MemoryTypeSchema } from '@pacer/shared'
import { z } from 'zod'
import type { CapabilityDefinition } from '../../types'
import { parseInput } from '../../validation'

const MetadataInput = z
    .object({
        type: MemoryTypeSchema.optional(),
        domain: z.string().optional(),
        confidence: z.union([z.string(), z.number()]).optional(),
    })
    .default({})

const MemoryInput = z.discriminatedUnion('action', [
    z.object({ action: z.literal('store'), content: z.string().min(1), metadata: MetadataInput }),
    z.object({ action: z.literal('retrieve'), query: z.string().min(1), limit: z.number().int().positive().default(5) }),
    z.object({ action: z.literal('list'), limit: z.number().int().positive().default(20) }),
    z.object({ action: z.literal('delete'), memory_id: z.string().min(1) }),
])

function describeRecord(record: MemoryRecord): string {
    const score = record.score === undefined ? '' : ` (${record.score.toFixed(2)})`
    return `[${record.metadata.type.toUpperCase()}]${score} ${record.content} (id: ${record.id})`
}

export const memoryTool: CapabilityDefinition = {
    name: 'memory',
    description: 'Persistent memory across sessions. Store lessons, solutions, and failures worth keeping; retrieve them by query; list or delete entries.',
    signature: 'memory(action: store|retrieve|list|delete, content?, query?, metadata?, limit?, memory_id?)',
    category: 'data',
    inputSchema: {
        action: { type: 'string', description: 'One of: store, retrieve, list, delete', required: true, enum: ['store', 'retrieve', 'list', 'delete'] },
        content: { type: 'string', description: 'Text to remember (store)' },
        query: { type: 'string', description: 'What to search for (retrieve)' },
        metadata: { type: 'object', description: 'Optional { type: tool|strategy|knowledge|failure|solution|completion, domain, confidence }' },
        limit: { type: 'integer', description: 'Max results (retrieve default 5, list default 20)' },
        memory_id: { type: 'string', description: 'Memory ID to delete (delete)' },
    },

    async execute(input, context) {
        if (!context.memory) return { success: false, error: 'Memory system is disabled for this session' }

        const parsed = parseInput(MemoryInput, input)
        if (!parsed.ok) return parsed.output
        const args = parsed.value
        const store = context.memory

        switch (args.action) {
            case 'store': {
                const record = await store.store(args.content, context.sessionId, args.metadata)
                context.events.memoryStored(record.id)
                const preview = args.content.length > 60 ? `${args.content.slice(0, 60)}…` : args.content
                return { success: true, result: `Memory saved (ID: ${record.id}): ${preview}` }
            }
            case 'retrieve': {
                const records = await store.retrieve(args.query, context.sessionId, { limit: args.limit })
                if (records.length === 0) return { success: true, result: 'No relevant memories found.' }
                return { success: true, result: records.map(describeRecord).join('\n') }
            }
            case 'list': {
                const records = await store.list(context.sessionId, { limit: args.limit })
                if (records.length === 0) return { success: true, result: 'No memories stored yet.' }
                return { success: true, result: records.map(describeRecord).join('\n') }
            }
            case 'delete':
                await store.forget(context.sessionId, args.memory_id)
                return { success: true, result: `Memory ${args.memory_id} deleted` }
        }
    },
}
