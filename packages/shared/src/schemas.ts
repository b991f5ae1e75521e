import { z } from 'zod'

export const BackendModeSchema = z.enum(['remote', 'local'])

export const RunOptionsSchema = z.object({
    objective: z.string().trim().min(1, 'objective must not be empty'),
    model: z.string().min(1).optional(),
    server: BackendModeSchema.default('remote'),
    steps: z.coerce.number().int().positive().default(10),
    thinking: z.boolean().default(true),
    memory: z.boolean().default(true),
    memoryPath: z.string().min(1).optional(),
    sessionId: z.string().min(1).optional(),
    workspace: z.string().min(1).optional(),
    verbose: z.boolean().default(false),
})

export const MemoryTypeSchema = z.enum(['tool', 'strategy', 'knowledge', 'failure', 'solution', 'completion'])

export const MemoryMetadataSchema = z.object({
    type: MemoryTypeSchema.default('knowledge'),
    domain: z.string().optional(),
    confidence: z.union([z.string(), z.number()]).optional(),
}).passthrough()

export const SwarmPatternSchema = z.enum(['collaborative', 'competitive', 'independent'])

export type BackendMode = z.infer<typeof BackendModeSchema>
export type RunOptions = z.infer<typeof RunOptionsSchema>
export type MemoryType = z.infer<typeof MemoryTypeSchema>
export type MemoryMetadata = z.infer<typeof MemoryMetadataSchema>
export type SwarmPattern = z.infer<typeof SwarmPatternSchema>
