import type { z } from 'zod'
import type { CapabilityInput, CapabilityOutput } from './types'

export type Parsed<T> = { ok: true; value: T } | { ok: false; output: CapabilityOutput }

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: CapabilityInput): Parsed<z.infer<S>> {
    const parsed = schema.safeParse(input)
    if (parsed.success) return { ok: true, value: parsed.data }

    const details = parsed.error.issues
        .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
        .join('; ')
    return { ok: false, output: { success: false, error: `Invalid input: ${details}` } }
}

// Tool output handed back to the model is capped so one call cannot flood the context
export function clip(text: string, maxChars: number): string {
    return text.length > maxChars ? `${text.slice(0, maxChars)}\n…[truncated ${text.length - maxChars} chars]` : text
}
