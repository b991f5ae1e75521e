import { z } from 'zod'
import type { CapabilityDefinition } from '../../types'
import { parseInput } from '../../validation'

const StopInput = z.object({
    reason: z.string().min(1),
})

export const stopTool: CapabilityDefinition = {
    name: 'stop',
    description: 'Signal that the objective is complete (or cannot be completed) and end the run. Give the reason.',
    signature: 'stop(reason)',
    category: 'meta',
    inputSchema: {
        reason: { type: 'string', description: 'Why the run is ending', required: true },
    },

    async execute(input, context) {
        const parsed = parseInput(StopInput, input)
        if (!parsed.ok) return parsed.output

        context.events.completionSignaled(parsed.value.reason)
        return { success: true, result: `Stopping: ${parsed.value.reason}`, halt: true }
    },
}
