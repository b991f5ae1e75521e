import { SwarmPatternSchema } from '@pacer/shared'
import { z } from 'zod'
import type { CapabilityDefinition, SubAgentResult } from '../../types'
import { parseInput } from '../../validation'

const DEFAULT_SUB_AGENT_TOOLS = ['editor', 'shell', 'http_request', 'memory']

const SwarmInput = z.object({
    task: z.string().min(1),
    swarm_size: z.number().int().min(1).max(5).default(3),
    coordination_pattern: SwarmPatternSchema.default('collaborative'),
    tools: z.array(z.string()).min(1).default(DEFAULT_SUB_AGENT_TOOLS),
})

const ThinkInput = z.object({
    thought: z.string().min(1),
    considerations: z.array(z.string()).default([]),
})

function formatResults(results: SubAgentResult[]): string {
    return results
        .map((r, i) => `## Agent ${i + 1} (${r.ok ? 'ok' : 'failed'})\n${r.ok ? r.output : `Error: ${r.error ?? 'unknown error'}`}`)
        .join('\n\n')
}

export const swarmTool: CapabilityDefinition = {
    name: 'swarm',
    description: 'Spawn several sub-agents on the same task. collaborative: run in sequence, each building on earlier output. competitive: run in parallel and compare. independent: run in parallel on their own.',
    signature: 'swarm(task, swarm_size?, coordination_pattern?, tools?)',
    category: 'meta',
    inputSchema: {
        task: { type: 'string', description: 'Task every sub-agent works on', required: true },
        swarm_size: { type: 'integer', description: 'Number of sub-agents, 1-5 (default: 3)' },
        coordination_pattern: { type: 'string', description: 'collaborative | competitive | independent', enum: ['collaborative', 'competitive', 'independent'] },
        tools: { type: 'array', description: 'Capability names the sub-agents may use (swarm and stop are never given)' },
    },

    async execute(input, context) {
        const parsed = parseInput(SwarmInput, input)
        if (!parsed.ok) return parsed.output
        const { task, swarm_size, coordination_pattern, tools } = parsed.value

        const tasks = Array.from({ length: swarm_size }, () => ({ task, tools }))
        const results = await context.delegation.spawn(tasks, coordination_pattern)

        const label = task.length > 80 ? `${task.slice(0, 80)}…` : task
        context.events.agentsSpawned(results.map((_, i) => `agent ${i + 1}/${swarm_size} (${coordination_pattern}): ${label}`))

        const succeeded = results.filter(r => r.ok).length
        const report = `${succeeded}/${results.length} agents succeeded\n\n${formatResults(results)}`
        return succeeded > 0 ? { success: true, result: report } : { success: false, result: report, error: 'All sub-agents failed' }
    },
}

export const thinkTool: CapabilityDefinition = {
    name: 'think',
    description: 'Reflect on a problem before acting. Returns a short analysis: what is known, what to try next, and the risks.',
    signature: 'think(thought, considerations?)',
    category: 'meta',
    inputSchema: {
        thought: { type: 'string', description: 'The question or plan to reflect on', required: true },
        considerations: { type: 'array', description: 'Constraints or angles to weigh' },
    },

    async execute(input, context) {
        const parsed = parseInput(ThinkInput, input)
        if (!parsed.ok) return parsed.output
        const { thought, considerations } = parsed.value

        const prompt = considerations.length > 0
            ? `${thought}\n\nConsider:\n${considerations.map(c => `- ${c}`).join('\n')}`
            : thought
        const reflection = await context.delegation.reflect(prompt)
        return { success: true, result: reflection }
    },
}
