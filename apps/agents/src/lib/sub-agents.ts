import type { SwarmPattern } from '@pacer/shared'
import { createLogger, errorMessage } from '@pacer/shared'
import {
    CapabilityRegistry,
    ORCHESTRATOR_ONLY,
    type CapabilityContext,
    type Delegation,
    type SubAgentResult,
    type SubAgentTask,
} from '@pacer/tools'
import type { ReasoningEngine } from './reasoning-engine'

const log = createLogger('Swarm')

const EXCLUDED = new Set<string>(ORCHESTRATOR_ONLY)

const REFLECTION_INSTRUCTIONS = `## YOUR ROLE
You are a reflective advisor to an autonomous agent. Read its question and answer in a few short paragraphs:
what is known, the most promising next step, and what could go wrong. Do not call tools.`

export interface DelegationOptions {
    engine: ReasoningEngine
    registry: CapabilityRegistry
    // Read lazily: the session context is built after its delegation
    context: () => CapabilityContext
}

export function subAgentInstructions(index: number, total: number, pattern: SwarmPattern, tools: readonly string[]): string {
    return `## YOUR ROLE
You are sub-agent ${index + 1} of ${total} in a ${pattern} swarm working for an orchestrating agent.
Work only on the task you are given, then reply with your findings in plain text. That reply is all the orchestrator sees.

## CAPABILITIES
${tools.length > 0 ? tools.join(', ') : 'none; answer from reasoning alone'}

Check memory for earlier findings before acting if it is available, and store anything worth keeping.`
}

export function subAgentMessage(task: string, earlier: readonly SubAgentResult[]): string {
    const prior = earlier.filter(r => r.ok)
    if (prior.length === 0) return task
    const notes = prior.map((r, i) => `### Agent ${i + 1}\n${r.output}`).join('\n\n')
    return `${task}\n\n## EARLIER AGENTS' FINDINGS\nBuild on these instead of repeating them.\n\n${notes}`
}

/**
 * Gives capabilities a way to run sub-agents on forked engines. Sub-agents get
 * a registry subset without swarm or stop. Collaborative swarms run one after
 * another, each seeing earlier output; the other patterns run in parallel.
 * A failing sub-agent is reported in its own result and does not fail the swarm.
 */
export function createDelegation(options: DelegationOptions): Delegation {
    const delegation: Delegation = {
        async spawn(tasks: SubAgentTask[], pattern: SwarmPattern): Promise<SubAgentResult[]> {
            log.info(`Spawning ${tasks.length} sub-agent(s), pattern=${pattern}`)

            const runOne = async (task: SubAgentTask, index: number, earlier: readonly SubAgentResult[]): Promise<SubAgentResult> => {
                const registry = options.registry.subset(task.tools.filter(name => !EXCLUDED.has(name)))
                try {
                    const result = await options.engine.fork().runTurn({
                        instructions: subAgentInstructions(index, tasks.length, pattern, registry.names()),
                        message: subAgentMessage(task.task, earlier),
                        capabilities: registry,
                        context: { ...options.context(), delegation },
                    })
                    options.context().events.usageRecorded(result.usage)
                    return { task: task.task, ok: true, output: result.text }
                } catch (err) {
                    log.warn(`Sub-agent ${index + 1} failed: ${errorMessage(err)}`)
                    return { task: task.task, ok: false, output: '', error: errorMessage(err) }
                }
            }

            if (pattern === 'collaborative') {
                const results: SubAgentResult[] = []
                for (const [index, task] of tasks.entries()) {
                    results.push(await runOne(task, index, results))
                }
                return results
            }

            return Promise.all(tasks.map((task, index) => runOne(task, index, [])))
        },

        async reflect(prompt: string): Promise<string> {
            const result = await options.engine.fork().runTurn({
                instructions: REFLECTION_INSTRUCTIONS,
                message: prompt,
                capabilities: new CapabilityRegistry([]),
                context: options.context(),
            })
            options.context().events.usageRecorded(result.usage)
            return result.text
        },
    }

    return delegation
}
