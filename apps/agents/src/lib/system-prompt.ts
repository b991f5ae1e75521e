import type { BackendMode } from '@pacer/shared'
import type { CapabilityDescriptor } from '@pacer/tools'
import { urgencyGuidance, type UrgencyTier } from './budget'

export interface ContextParams {
    objective: string
    currentStep: number
    maxSteps: number
    urgency: UrgencyTier
    backendMode: BackendMode | string
    capabilities: readonly CapabilityDescriptor[]
    memoryEnabled: boolean
    priorKnowledge?: string
}

type PlaybookVariant = 'remote' | 'local'

function variantFor(mode: string): PlaybookVariant {
    return mode === 'local' ? 'local' : 'remote'
}

const ROLE = `## WHO YOU ARE
You are an autonomous problem-solving agent working against a fixed step budget.
Each turn you judge how confident you are, pick a strategy to match, act through your capabilities,
and keep what you learn for future sessions.`

function missionParameters(p: ContextParams, variant: PlaybookVariant): string {
    const names = p.capabilities.map(c => c.name).join(', ') || 'none'
    return `## MISSION PARAMETERS
- Objective: ${p.objective}
- Step: ${p.currentStep}/${p.maxSteps}
- Remaining steps: ${p.maxSteps - p.currentStep}
- Urgency: ${p.urgency}
- Backend: ${variant.toUpperCase()}
- Memory: ${p.memoryEnabled ? 'ENABLED' : 'DISABLED'}
- Capabilities: ${names}`
}

function capabilityReference(capabilities: readonly CapabilityDescriptor[]): string {
    const lines = capabilities.map(c => `- ${c.signature ?? c.name}`)
    return `## CAPABILITY REFERENCE\n${lines.join('\n')}`
}

function strategyPlaybook(urgency: UrgencyTier): string {
    return `## STRATEGY PLAYBOOK
Rate your confidence in the next move before you act:
- High confidence: execute directly with the capabilities you already have.
- Medium confidence: use think to reflect first, or write a small tool and load it.
- Low confidence: delegate with swarm so several sub-agents attack the problem at once, and search memory.

Work in this order: check memory for similar problems, analyse the requirements, plan against the remaining steps,
execute, reflect on the outcome, store what you learned, then stop.

Step budget (${urgency}): ${urgencyGuidance(urgency)}`
}

const MEMORY_PROTOCOL = `## MEMORY PROTOCOL
Store an entry with memory(action="store") after a solution works, after you create a tool,
after an approach fails and you know why, and when you discover domain knowledge.
Write each entry so it stands alone, and tag it with metadata.type
(tool, strategy, knowledge, failure, solution or completion) plus a domain.
Retrieve before repeating work: memory(action="retrieve", query="...").
Call current_time when dates or deadlines matter, and record the returned iso value as metadata.timestamp on entries you store.`

const TOOL_CREATION_PROTOCOL = `## TOOL CREATION PROTOCOL
When no capability fits:
1. Write a script with editor(command="create"). It receives its arguments as one JSON string in argv and prints its result.
2. Check the logic with python_repl or shell.
3. Register it with load_tool(path=...), then call it with use_tool(name=..., args={...}).
4. Store the tool and what it is for in memory.`

function subAgentProtocol(variant: PlaybookVariant): string {
    const sizing = variant === 'local'
        ? 'Sub-agents run on the same small local model as you: keep swarm_size at 2 or less and give each a narrow, concrete task.'
        : 'Sub-agents run on the remote model: up to 5 per swarm, each with a distinct focus.'

    return `## SUB-AGENT PROTOCOL
Use swarm when the problem needs parallel exploration or several perspectives.
${sizing}
Keep each task short and say: what is already done, the one goal, what to avoid, and what success looks like.
Include memory in their tools so findings are shared. Patterns: collaborative (sequential, each builds on the last),
competitive (parallel, compare answers), independent (parallel, separate angles).`
}

const COMPLETION_PROTOCOL = `## COMPLETION PROTOCOL
Call stop(reason=...) when:
- the objective is achieved: reason "Objective achieved: <outcome>"
- you are blocked and cannot continue: reason "Blocked: <what is missing>"
- the step budget is exhausted: reason "Budget exhausted: <progress so far>"`

/**
 * Renders the operating instructions for one turn. Pure: identical params
 * always produce identical text. Any backend mode other than "local" renders
 * the remote variant.
 */
export function renderSystemPrompt(params: ContextParams): string {
    const variant = variantFor(params.backendMode)
    const sections = [
        ROLE,
        missionParameters(params, variant),
        capabilityReference(params.capabilities),
        strategyPlaybook(params.urgency),
        MEMORY_PROTOCOL,
        TOOL_CREATION_PROTOCOL,
        subAgentProtocol(variant),
        COMPLETION_PROTOCOL,
    ]

    if (params.priorKnowledge && params.priorKnowledge.trim().length > 0) {
        sections.push(`## PRIOR KNOWLEDGE (from past sessions)\n${params.priorKnowledge}`)
    }

    return sections.join('\n\n')
}

export function buildKickoffMessage(objective: string, maxSteps: number): string {
    return `Objective: ${objective}

You have ${maxSteps} steps. Start by checking memory for related work, assess your confidence, then act.
Call stop with a reason when you are done.`
}

export function buildContinuationMessage(step: number, maxSteps: number): string {
    return `Continue working on the objective. This is step ${step} of ${maxSteps}.`
}
