import { formatPriorKnowledge, retrieveMemories, type MemoryStore } from '@pacer/memory'
import { createLogger, type BackendMode } from '@pacer/shared'
import {
    CapabilityRegistry,
    Toolbox,
    type CapabilityContext,
    type CapabilityDefinition,
    type RuntimeSettings,
} from '@pacer/tools'
import { StepBudget, classifyUrgency } from './lib/budget'
import { SummaryLedger, type ExecutionSummary, type SessionState } from './lib/execution-summary'
import type { ReasoningEngine, TurnResult } from './lib/reasoning-engine'
import { createDelegation } from './lib/sub-agents'
import { buildContinuationMessage, renderSystemPrompt } from './lib/system-prompt'

const log = createLogger('Agent')

export interface AdaptiveAgentOptions {
    objective: string
    maxSteps: number
    backendMode: BackendMode
    engine: ReasoningEngine
    sessionId: string
    runtime: RuntimeSettings
    // null disables memory: no priming and the memory capability reports itself off
    memory: MemoryStore | null
    extensions?: readonly CapabilityDefinition[]
    priorMemoryLimit?: number
}

/**
 * Drives one objective through a sequence of turns. Each turn advances the
 * step budget, renders fresh operating instructions for the current urgency
 * and hands them to the reasoning engine. The budget is advisory: turns stay
 * callable past it, and the caller decides when to stop invoking them.
 *
 *   idle ──turn()──▶ running ──stop capability──▶ terminated
 *     ▲                                               │
 *     └──────────────────── reset() ◀─────────────────┘
 */
export class AdaptiveAgent {
    readonly objective: string
    readonly registry: CapabilityRegistry
    readonly toolbox = new Toolbox()

    private readonly budget: StepBudget
    private readonly ledger = new SummaryLedger()
    private readonly engine: ReasoningEngine
    private readonly backendMode: BackendMode
    private readonly memory: MemoryStore | null
    private readonly sessionId: string
    private readonly context: CapabilityContext
    private status: SessionState = 'idle'
    private completionReason: string | null = null
    private priorKnowledge: string | undefined

    private constructor(options: AdaptiveAgentOptions) {
        this.objective = options.objective
        this.budget = new StepBudget(options.maxSteps)
        this.engine = options.engine
        this.backendMode = options.backendMode
        this.memory = options.memory
        this.sessionId = options.sessionId
        this.registry = new CapabilityRegistry(undefined, options.extensions ?? [])

        const delegation = createDelegation({
            engine: options.engine,
            registry: this.registry,
            context: () => this.context,
        })

        this.context = {
            sessionId: options.sessionId,
            runtime: options.runtime,
            memory: options.memory,
            toolbox: this.toolbox,
            delegation,
            events: {
                toolCreated: name => this.ledger.recordTool(name),
                agentsSpawned: descriptions => this.ledger.recordAgents(descriptions),
                memoryStored: () => this.ledger.recordLearning(),
                usageRecorded: usage => this.ledger.recordUsage(usage),
                completionSignaled: reason => {
                    this.status = 'terminated'
                    this.completionReason = reason
                },
            },
        }
    }

    static async create(options: AdaptiveAgentOptions): Promise<AdaptiveAgent> {
        const agent = new AdaptiveAgent(options)
        await agent.primeMemory(options.priorMemoryLimit ?? 5)
        return agent
    }

    get state(): SessionState {
        return this.status
    }

    get currentStep(): number {
        return this.budget.currentStep
    }

    get maxSteps(): number {
        return this.budget.maxSteps
    }

    // Instructions for the current step; turn() renders these after advancing
    renderContext(): string {
        return renderSystemPrompt({
            objective: this.objective,
            currentStep: this.budget.currentStep,
            maxSteps: this.budget.maxSteps,
            urgency: classifyUrgency(this.budget.remaining()),
            backendMode: this.backendMode,
            capabilities: this.registry.descriptors(),
            memoryEnabled: this.memory !== null,
            priorKnowledge: this.priorKnowledge,
        })
    }

    // Engine errors propagate unchanged; the step stays counted
    async turn(message?: string): Promise<TurnResult> {
        const step = this.budget.advance()
        if (this.status !== 'running') {
            this.status = 'running'
            this.completionReason = null
        }

        const urgency = classifyUrgency(this.budget.remaining())
        log.debug(`Step ${step}/${this.budget.maxSteps} urgency=${urgency}`)

        const result = await this.engine.runTurn({
            instructions: this.renderContext(),
            message: message ?? buildContinuationMessage(step, this.budget.maxSteps),
            capabilities: this.registry,
            context: this.context,
        })

        this.ledger.recordUsage(result.usage)
        return result
    }

    reset(): void {
        this.budget.reset()
        this.ledger.clear()
        this.status = 'idle'
        this.completionReason = null
    }

    executionSummary(): ExecutionSummary {
        return {
            ...this.budget.snapshot(),
            ...this.ledger.snapshot(),
            state: this.status,
            completionReason: this.completionReason,
        }
    }

    private async primeMemory(limit: number): Promise<void> {
        if (!this.memory) return

        const retrieval = await retrieveMemories(this.memory, this.objective, this.sessionId, limit)
        if (!retrieval.ok) {
            log.warn(`Memory retrieval failed, continuing without prior context: ${retrieval.error.message}`)
            return
        }

        log.info(`Loaded ${retrieval.records.length} prior memories`)
        const lines = formatPriorKnowledge(retrieval.records)
        this.priorKnowledge = lines.length > 0 ? lines.join('\n') : undefined
    }
}
