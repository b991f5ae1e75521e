import type { TokenUsage } from '@pacer/tools'
import type { StepCounters } from './budget'

export type { TokenUsage }

export type SessionState = 'idle' | 'running' | 'terminated'

export interface ExecutionSummary extends StepCounters {
    toolsCreated: string[]
    agentsSpawned: string[]
    learningsStored: number
    usage: TokenUsage
    state: SessionState
    completionReason: string | null
}

export function emptyUsage(): TokenUsage {
    return { promptTokens: 0, completionTokens: 0, totalTokens: 0 }
}

export function addUsage(total: TokenUsage, turn: TokenUsage): TokenUsage {
    return {
        promptTokens: total.promptTokens + turn.promptTokens,
        completionTokens: total.completionTokens + turn.completionTokens,
        totalTokens: total.totalTokens + turn.totalTokens,
    }
}

// Append-only record of what a session produced; cleared by reset()
export class SummaryLedger {
    private toolsCreated: string[] = []
    private agentsSpawned: string[] = []
    private learningsStored = 0
    private usage = emptyUsage()

    recordTool(name: string): void {
        this.toolsCreated.push(name)
    }

    recordAgents(descriptions: string[]): void {
        this.agentsSpawned.push(...descriptions)
    }

    recordLearning(): void {
        this.learningsStored += 1
    }

    recordUsage(turn: TokenUsage): void {
        this.usage = addUsage(this.usage, turn)
    }

    clear(): void {
        this.toolsCreated = []
        this.agentsSpawned = []
        this.learningsStored = 0
        this.usage = emptyUsage()
    }

    snapshot(): Pick<ExecutionSummary, 'toolsCreated' | 'agentsSpawned' | 'learningsStored' | 'usage'> {
        return {
            toolsCreated: [...this.toolsCreated],
            agentsSpawned: [...this.agentsSpawned],
            learningsStored: this.learningsStored,
            usage: { ...this.usage },
        }
    }
}

export function formatSummary(summary: ExecutionSummary): string {
    const lines = [
        `Steps:           ${summary.currentStep}/${summary.maxSteps}`,
        `State:           ${summary.state}${summary.completionReason ? ` (${summary.completionReason})` : ''}`,
        `Tools created:   ${summary.toolsCreated.length > 0 ? summary.toolsCreated.join(', ') : 'none'}`,
        `Agents spawned:  ${summary.agentsSpawned.length}`,
        `Learnings saved: ${summary.learningsStored}`,
        `Tokens:          ${summary.usage.totalTokens} (prompt ${summary.usage.promptTokens}, completion ${summary.usage.completionTokens})`,
    ]
    return lines.join('\n')
}
