export type UrgencyTier = 'LOW' | 'MEDIUM' | 'HIGH'

export interface StepCounters {
    currentStep: number
    maxSteps: number
}

/**
 * Counts turns against an advisory step budget. Overrunning the budget is
 * allowed: `remaining()` simply goes negative and the urgency stays HIGH.
 * Call `advance()` exactly once per turn.
 */
export class StepBudget {
    private step = 0

    constructor(readonly maxSteps: number) {
        if (!Number.isInteger(maxSteps) || maxSteps < 1) {
            throw new RangeError(`maxSteps must be a positive integer, got ${maxSteps}`)
        }
    }

    get currentStep(): number {
        return this.step
    }

    advance(): number {
        this.step += 1
        return this.step
    }

    remaining(): number {
        return this.maxSteps - this.step
    }

    reset(): void {
        this.step = 0
    }

    snapshot(): StepCounters {
        return { currentStep: this.step, maxSteps: this.maxSteps }
    }
}

export function classifyUrgency(remaining: number): UrgencyTier {
    if (remaining < 3) return 'HIGH'
    if (remaining < 7) return 'MEDIUM'
    return 'LOW'
}

const GUIDANCE: Record<UrgencyTier, string> = {
    LOW: 'Plenty of steps left: explore, gather information, and build reusable tools where they pay off.',
    MEDIUM: 'Budget is narrowing: commit to the most promising approach and cut side quests.',
    HIGH: 'Almost out of steps: finish with what you have, record what you learned, then call stop.',
}

export function urgencyGuidance(tier: UrgencyTier): string {
    return GUIDANCE[tier]
}
