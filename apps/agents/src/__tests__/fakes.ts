import type { ReasoningEngine, TurnRequest, TurnResult } from '../lib/reasoning-engine'

export type TurnScript = (request: TurnRequest, call: number) => Promise<Partial<TurnResult>> | Partial<TurnResult>

// Engine stand-in that records every request and answers from a script
export class ScriptedEngine implements ReasoningEngine {
    readonly requests: TurnRequest[] = []
    readonly forks: ScriptedEngine[] = []

    constructor(private readonly script: TurnScript = () => ({})) {}

    async runTurn(request: TurnRequest): Promise<TurnResult> {
        this.requests.push(request)
        const partial = await this.script(request, this.requests.length)
        return {
            text: '',
            toolCalls: [],
            rounds: 1,
            usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
            ...partial,
        }
    }

    fork(): ScriptedEngine {
        const forked = new ScriptedEngine(this.script)
        this.forks.push(forked)
        return forked
    }

    lastRequest(): TurnRequest {
        const request = this.requests.at(-1)
        if (!request) throw new Error('no turn has run')
        return request
    }
}
