import os from 'node:os'
import { AdaptiveAgent, type ReasoningEngine, type TurnRequest, type TurnResult } from '@pacer/agents'
import { loadEnvConfig } from '@pacer/shared'
import { describe, expect, it, vi } from 'vitest'
import { UsageError, createSession, parseRunOptions, runAgentLoop } from '../program'

describe('parseRunOptions', () => {
    it('applies defaults', () => {
        expect(parseRunOptions(['find', 'the', 'slow', 'query'])).toEqual({
            objective: 'find the slow query',
            server: 'remote',
            steps: 10,
            thinking: true,
            memory: true,
            verbose: false,
        })
    })

    it('reads every flag', () => {
        const options = parseRunOptions([
            'audit deps',
            '--model',
            'o3-mini',
            '--server',
            'local',
            '--steps',
            '4',
            '--no-thinking',
            '--memory-path',
            '/tmp/mem',
            '--no-memory',
            '--session-id',
            'audit',
            '--workspace',
            '/tmp/ws',
            '-v',
        ])
        expect(options).toEqual({
            objective: 'audit deps',
            model: 'o3-mini',
            server: 'local',
            steps: 4,
            thinking: false,
            memory: false,
            memoryPath: '/tmp/mem',
            sessionId: 'audit',
            workspace: '/tmp/ws',
            verbose: true,
        })
    })

    it('rejects an unknown backend', () => {
        expect(() => parseRunOptions(['x', '--server', 'cloud'])).toThrow(UsageError)
    })

    it('rejects a non-positive step budget', () => {
        expect(() => parseRunOptions(['x', '--steps', '0'])).toThrow('Invalid options: steps: Number must be greater than 0')
    })

    it('requires an objective', () => {
        expect(() => parseRunOptions([])).toThrow(UsageError)
    })
})

class StoppingEngine implements ReasoningEngine {
    readonly messages: string[] = []

    constructor(private readonly stopOnCall: number | null) {}

    async runTurn(request: TurnRequest): Promise<TurnResult> {
        this.messages.push(request.message)
        if (this.messages.length === this.stopOnCall) {
            await request.capabilities.invoke('stop', { reason: 'Objective achieved: done' }, request.context)
        }
        return {
            text: `answer ${this.messages.length}`,
            toolCalls: [],
            rounds: 1,
            usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
        }
    }

    fork(): ReasoningEngine {
        return new StoppingEngine(null)
    }
}

function agentWith(engine: ReasoningEngine, maxSteps: number) {
    return AdaptiveAgent.create({
        objective: 'Tidy the repo',
        maxSteps,
        backendMode: 'remote',
        engine,
        sessionId: 's1',
        runtime: { workspaceRoot: os.tmpdir(), pythonPath: 'python3', commandTimeoutMs: 1000 },
        memory: null,
    })
}

describe('runAgentLoop', () => {
    it('stops as soon as the agent signals completion', async () => {
        const engine = new StoppingEngine(2)
        const agent = await agentWith(engine, 5)
        const onTurn = vi.fn()

        const last = await runAgentLoop(agent, onTurn)

        expect(last?.text).toBe('answer 2')
        expect(agent.state).toBe('terminated')
        expect(onTurn).toHaveBeenCalledTimes(2)
        expect(engine.messages[0].startsWith('Objective: Tidy the repo')).toBe(true)
        expect(engine.messages[1]).toBe('Continue working on the objective. This is step 2 of 5.')
    })

    it('never runs more turns than the step budget', async () => {
        const engine = new StoppingEngine(null)
        const agent = await agentWith(engine, 3)

        await runAgentLoop(agent)

        expect(engine.messages).toHaveLength(3)
        expect(agent.executionSummary()).toMatchObject({ currentStep: 3, state: 'running' })
    })
})

describe('createSession', () => {
    it('wires the agent from options and environment without memory', async () => {
        const env = loadEnvConfig({ OPENAI_API_KEY: 'test-key', PACER_SESSION_ID: 'env-session' })
        const complete = vi.fn()
        const { agent, model, workspaceRoot } = await createSession(
            parseRunOptions(['write a haiku', '--no-memory', '--steps', '3', '--workspace', os.tmpdir()]),
            env,
            complete,
        )

        expect(agent.objective).toBe('write a haiku')
        expect(agent.maxSteps).toBe(3)
        expect(model.model).toBe('gpt-4o')
        expect(workspaceRoot).toBe(os.tmpdir())
        expect(complete).not.toHaveBeenCalled()
    })
})
