import { CapabilityRegistry, Toolbox, type CapabilityContext } from '@pacer/tools'
import { describe, expect, it, vi } from 'vitest'
import { createDelegation, subAgentMessage } from '../lib/sub-agents'
import { ScriptedEngine } from './fakes'

function contextWith(): CapabilityContext {
    return {
        sessionId: 's1',
        runtime: { workspaceRoot: '.', pythonPath: 'python3', commandTimeoutMs: 1000 },
        memory: null,
        toolbox: new Toolbox(),
        delegation: { spawn: async () => [], reflect: async () => '' },
        events: { toolCreated: vi.fn(), agentsSpawned: vi.fn(), memoryStored: vi.fn(), completionSignaled: vi.fn(), usageRecorded: vi.fn() },
    }
}

describe('createDelegation', () => {
    it('never gives sub-agents swarm or stop', async () => {
        const engine = new ScriptedEngine(() => ({ text: 'ok' }))
        const context = contextWith()
        const delegation = createDelegation({ engine, registry: new CapabilityRegistry(), context: () => context })

        await delegation.spawn([{ task: 'probe', tools: ['swarm', 'shell', 'stop', 'editor'] }], 'independent')

        expect(engine.forks).toHaveLength(1)
        expect(engine.forks[0].lastRequest().capabilities.names()).toEqual(['editor', 'shell'])
    })

    it('runs collaborative agents in order, each seeing earlier findings', async () => {
        let n = 0
        const engine = new ScriptedEngine(() => ({ text: `finding ${++n}` }))
        const context = contextWith()
        const delegation = createDelegation({ engine, registry: new CapabilityRegistry(), context: () => context })

        const results = await delegation.spawn(
            [
                { task: 'map the API', tools: ['http_request'] },
                { task: 'map the API', tools: ['http_request'] },
            ],
            'collaborative',
        )

        expect(context.events.usageRecorded).toHaveBeenCalledTimes(2)
        expect(results).toEqual([
            { task: 'map the API', ok: true, output: 'finding 1' },
            { task: 'map the API', ok: true, output: 'finding 2' },
        ])
        expect(engine.forks[0].lastRequest().message).toBe('map the API')
        expect(engine.forks[1].lastRequest().message).toBe(subAgentMessage('map the API', [results[0]]))
        expect(engine.forks[1].lastRequest().instructions).toContain('You are sub-agent 2 of 2 in a collaborative swarm')
    })

    it('reports a failing agent without failing the others', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {})
        vi.spyOn(console, 'log').mockImplementation(() => {})
        const engine = new ScriptedEngine(request => {
            if (request.instructions.includes('sub-agent 1 of 2')) throw new Error('rate limited')
            return { text: 'fine' }
        })
        const context = contextWith()
        const delegation = createDelegation({ engine, registry: new CapabilityRegistry(), context: () => context })

        const results = await delegation.spawn(
            [
                { task: 't', tools: [] },
                { task: 't', tools: [] },
            ],
            'competitive',
        )

        expect(results).toEqual([
            { task: 't', ok: false, output: '', error: 'rate limited' },
            { task: 't', ok: true, output: 'fine' },
        ])
    })

    it('reflects on a forked engine without tools', async () => {
        const usage = { promptTokens: 7, completionTokens: 4, totalTokens: 11 }
        const engine = new ScriptedEngine(() => ({ text: 'Try the cache first.', usage }))
        const context = contextWith()
        const delegation = createDelegation({ engine, registry: new CapabilityRegistry(), context: () => context })

        expect(await delegation.reflect('Why is it slow?')).toBe('Try the cache first.')
        expect(engine.forks[0].lastRequest().capabilities.size).toBe(0)
        expect(engine.requests).toEqual([])
        expect(context.events.usageRecorded).toHaveBeenCalledWith(usage)
    })
})

describe('subAgentMessage', () => {
    it('leaves the task alone when there is nothing earlier', () => {
        expect(subAgentMessage('task', [{ task: 'task', ok: false, output: '', error: 'x' }])).toBe('task')
    })
})
