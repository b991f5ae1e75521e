import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { FileMemoryStore } from '@pacer/memory'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { currentTimeTool, editorTool, loadToolTool, memoryTool, stopTool, swarmTool, thinkTool, useToolTool } from '../skills'
import { makeContext } from './context'

let workspace: string

beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'pacer-tools-'))
})

afterEach(async () => {
    vi.useRealTimers()
    await fs.rm(workspace, { recursive: true, force: true })
})

describe('stop', () => {
    it('signals completion and halts the turn', async () => {
        const context = makeContext()
        const output = await stopTool.execute({ reason: 'objective achieved' }, context)

        expect(output).toEqual({ success: true, result: 'Stopping: objective achieved', halt: true })
        expect(context.events.completionSignaled).toHaveBeenCalledWith('objective achieved')
    })

    it('requires a reason', async () => {
        const context = makeContext()
        const output = await stopTool.execute({}, context)

        expect(output.success).toBe(false)
        expect(output.error).toBe('Invalid input: reason: Required')
        expect(context.events.completionSignaled).not.toHaveBeenCalled()
    })
})

describe('current_time', () => {
    it('formats the current time in the requested zone', async () => {
        vi.useFakeTimers()
        vi.setSystemTime(new Date('2026-01-15T12:00:00Z'))

        const output = await currentTimeTool.execute({ timezone: 'Asia/Tokyo' }, makeContext())
        expect(output).toEqual({
            success: true,
            result: { timezone: 'Asia/Tokyo', iso: '2026-01-15T12:00:00.000Z', local: '2026-01-15 21:00:00' },
        })
    })

    it('defaults to UTC', async () => {
        vi.useFakeTimers()
        vi.setSystemTime(new Date('2026-01-15T00:30:05Z'))

        const output = await currentTimeTool.execute({}, makeContext())
        expect(output.result).toEqual({ timezone: 'UTC', iso: '2026-01-15T00:30:05.000Z', local: '2026-01-15 00:30:05' })
    })

    it('rejects unknown zones', async () => {
        const output = await currentTimeTool.execute({ timezone: 'Mars/Olympus' }, makeContext())
        expect(output).toEqual({ success: false, error: 'Unknown time zone: Mars/Olympus' })
    })
})

describe('editor', () => {
    it('creates, views and edits files', async () => {
        const context = makeContext({ workspaceRoot: workspace })

        const created = await editorTool.execute({ command: 'create', path: 'notes/todo.txt', content: 'alpha\nbeta\n' }, context)
        expect(created).toEqual({ success: true, result: 'Created notes/todo.txt (11 chars)' })

        const replaced = await editorTool.execute({ command: 'str_replace', path: 'notes/todo.txt', old_str: 'beta', new_str: 'gamma' }, context)
        expect(replaced).toEqual({ success: true, result: 'Replaced 1 occurrence in notes/todo.txt' })

        await editorTool.execute({ command: 'append', path: 'notes/todo.txt', content: 'delta\n' }, context)

        const viewed = await editorTool.execute({ command: 'view', path: 'notes/todo.txt' }, context)
        expect(viewed).toEqual({ success: true, result: 'alpha\ngamma\ndelta\n' })

        const listing = await editorTool.execute({ command: 'view', path: '.' }, context)
        expect(listing).toEqual({ success: true, result: 'notes/' })
    })

    it('refuses ambiguous or missing replacements', async () => {
        const context = makeContext({ workspaceRoot: workspace })
        await editorTool.execute({ command: 'create', path: 'a.txt', content: 'x x' }, context)

        expect(await editorTool.execute({ command: 'str_replace', path: 'a.txt', old_str: 'x', new_str: 'y' }, context)).toEqual({
            success: false,
            error: 'old_str occurs 2 times in a.txt; make it unique',
        })
        expect(await editorTool.execute({ command: 'str_replace', path: 'a.txt', old_str: 'z' }, context)).toEqual({
            success: false,
            error: 'old_str not found in a.txt',
        })
    })

    it('rejects paths outside the workspace', async () => {
        const context = makeContext({ workspaceRoot: workspace })
        await expect(editorTool.execute({ command: 'view', path: '../outside.txt' }, context)).rejects.toThrow(
            'Path escapes the workspace: ../outside.txt',
        )
    })
})

describe('memory', () => {
    it('fails when memory is disabled', async () => {
        const output = await memoryTool.execute({ action: 'list' }, makeContext())
        expect(output).toEqual({ success: false, error: 'Memory system is disabled for this session' })
    })

    it('stores, retrieves and deletes memories for the session', async () => {
        const store = new FileMemoryStore(workspace)
        const context = makeContext({ memory: store })

        const saved = await memoryTool.execute(
            { action: 'store', content: 'Weather API needs a key header', metadata: { type: 'solution' } },
            context,
        )
        expect(saved.success).toBe(true)

        const [record] = await store.list('session-test')
        expect(record.metadata).toEqual({ type: 'solution' })
        expect(saved.result).toBe(`Memory saved (ID: ${record.id}): Weather API needs a key header`)
        expect(context.events.memoryStored).toHaveBeenCalledWith(record.id)

        const found = await memoryTool.execute({ action: 'retrieve', query: 'weather api' }, context)
        expect(found).toEqual({
            success: true,
            result: `[SOLUTION] (1.00) Weather API needs a key header (id: ${record.id})`,
        })

        expect(await memoryTool.execute({ action: 'delete', memory_id: record.id }, context)).toEqual({
            success: true,
            result: `Memory ${record.id} deleted`,
        })
        expect(await memoryTool.execute({ action: 'list' }, context)).toEqual({ success: true, result: 'No memories stored yet.' })
    })
})

describe('load_tool and use_tool', () => {
    it('registers a workspace script and runs it with JSON arguments', async () => {
        const context = makeContext({ workspaceRoot: workspace })
        await fs.writeFile(
            path.join(workspace, 'add.js'),
            'const { a, b } = JSON.parse(process.argv[2]); console.log(JSON.stringify({ sum: a + b }))\n',
        )

        const loaded = await loadToolTool.execute({ path: 'add.js', description: 'Adds two numbers' }, context)
        expect(loaded).toEqual({ success: true, result: 'Loaded tool "add" (node) from add.js' })
        expect(context.events.toolCreated).toHaveBeenCalledWith('add')
        expect(context.toolbox.get('add')?.runtime).toBe('node')

        const used = await useToolTool.execute({ name: 'add', args: { a: 2, b: 3 } }, context)
        expect(used.success).toBe(true)
        expect(used.result).toBe('exit_code=0\n\nSTDOUT:\n{"sum":5}\n\n\nSTDERR:\n')
    })

    it('rejects unsupported or missing scripts', async () => {
        const context = makeContext({ workspaceRoot: workspace })
        expect(await loadToolTool.execute({ path: 'tool.rb' }, context)).toEqual({ success: false, error: 'Unsupported script type: .rb' })
        expect(await loadToolTool.execute({ path: 'gone.py' }, context)).toEqual({ success: false, error: 'Script not found: gone.py' })
    })

    it('reports unknown tools with the loaded names', async () => {
        const output = await useToolTool.execute({ name: 'ghost' }, makeContext())
        expect(output).toEqual({ success: false, error: 'Tool "ghost" is not loaded. Available: none' })
    })
})

describe('swarm and think', () => {
    it('spawns one task per agent and aggregates per-agent results', async () => {
        const spawn = vi.fn(async () => [
            { task: 'Find X', ok: true, output: 'answer' },
            { task: 'Find X', ok: false, output: '', error: 'timeout' },
        ])
        const context = makeContext({ delegation: { spawn, reflect: vi.fn(async () => '') } })

        const output = await swarmTool.execute(
            { task: 'Find X', swarm_size: 2, coordination_pattern: 'competitive', tools: ['shell'] },
            context,
        )

        expect(spawn).toHaveBeenCalledWith(
            [
                { task: 'Find X', tools: ['shell'] },
                { task: 'Find X', tools: ['shell'] },
            ],
            'competitive',
        )
        expect(context.events.agentsSpawned).toHaveBeenCalledWith([
            'agent 1/2 (competitive): Find X',
            'agent 2/2 (competitive): Find X',
        ])
        expect(output).toEqual({
            success: true,
            result: '1/2 agents succeeded\n\n## Agent 1 (ok)\nanswer\n\n## Agent 2 (failed)\nError: timeout',
        })
    })

    it('limits the swarm size', async () => {
        const output = await swarmTool.execute({ task: 'Find X', swarm_size: 9 }, makeContext())
        expect(output).toEqual({ success: false, error: 'Invalid input: swarm_size: Number must be less than or equal to 5' })
    })

    it('passes the thought and considerations to reflection', async () => {
        const reflect = vi.fn(async () => 'Start with the cheapest option.')
        const context = makeContext({ delegation: { spawn: vi.fn(async () => []), reflect } })

        const output = await thinkTool.execute({ thought: 'Plan', considerations: ['speed', 'cost'] }, context)

        expect(reflect).toHaveBeenCalledWith('Plan\n\nConsider:\n- speed\n- cost')
        expect(output).toEqual({ success: true, result: 'Start with the cheapest option.' })
    })
})
