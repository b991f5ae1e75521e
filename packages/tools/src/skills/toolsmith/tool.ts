import { promises as fs } from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { runtimeForScript, type ScriptRuntime } from '../../toolbox'
import type { CapabilityDefinition, RuntimeSettings } from '../../types'
import { resolveInWorkspace } from '../../utils/paths'
import { formatProcessResult, runFile } from '../../utils/process'
import { parseInput } from '../../validation'

const TOOL_NAME = /^[a-zA-Z][\w-]*$/

const LoadToolInput = z.object({
    path: z.string().min(1),
    name: z.string().regex(TOOL_NAME, 'must start with a letter and use only letters, digits, _ or -').optional(),
    description: z.string().default(''),
})

const UseToolInput = z.object({
    name: z.string().min(1),
    args: z.record(z.unknown()).default({}),
})

function interpreterFor(runtime: ScriptRuntime, settings: RuntimeSettings): string {
    switch (runtime) {
        case 'node':
            return process.execPath
        case 'python':
            return settings.pythonPath
        case 'shell':
            return 'sh'
    }
}

export const loadToolTool: CapabilityDefinition = {
    name: 'load_tool',
    description: 'Register a script in the workspace as a reusable tool (.js/.mjs/.cjs, .py, .sh). The script receives its arguments as one JSON string in argv and should print its result.',
    signature: 'load_tool(path, name?, description?)',
    category: 'meta',
    inputSchema: {
        path: { type: 'string', description: 'Script path relative to the workspace root', required: true },
        name: { type: 'string', description: 'Tool name (default: the file name without extension)' },
        description: { type: 'string', description: 'What the tool does' },
    },

    async execute(input, context) {
        const parsed = parseInput(LoadToolInput, input)
        if (!parsed.ok) return parsed.output
        const args = parsed.value

        const scriptPath = resolveInWorkspace(context.runtime.workspaceRoot, args.path)
        const runtime = runtimeForScript(scriptPath)
        if (!runtime) return { success: false, error: `Unsupported script type: ${path.extname(scriptPath) || args.path}` }

        const stat = await fs.stat(scriptPath).catch(() => null)
        if (!stat?.isFile()) return { success: false, error: `Script not found: ${args.path}` }

        const name = args.name ?? path.basename(scriptPath, path.extname(scriptPath))
        if (!TOOL_NAME.test(name)) return { success: false, error: `Invalid tool name: ${name}` }

        const replaced = context.toolbox.add({
            name,
            description: args.description,
            scriptPath,
            runtime,
            createdAt: new Date().toISOString(),
        })
        context.events.toolCreated(name)

        return {
            success: true,
            result: `Loaded tool "${name}" (${runtime}) from ${args.path}${replaced ? ', replacing the previous version' : ''}`,
        }
    },
}

export const useToolTool: CapabilityDefinition = {
    name: 'use_tool',
    description: 'Run a tool previously registered with load_tool.',
    signature: 'use_tool(name, args?)',
    category: 'meta',
    inputSchema: {
        name: { type: 'string', description: 'Name of the loaded tool', required: true },
        args: { type: 'object', description: 'Arguments passed to the script as JSON' },
    },

    async execute(input, context) {
        const parsed = parseInput(UseToolInput, input)
        if (!parsed.ok) return parsed.output
        const { name, args } = parsed.value

        const tool = context.toolbox.get(name)
        if (!tool) {
            const available = context.toolbox.list().map(t => t.name)
            return {
                success: false,
                error: `Tool "${name}" is not loaded. Available: ${available.length > 0 ? available.join(', ') : 'none'}`,
            }
        }

        const result = await runFile(interpreterFor(tool.runtime, context.runtime), [tool.scriptPath, JSON.stringify(args)], {
            cwd: context.runtime.workspaceRoot,
            timeoutMs: context.runtime.commandTimeoutMs,
        })
        const report = formatProcessResult(result)
        return result.code === 0 && !result.timedOut
            ? { success: true, result: report }
            : { success: false, result: report, error: report }
    },
}
