import { randomUUID } from 'node:crypto'
import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import type { CapabilityDefinition } from '../../types'
import { resolveInWorkspace } from '../../utils/paths'
import { formatProcessResult, runCommand, runFile } from '../../utils/process'
import { parseInput } from '../../validation'

const PythonInput = z.object({
    code: z.string().min(1),
    timeout_ms: z.number().int().positive().optional(),
})

const ShellInput = z.object({
    command: z.string().min(1),
    cwd: z.string().optional(),
    timeout_ms: z.number().int().positive().optional(),
})

export const pythonReplTool: CapabilityDefinition = {
    name: 'python_repl',
    description: 'Run a Python snippet in a fresh interpreter and return its exit code, stdout, and stderr. Print what you want to see.',
    signature: 'python_repl(code, timeout_ms?)',
    category: 'code',
    inputSchema: {
        code: { type: 'string', description: 'Python source to execute', required: true },
        timeout_ms: { type: 'integer', description: 'Kill the process after this many milliseconds' },
    },

    async execute(input, context) {
        const parsed = parseInput(PythonInput, input)
        if (!parsed.ok) return parsed.output
        const { code, timeout_ms } = parsed.value

        const script = path.join(os.tmpdir(), `pacer-${randomUUID()}.py`)
        await fs.writeFile(script, code, 'utf8')
        try {
            const result = await runFile(context.runtime.pythonPath, [script], {
                cwd: context.runtime.workspaceRoot,
                timeoutMs: timeout_ms ?? context.runtime.commandTimeoutMs,
            })
            const report = formatProcessResult(result)
            return result.code === 0 && !result.timedOut
                ? { success: true, result: report }
                : { success: false, result: report, error: report }
        } finally {
            await fs.rm(script, { force: true })
        }
    },
}

export const shellTool: CapabilityDefinition = {
    name: 'shell',
    description: 'Run a shell command inside the workspace and return its exit code, stdout, and stderr.',
    signature: 'shell(command, cwd?, timeout_ms?)',
    category: 'system',
    inputSchema: {
        command: { type: 'string', description: 'Command line to run', required: true },
        cwd: { type: 'string', description: 'Working directory relative to the workspace root' },
        timeout_ms: { type: 'integer', description: 'Kill the command after this many milliseconds' },
    },

    async execute(input, context) {
        const parsed = parseInput(ShellInput, input)
        if (!parsed.ok) return parsed.output
        const { command, cwd, timeout_ms } = parsed.value

        const result = await runCommand(command, {
            cwd: resolveInWorkspace(context.runtime.workspaceRoot, cwd ?? '.'),
            timeoutMs: timeout_ms ?? context.runtime.commandTimeoutMs,
        })
        const report = formatProcessResult(result)
        return result.code === 0 && !result.timedOut
            ? { success: true, result: report }
            : { success: false, result: report, error: report }
    },
}
