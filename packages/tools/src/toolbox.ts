import path from 'node:path'

export type ScriptRuntime = 'node' | 'python' | 'shell'

export interface CreatedTool {
    name: string
    description: string
    scriptPath: string
    runtime: ScriptRuntime
    createdAt: string
}

const RUNTIME_BY_EXTENSION: Record<string, ScriptRuntime> = {
    '.js': 'node',
    '.mjs': 'node',
    '.cjs': 'node',
    '.py': 'python',
    '.sh': 'shell',
}

export function runtimeForScript(scriptPath: string): ScriptRuntime | undefined {
    return RUNTIME_BY_EXTENSION[path.extname(scriptPath).toLowerCase()]
}

/**
 * Tools the agent writes and loads during a session. They live beside the
 * capability registry rather than in it: the registry is fixed when the
 * session is built, and created tools are reached through `use_tool`.
 */
export class Toolbox {
    private readonly tools = new Map<string, CreatedTool>()

    // Returns true when an existing tool of the same name was replaced
    add(tool: CreatedTool): boolean {
        const replaced = this.tools.has(tool.name)
        this.tools.set(tool.name, tool)
        return replaced
    }

    get(name: string): CreatedTool | undefined {
        return this.tools.get(name)
    }

    list(): CreatedTool[] {
        return Array.from(this.tools.values())
    }
}
