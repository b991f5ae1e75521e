import type { CapabilityDefinition } from '../types'
import { pythonReplTool, shellTool } from './code/tool'
import { stopTool } from './control/tool'
import { swarmTool, thinkTool } from './delegation/tool'
import { editorTool } from './files/tool'
import { memoryTool } from './memory/tool'
import { currentTimeTool } from './time/tool'
import { loadToolTool, useToolTool } from './toolsmith/tool'
import { httpRequestTool } from './web/tool'

// Order is part of the contract: it is the order the system prompt lists them in
export const BUILTIN_CAPABILITIES: readonly CapabilityDefinition[] = [
    swarmTool,
    editorTool,
    loadToolTool,
    useToolTool,
    memoryTool,
    thinkTool,
    pythonReplTool,
    httpRequestTool,
    shellTool,
    currentTimeTool,
    stopTool,
]

// Capabilities a sub-agent never receives
export const ORCHESTRATOR_ONLY = ['swarm', 'stop'] as const

export {
    currentTimeTool,
    editorTool,
    httpRequestTool,
    loadToolTool,
    memoryTool,
    pythonReplTool,
    shellTool,
    stopTool,
    swarmTool,
    thinkTool,
    useToolTool,
}
