import type { MemoryStore } from '@pacer/memory'
import type { SwarmPattern } from '@pacer/shared'
import type { Toolbox } from './toolbox'

export interface CapabilityInput { [key: string]: unknown }

export interface CapabilityOutput {
    success: boolean
    result?: unknown
    error?: string
    halt?: boolean           // set by the completion signal; ends the current turn
}

export interface InputField {
    type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object'
    description: string
    required?: boolean
    enum?: readonly string[]
}

export type CapabilityCategory = 'meta' | 'code' | 'research' | 'data' | 'system'

export interface CapabilityDefinition {
    name: string
    description: string
    signature?: string
    category: CapabilityCategory
    inputSchema: Record<string, InputField>
    execute: (input: CapabilityInput, context: CapabilityContext) => Promise<CapabilityOutput>
}

export interface CapabilityDescriptor {
    name: string
    signature?: string
}

export interface SubAgentTask {
    task: string
    tools: string[]
}

export interface SubAgentResult {
    task: string
    ok: boolean
    output: string
    error?: string
}

export interface Delegation {
    spawn(tasks: SubAgentTask[], pattern: SwarmPattern): Promise<SubAgentResult[]>
    reflect(prompt: string): Promise<string>
}

// Hooks through which capabilities report what they did to the owning session
export interface TokenUsage {
    promptTokens: number
    completionTokens: number
    totalTokens: number
}

export interface SessionEvents {
    toolCreated(name: string): void
    agentsSpawned(descriptions: string[]): void
    memoryStored(memoryId: string): void
    completionSignaled(reason: string): void
    // Tokens spent by forked sub-agent and reflection turns
    usageRecorded(usage: TokenUsage): void
}

export interface RuntimeSettings {
    workspaceRoot: string
    pythonPath: string
    commandTimeoutMs: number
}

export interface CapabilityContext {
    sessionId: string
    runtime: RuntimeSettings
    memory: MemoryStore | null     // null when the memory system is disabled
    toolbox: Toolbox
    delegation: Delegation
    events: SessionEvents
}
