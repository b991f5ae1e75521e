export { CapabilityRegistry } from './registry'
export type { FunctionTool } from './registry'
export { Toolbox, runtimeForScript } from './toolbox'
export type { CreatedTool, ScriptRuntime } from './toolbox'
export { BUILTIN_CAPABILITIES, ORCHESTRATOR_ONLY } from './skills'
export { formatInTimeZone } from './skills/time/tool'
export { parseInput, clip } from './validation'
export type { Parsed } from './validation'
export type {
    CapabilityCategory,
    CapabilityContext,
    CapabilityDefinition,
    CapabilityDescriptor,
    CapabilityInput,
    CapabilityOutput,
    Delegation,
    InputField,
    RuntimeSettings,
    SessionEvents,
    SubAgentResult,
    SubAgentTask,
    TokenUsage,
} from './types'
