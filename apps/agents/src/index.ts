export { AdaptiveAgent } from './adaptive-agent'
export type { AdaptiveAgentOptions } from './adaptive-agent'
export { StepBudget, classifyUrgency, urgencyGuidance } from './lib/budget'
export type { StepCounters, UrgencyTier } from './lib/budget'
export { formatSummary } from './lib/execution-summary'
export type { ExecutionSummary, SessionState, TokenUsage } from './lib/execution-summary'
export { renderSystemPrompt, buildKickoffMessage, buildContinuationMessage } from './lib/system-prompt'
export type { ContextParams } from './lib/system-prompt'
export { resolveModelSettings, createCompletionFn, supportsThinking, generationFields } from './lib/model-router'
export type { CompletionFn, GenerationParams, ModelSettings } from './lib/model-router'
export { OpenAIReasoningEngine, ReasoningEngineError, formatToolOutput } from './lib/reasoning-engine'
export type { EngineSettings, ReasoningEngine, ToolCallRecord, TurnRequest, TurnResult } from './lib/reasoning-engine'
export { createDelegation } from './lib/sub-agents'
