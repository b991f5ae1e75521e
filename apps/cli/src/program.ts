import path from 'node:path'
import { Command, CommanderError } from 'commander'
import {
    AdaptiveAgent,
    OpenAIReasoningEngine,
    buildKickoffMessage,
    createCompletionFn,
    resolveModelSettings,
    type CompletionFn,
    type ModelSettings,
    type TurnResult,
} from '@pacer/agents'
import { createMemoryStore } from '@pacer/memory'
import { RunOptionsSchema, type EnvConfig, type RunOptions } from '@pacer/shared'

export class UsageError extends Error {
    constructor(
        message: string,
        readonly exitCode = 1,
    ) {
        super(message)
        this.name = 'UsageError'
    }
}

export function createProgram(): Command {
    return new Command()
        .name('pacer')
        .description('Run an autonomous agent against an objective within a step budget')
        .argument('<objective...>', 'what the agent should accomplish')
        .option('--model <id>', 'model identifier (default depends on --server)')
        .option('--server <mode>', 'backend: remote (OpenAI API) or local (Ollama)', 'remote')
        .option('--steps <n>', 'step budget', '10')
        .option('--no-thinking', 'disable extended reasoning on models that support it')
        .option('--memory-path <dir>', 'directory for the file memory store')
        .option('--no-memory', 'run without persistent memory')
        .option('--session-id <id>', 'memory session identifier')
        .option('--workspace <dir>', 'directory the file and shell capabilities work in')
        .option('-v, --verbose', 'debug logging and stack traces on errors', false)
        .exitOverride()
        .configureOutput({ writeErr: () => undefined })
}

// argv excludes the node binary and script path
export function parseRunOptions(argv: readonly string[]): RunOptions {
    const program = createProgram()
    try {
        program.parse([...argv], { from: 'user' })
    } catch (err) {
        if (err instanceof CommanderError) throw new UsageError(err.message, err.exitCode)
        throw err
    }

    const parsed = RunOptionsSchema.safeParse({ ...program.opts(), objective: program.args.join(' ') })
    if (!parsed.success) {
        const details = parsed.error.issues.map(i => `${i.path.join('.') || 'options'}: ${i.message}`).join('; ')
        throw new UsageError(`Invalid options: ${details}`)
    }
    return parsed.data
}

export interface Session {
    agent: AdaptiveAgent
    model: ModelSettings
    workspaceRoot: string
}

export async function createSession(
    options: RunOptions,
    env: EnvConfig,
    complete?: CompletionFn,
): Promise<Session> {
    const model = resolveModelSettings({ backend: options.server, model: options.model, thinking: options.thinking }, env)
    const engine = new OpenAIReasoningEngine(complete ?? createCompletionFn(model), {
        model: model.model,
        generation: model.generation,
    })
    const workspaceRoot = path.resolve(options.workspace ?? process.cwd())

    const agent = await AdaptiveAgent.create({
        objective: options.objective,
        maxSteps: options.steps,
        backendMode: options.server,
        engine,
        sessionId: options.sessionId ?? env.memory.sessionId,
        runtime: { workspaceRoot, pythonPath: env.pythonPath, commandTimeoutMs: env.commandTimeoutMs },
        memory: options.memory ? createMemoryStore(env, options.memoryPath) : null,
    })

    return { agent, model, workspaceRoot }
}

/**
 * Runs turns until the agent signals completion or the step budget is used up.
 * The budget is a hard ceiling here: the agent itself only treats it as advice.
 */
export async function runAgentLoop(
    agent: AdaptiveAgent,
    onTurn?: (step: number, result: TurnResult) => void,
): Promise<TurnResult | undefined> {
    let last: TurnResult | undefined
    while (agent.state !== 'terminated' && agent.currentStep < agent.maxSteps) {
        const message = agent.currentStep === 0 ? buildKickoffMessage(agent.objective, agent.maxSteps) : undefined
        last = await agent.turn(message)
        onTurn?.(agent.currentStep, last)
    }
    return last
}
