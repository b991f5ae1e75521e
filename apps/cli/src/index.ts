import 'dotenv/config'
import { formatSummary } from '@pacer/agents'
import { createLogger, loadEnvConfig, setLogLevel } from '@pacer/shared'
import { UsageError, createSession, parseRunOptions, runAgentLoop } from './program'

const log = createLogger('CLI')

function banner(lines: string[]): void {
    console.log('\x1b[33m%s\x1b[0m', '----------------------------------------')
    for (const line of lines) console.log('\x1b[33m%s\x1b[0m', `  ${line}`)
    console.log('\x1b[33m%s\x1b[0m', '----------------------------------------')
}

async function main(argv: string[]): Promise<number> {
    const options = parseRunOptions(argv)
    setLogLevel(options.verbose ? 'debug' : 'info')

    const env = loadEnvConfig()
    const { agent, model, workspaceRoot } = await createSession(options, env)

    banner([
        'PACER - step-budgeted autonomous agent',
        `Objective: ${agent.objective}`,
        `Backend:   ${model.backend} (${model.model}${model.thinking ? ', thinking' : ''})`,
        `Steps:     ${agent.maxSteps}`,
        `Memory:    ${options.memory ? env.memory.backend : 'disabled'}`,
        `Workspace: ${workspaceRoot}`,
    ])

    const last = await runAgentLoop(agent, (step, result) => {
        const tools = result.toolCalls.map(c => c.name).join(', ') || 'none'
        console.log('\x1b[2m%s\x1b[0m', `Step ${step}/${agent.maxSteps}: ${result.rounds} round(s), tools: ${tools}`)
    })

    console.log('')
    banner(['Execution summary'])
    console.log(formatSummary(agent.executionSummary()))

    if (last?.text) {
        console.log('\n\x1b[32m%s\x1b[0m', 'Final result:')
        console.log(last.text)
    }
    return 0
}

process.once('SIGINT', () => {
    console.log('\nInterrupted.')
    process.exit(1)
})

main(process.argv.slice(2)).then(
    code => process.exit(code),
    (err: unknown) => {
        if (err instanceof UsageError) {
            if (err.exitCode !== 0) console.error(err.message)
            process.exit(err.exitCode)
        }
        const verbose = process.argv.includes('-v') || process.argv.includes('--verbose')
        log.error(err instanceof Error ? err.message : String(err))
        if (verbose && err instanceof Error && err.stack) console.error(err.stack)
        process.exit(1)
    },
)
