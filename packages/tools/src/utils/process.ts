import { exec, execFile } from 'node:child_process'

export interface ProcessResult {
    stdout: string
    stderr: string
    code: number
    timedOut: boolean
}

interface ProcessFailure {
    message: string
    code?: string | number | null
    killed?: boolean
    signal?: NodeJS.Signals | null
}

function toResult(error: ProcessFailure | null, stdout: string, stderr: string): ProcessResult {
    if (!error) return { stdout, stderr, code: 0, timedOut: false }
    return {
        stdout,
        stderr: stderr || error.message,
        code: typeof error.code === 'number' ? error.code : 1,
        timedOut: error.killed === true && error.signal === 'SIGTERM',
    }
}

// Resolves for every outcome; failures are reported through `code` and `stderr`
export function runCommand(command: string, options: { cwd: string; timeoutMs: number }): Promise<ProcessResult> {
    return new Promise(resolve => {
        exec(command, { cwd: options.cwd, timeout: options.timeoutMs, maxBuffer: 4 * 1024 * 1024 }, (error, stdout, stderr) => {
            resolve(toResult(error, stdout, stderr))
        })
    })
}

export function runFile(
    file: string,
    args: string[],
    options: { cwd: string; timeoutMs: number },
): Promise<ProcessResult> {
    return new Promise(resolve => {
        execFile(file, args, { cwd: options.cwd, timeout: options.timeoutMs, maxBuffer: 4 * 1024 * 1024 }, (error, stdout, stderr) => {
            resolve(toResult(error, stdout, stderr))
        })
    })
}

export function formatProcessResult(result: ProcessResult, maxStdout = 3000, maxStderr = 1000): string {
    const status = result.timedOut ? 'timed_out' : `exit_code=${result.code}`
    return `${status}\n\nSTDOUT:\n${result.stdout.slice(0, maxStdout)}\n\nSTDERR:\n${result.stderr.slice(0, maxStderr)}`
}
