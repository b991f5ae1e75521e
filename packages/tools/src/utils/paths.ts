import path from 'node:path'

export function resolveInWorkspace(workspaceRoot: string, target: string): string {
    const root = path.resolve(workspaceRoot)
    const resolved = path.resolve(root, target)
    const relative = path.relative(root, resolved)
    if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
        throw new Error(`Path escapes the workspace: ${target}`)
    }
    return resolved
}
