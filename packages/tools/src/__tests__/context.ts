import type { MemoryStore } from '@pacer/memory'
import { vi } from 'vitest'
import { Toolbox } from '../toolbox'
import type { CapabilityContext, Delegation } from '../types'

export function makeContext(overrides: { workspaceRoot?: string; memory?: MemoryStore | null; delegation?: Delegation } = {}): CapabilityContext {
    return {
        sessionId: 'session-test',
        runtime: {
            workspaceRoot: overrides.workspaceRoot ?? process.cwd(),
            pythonPath: 'python3',
            commandTimeoutMs: 5_000,
        },
        memory: overrides.memory ?? null,
        toolbox: new Toolbox(),
        delegation: overrides.delegation ?? {
            spawn: vi.fn(async () => []),
            reflect: vi.fn(async () => ''),
        },
        events: {
            toolCreated: vi.fn(),
            agentsSpawned: vi.fn(),
            memoryStored: vi.fn(),
            completionSignaled: vi.fn(),
            usageRecorded: vi.fn(),
        },
    }
}
