import { createLogger, errorMessage } from '@pacer/shared'
import { BUILTIN_CAPABILITIES } from './skills'
import type {
    CapabilityContext,
    CapabilityDefinition,
    CapabilityDescriptor,
    CapabilityInput,
    CapabilityOutput,
} from './types'

const log = createLogger('Tool')

export interface FunctionTool {
    type: 'function'
    function: {
        name: string
        description: string
        parameters: Record<string, unknown>
    }
}

/**
 * Name → implementation table, fixed at construction. Built-ins come first,
 * caller-supplied extensions after them, both in the order given.
 */
export class CapabilityRegistry {
    private readonly capabilities: ReadonlyMap<string, CapabilityDefinition>

    constructor(
        builtins: readonly CapabilityDefinition[] = BUILTIN_CAPABILITIES,
        extensions: readonly CapabilityDefinition[] = [],
    ) {
        const table = new Map<string, CapabilityDefinition>()
        for (const capability of [...builtins, ...extensions]) {
            if (table.has(capability.name)) {
                throw new Error(`Capability already registered: ${capability.name}`)
            }
            table.set(capability.name, capability)
        }
        this.capabilities = table
    }

    get size(): number {
        return this.capabilities.size
    }

    names(): string[] {
        return Array.from(this.capabilities.keys())
    }

    descriptors(): CapabilityDescriptor[] {
        return Array.from(this.capabilities.values(), c => (c.signature ? { name: c.name, signature: c.signature } : { name: c.name }))
    }

    get(name: string): CapabilityDefinition | undefined {
        return this.capabilities.get(name)
    }

    has(name: string): boolean {
        return this.capabilities.has(name)
    }

    // Registry restricted to the given names, in registry order; unknown names are ignored
    subset(names: readonly string[]): CapabilityRegistry {
        const wanted = new Set(names)
        return new CapabilityRegistry(Array.from(this.capabilities.values()).filter(c => wanted.has(c.name)))
    }

    async invoke(name: string, input: CapabilityInput, context: CapabilityContext): Promise<CapabilityOutput> {
        const capability = this.capabilities.get(name)
        if (!capability) return { success: false, error: `Capability "${name}" not found` }

        log.debug(`Executing: ${name}`)
        const start = Date.now()
        let output: CapabilityOutput

        try {
            output = await capability.execute(input, context)
        } catch (err) {
            output = { success: false, error: errorMessage(err) }
        }

        log.debug(`${name} ${output.success ? 'ok' : 'failed'} in ${Date.now() - start}ms`)
        return output
    }

    toFunctionTools(): FunctionTool[] {
        return Array.from(this.capabilities.values(), c => ({
            type: 'function' as const,
            function: {
                name: c.name,
                description: c.description,
                parameters: toJsonSchema(c),
            },
        }))
    }
}

function toJsonSchema(capability: CapabilityDefinition): Record<string, unknown> {
    const properties: Record<string, unknown> = {}
    const required: string[] = []

    for (const [key, field] of Object.entries(capability.inputSchema)) {
        properties[key] = {
            type: field.type,
            description: field.description,
            ...(field.enum ? { enum: field.enum } : {}),
            ...(field.type === 'array' ? { items: { type: 'string' } } : {}),
        }
        if (field.required) required.push(key)
    }

    return { type: 'object', properties, required }
}
