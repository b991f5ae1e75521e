import { promises as fs } from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import type { CapabilityDefinition, CapabilityOutput } from '../../types'
import { resolveInWorkspace } from '../../utils/paths'
import { clip, parseInput } from '../../validation'

const EditorInput = z.object({
    command: z.enum(['view', 'create', 'str_replace', 'append']),
    path: z.string().min(1),
    content: z.string().optional(),
    old_str: z.string().optional(),
    new_str: z.string().default(''),
    max_chars: z.number().int().positive().default(4000),
})

type EditorArgs = z.infer<typeof EditorInput>

function countOccurrences(haystack: string, needle: string): number {
    let count = 0
    let at = haystack.indexOf(needle)
    while (at !== -1) {
        count += 1
        at = haystack.indexOf(needle, at + needle.length)
    }
    return count
}

async function view(target: string, args: EditorArgs): Promise<CapabilityOutput> {
    const stat = await fs.stat(target)
    if (stat.isDirectory()) {
        const entries = await fs.readdir(target, { withFileTypes: true })
        const listing = entries
            .map(e => (e.isDirectory() ? `${e.name}/` : e.name))
            .sort()
            .slice(0, 200)
        return { success: true, result: listing.join('\n') || '(empty directory)' }
    }
    const content = await fs.readFile(target, 'utf8')
    return { success: true, result: clip(content, args.max_chars) }
}

async function replaceOnce(target: string, args: EditorArgs): Promise<CapabilityOutput> {
    if (!args.old_str) return { success: false, error: 'old_str is required for str_replace' }

    const content = await fs.readFile(target, 'utf8')
    const occurrences = countOccurrences(content, args.old_str)
    if (occurrences === 0) return { success: false, error: `old_str not found in ${args.path}` }
    if (occurrences > 1) {
        return { success: false, error: `old_str occurs ${occurrences} times in ${args.path}; make it unique` }
    }

    await fs.writeFile(target, content.replace(args.old_str, () => args.new_str), 'utf8')
    return { success: true, result: `Replaced 1 occurrence in ${args.path}` }
}

export const editorTool: CapabilityDefinition = {
    name: 'editor',
    description: 'View, create, and edit files inside the workspace. Use it to write new tool scripts before loading them with load_tool.',
    signature: 'editor(command: view|create|str_replace|append, path, content?, old_str?, new_str?)',
    category: 'code',
    inputSchema: {
        command: { type: 'string', description: 'One of: view, create, str_replace, append', required: true, enum: ['view', 'create', 'str_replace', 'append'] },
        path: { type: 'string', description: 'File or directory path relative to the workspace root', required: true },
        content: { type: 'string', description: 'File content for create and append' },
        old_str: { type: 'string', description: 'Exact text to replace (must occur once) for str_replace' },
        new_str: { type: 'string', description: 'Replacement text for str_replace' },
        max_chars: { type: 'integer', description: 'Max characters returned by view (default: 4000)' },
    },

    async execute(input, context) {
        const parsed = parseInput(EditorInput, input)
        if (!parsed.ok) return parsed.output
        const args = parsed.value
        const target = resolveInWorkspace(context.runtime.workspaceRoot, args.path)

        switch (args.command) {
            case 'view':
                return view(target, args)
            case 'create':
                if (args.content === undefined) return { success: false, error: 'content is required for create' }
                await fs.mkdir(path.dirname(target), { recursive: true })
                await fs.writeFile(target, args.content, 'utf8')
                return { success: true, result: `Created ${args.path} (${args.content.length} chars)` }
            case 'str_replace':
                return replaceOnce(target, args)
            case 'append':
                if (args.content === undefined) return { success: false, error: 'content is required for append' }
                await fs.mkdir(path.dirname(target), { recursive: true })
                await fs.appendFile(target, args.content, 'utf8')
                return { success: true, result: `Appended ${args.content.length} chars to ${args.path}` }
        }
    },
}
