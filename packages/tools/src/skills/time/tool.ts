import { z } from 'zod'
import type { CapabilityDefinition } from '../../types'
import { parseInput } from '../../validation'

const CurrentTimeInput = z.object({
    timezone: z.string().min(1).default('UTC'),
})

export function formatInTimeZone(date: Date, timeZone: string): string {
    const parts = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23',
    }).formatToParts(date)

    const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '00'
    return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')}`
}

export const currentTimeTool: CapabilityDefinition = {
    name: 'current_time',
    description: 'Get the current date and time, optionally in a specific IANA time zone.',
    signature: 'current_time(timezone?)',
    category: 'system',
    inputSchema: {
        timezone: { type: 'string', description: 'IANA time zone such as Europe/Berlin (default: UTC)' },
    },

    async execute(input) {
        const parsed = parseInput(CurrentTimeInput, input)
        if (!parsed.ok) return parsed.output
        const { timezone } = parsed.value
        const now = new Date()

        try {
            return {
                success: true,
                result: { timezone, iso: now.toISOString(), local: formatInTimeZone(now, timezone) },
            }
        } catch (err) {
            if (err instanceof RangeError) return { success: false, error: `Unknown time zone: ${timezone}` }
            throw err
        }
    },
}
