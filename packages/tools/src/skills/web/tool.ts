import axios from 'axios'
import { z } from 'zod'
import type { CapabilityDefinition } from '../../types'
import { clip, parseInput } from '../../validation'

const HttpRequestInput = z.object({
    url: z.string().url(),
    method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD']).default('GET'),
    headers: z.record(z.string()).default({}),
    body: z.union([z.string(), z.record(z.unknown())]).optional(),
    max_chars: z.number().int().positive().default(5000),
})

export const httpRequestTool: CapabilityDefinition = {
    name: 'http_request',
    description: 'Make an HTTP request to a web page or API and return the status and response body.',
    signature: 'http_request(url, method?, headers?, body?, max_chars?)',
    category: 'research',
    inputSchema: {
        url: { type: 'string', description: 'Absolute URL to request', required: true },
        method: { type: 'string', description: 'HTTP method (default: GET)', enum: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD'] },
        headers: { type: 'object', description: 'Request headers as a string map' },
        body: { type: 'string', description: 'Request body; objects are sent as JSON' },
        max_chars: { type: 'integer', description: 'Max characters of body to return (default: 5000)' },
    },

    async execute(input) {
        const parsed = parseInput(HttpRequestInput, input)
        if (!parsed.ok) return parsed.output
        const args = parsed.value

        const response = await axios.request<string>({
            url: args.url,
            method: args.method,
            headers: { 'User-Agent': 'pacer-agent/0.1', ...args.headers },
            data: args.body,
            timeout: 15_000,
            maxContentLength: 2_000_000,
            responseType: 'text',
            transformResponse: (raw: string) => raw,
            validateStatus: () => true,
        })

        const contentType = String(response.headers['content-type'] ?? '')
        const body = typeof response.data === 'string' ? response.data : ''
        const result = {
            status: response.status,
            content_type: contentType,
            content: clip(body, args.max_chars),
        }

        if (response.status >= 400) {
            return { success: false, result, error: `HTTP ${response.status} from ${args.url}` }
        }
        return { success: true, result }
    },
}
