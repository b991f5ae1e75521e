import OpenAI from 'openai'

export type Embedder = (text: string) => Promise<number[]>

const MAX_INPUT_CHARS = 8000

// The slice of the OpenAI client the embedder calls
export interface EmbeddingsClient {
    embeddings: {
        create(body: { model: string; input: string }): Promise<{ data: Array<{ embedding: number[] }> }>
    }
}

export interface EmbedderOptions {
    apiKey?: string
    baseURL?: string
    client?: EmbeddingsClient
}

/**
 * The client is built on the first call, so a missing API key rejects that
 * call instead of failing store construction.
 */
export function createOpenAIEmbedder(options: EmbedderOptions = {}): Embedder {
    let client: EmbeddingsClient | undefined = options.client

    const getClient = (): EmbeddingsClient => {
        if (client) return client
        const apiKey = options.apiKey || process.env.OPENAI_API_KEY
        if (!apiKey) throw new Error('OPENAI_API_KEY is not set; embeddings are unavailable')
        client = new OpenAI({ apiKey, baseURL: options.baseURL })
        return client
    }

    // Cache embeddings for identical inputs within a process lifetime
    const cache = new Map<string, number[]>()

    return async (text: string) => {
        const input = text.slice(0, MAX_INPUT_CHARS)
        const hit = cache.get(input)
        if (hit) return hit

        const response = await getClient().embeddings.create({
            model: 'text-embedding-3-small',   // 1536 dims
            input,
        })

        const vector = response.data[0]?.embedding
        if (!vector) throw new Error('Embedding response contained no vectors')
        cache.set(input, vector)
        return vector
    }
}

// Rough estimate: 1 token ≈ 4 chars
export function estimateTokens(text: string): number {
    return Math.ceil(text.length / 4)
}
