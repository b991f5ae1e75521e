import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import ws from 'ws'
import { createLogger } from '@pacer/shared'

const log = createLogger('DB')

let supabaseInstance: SupabaseClient | null = null

export interface SupabaseCredentials {
    url?: string
    serviceKey?: string
}

// Node 20 has no global WebSocket, and the realtime client needs one to construct
export function createSupabase(url: string, serviceKey: string, fetchImpl?: typeof fetch): SupabaseClient {
    return createClient(url, serviceKey, {
        auth: { persistSession: false },
        realtime: { transport: ws },
        ...(fetchImpl ? { global: { fetch: fetchImpl } } : {}),
    })
}

export function getSupabase(credentials: SupabaseCredentials = {}): SupabaseClient {
    if (supabaseInstance) return supabaseInstance

    const url = credentials.url ?? process.env.SUPABASE_URL
    const key = credentials.serviceKey ?? process.env.SUPABASE_SERVICE_KEY

    if (!url || !key || url === 'undefined' || key === 'undefined') {
        const missing: string[] = []
        if (!url || url === 'undefined') missing.push('SUPABASE_URL')
        if (!key || key === 'undefined') missing.push('SUPABASE_SERVICE_KEY')

        log.error(`Critical: ${missing.join(' and ')} missing from environment.`)
        throw new Error(`Supabase environment variables are missing: ${missing.join(', ')}`)
    }

    supabaseInstance = createSupabase(url, key)
    return supabaseInstance
}
