export { createSupabase, getSupabase } from './client'
export type { SupabaseCredentials } from './client'
