import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getEnv } from './config/env';

let client: SupabaseClient | null = null;

export function isSupabaseConfigured(): boolean {
	const env = getEnv();
	return Boolean(env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY);
}

/**
 * Service-role client used by the account repository. Row-level security
 * does not apply; every query must filter by user explicitly.
 */
export function getSupabaseAdmin(): SupabaseClient {
	if (client) return client;
	const { SUPABASE_URL: url, SUPABASE_SERVICE_ROLE_KEY: key } = getEnv();
	if (!url || !key) {
		throw new Error('Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY');
	}
	client = createClient(url, key, {
		auth: { persistSession: false, autoRefreshToken: false },
	});
	return client;
}
