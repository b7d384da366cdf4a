/**
 * Single source for the Supabase URL and anon key. Values come ONLY from the process
 * environment (SUPABASE_URL, SUPABASE_ANON_KEY) and are read on every call.
 * Normalizes so values pasted with quotes or a trailing slash still work.
 */

export function normalizeEnvValue(value: string): string {
  return value
    .replace(/^[\s"'\uFEFF]+|[\s"']+$/g, '') // trim whitespace, quotes, BOM
    .replace(/\/+$/, ''); // no trailing slash (Supabase adds it)
}

const readEnv = (name: string): string => normalizeEnvValue(String(process.env[name] ?? ''));

/** Must be valid URL per URL constructor and http(s) + [project-ref].supabase.co */
export function isSupabaseUrlValid(url: string = readEnv('SUPABASE_URL')): boolean {
  if (!url) return false;
  try {
    const u = new URL(url);
    if (u.protocol !== 'https:' && u.protocol !== 'http:') return false;
    // No path, query, or hash allowed (Supabase URL is just the base)
    if (u.pathname !== '/' && u.pathname !== '') return false;
    if (u.search) return false;
    if (u.hash) return false;
    const hostParts = u.hostname.split('.');
    if (hostParts.length !== 3 || hostParts[1] !== 'supabase' || hostParts[2] !== 'co') return false;
    return true;
  } catch {
    return false;
  }
}

export function getSupabaseUrl(): string {
  return readEnv('SUPABASE_URL');
}

export function getSupabaseAnonKey(): string {
  return readEnv('SUPABASE_ANON_KEY');
}

export function isSupabaseConfigured(): boolean {
  return getSupabaseAnonKey().length > 0 && isSupabaseUrlValid(getSupabaseUrl());
}
