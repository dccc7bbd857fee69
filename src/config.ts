export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ClientConfig = { supabaseUrl: string; supabaseAnonKey: string };

export function loadClientConfig(env: Record<string, string | boolean | undefined>): ClientConfig {
  const url = env.VITE_SUPABASE_URL;
  const anonKey = env.VITE_SUPABASE_ANON_KEY;
  if (typeof url !== "string" || !url.trim() || typeof anonKey !== "string" || !anonKey.trim()) {
    throw new ConfigError("Supabase credentials are missing. Set VITE_SUPABASE_URL and VITE_SUPABASE_ANON_KEY.");
  }
  return { supabaseUrl: url.trim(), supabaseAnonKey: anonKey.trim() };
}
