import { createClient } from "@supabase/supabase-js";
import { normalizeEmail } from "./authGate";
import type { ClientConfig } from "./config";
import type { Identity } from "./itemTypes";

type ProviderError = { message: string } | null;
type Credentials = { email: string; password: string };

/** The part of the Supabase auth client the trainer uses. */
export interface PasswordAuthApi {
  signInWithPassword(credentials: Credentials): Promise<{
    data: { user: { id: string; email?: string } | null; session: { access_token: string } | null };
    error: ProviderError;
  }>;
  signUp(credentials: Credentials): Promise<{ error: ProviderError }>;
  signOut(): Promise<{ error: ProviderError }>;
}

export type SignInResult = { ok: true; identity: Identity } | { ok: false; message: string };
export type SignUpResult = { ok: boolean; message: string };

export interface IdentityClient {
  signIn(email: string, password: string): Promise<SignInResult>;
  signUp(email: string, password: string): Promise<SignUpResult>;
  signOut(): Promise<void>;
}

function describe(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

export function createIdentityClient(auth: PasswordAuthApi): IdentityClient {
  return {
    async signIn(email, password) {
      try {
        const { data, error } = await auth.signInWithPassword({ email, password });
        if (error) return { ok: false, message: `Sign-in failed: ${error.message}` };
        if (!data.user || !data.session) return { ok: false, message: "Sign-in failed: no session was returned." };
        return {
          ok: true,
          identity: {
            id: data.user.id,
            email: normalizeEmail(data.user.email ?? email),
            accessToken: data.session.access_token,
          },
        };
      } catch (e) {
        return { ok: false, message: `Sign-in failed: ${describe(e)}` };
      }
    },

    async signUp(email, password) {
      try {
        const { error } = await auth.signUp({ email, password });
        if (error) return { ok: false, message: `Sign-up failed: ${error.message}` };
        return { ok: true, message: "Account created. Please sign in above." };
      } catch (e) {
        return { ok: false, message: `Sign-up failed: ${describe(e)}` };
      }
    },

    // The local session is reset by the caller whatever the provider says.
    async signOut() {
      try {
        const { error } = await auth.signOut();
        if (error) console.warn(`Sign-out reported an error: ${error.message}`);
      } catch (e) {
        console.warn(`Sign-out failed: ${describe(e)}`);
      }
    },
  };
}

export function createBrowserIdentityClient(config: ClientConfig): IdentityClient {
  // Progress lives only as long as the page, so the auth session does too.
  const supabase = createClient(config.supabaseUrl, config.supabaseAnonKey, { auth: { persistSession: false } });
  return createIdentityClient(supabase.auth);
}
