import { createClient } from "@supabase/supabase-js";
import type { Config } from "./config";
import { HttpError } from "./http";

type ProviderError = { message: string } | null;
type ProviderUser = { id: string; email?: string };

/** The slice of the Supabase auth client the API relies on. */
export interface TokenAuthApi {
  getUser(jwt?: string): Promise<{ data: { user: ProviderUser | null }; error: ProviderError }>;
}

export interface AdminAuthApi {
  listUsers(): Promise<{ data: { users: ProviderUser[] }; error: ProviderError }>;
  createUser(attributes: {
    email: string;
    password: string;
    email_confirm: boolean;
    user_metadata: Record<string, unknown>;
  }): Promise<{ data: { user: ProviderUser | null }; error: ProviderError }>;
  deleteUser(id: string): Promise<{ error: ProviderError }>;
}

export type DirectoryUser = { id: string; email: string };

export interface UserDirectory {
  listUsers(): Promise<DirectoryUser[]>;
  createUser(email: string, tempPassword: string): Promise<string>;
  deleteUser(id: string): Promise<void>;
}

export interface TokenVerifier {
  /** Email of the user owning `token`, or null when the token is not valid. */
  emailForToken(token: string): Promise<string | null>;
}

const serverAuthOptions = { auth: { persistSession: false, autoRefreshToken: false } };

export function supabaseTokenVerifier(auth: TokenAuthApi): TokenVerifier {
  return {
    async emailForToken(token) {
      const { data, error } = await auth.getUser(token);
      if (error || !data.user?.email) return null;
      return data.user.email;
    },
  };
}

export function supabaseDirectory(admin: AdminAuthApi): UserDirectory {
  return {
    async listUsers() {
      const { data, error } = await admin.listUsers();
      if (error) throw new HttpError(502, `List users failed: ${error.message}`);
      return data.users.map((u) => ({ id: u.id, email: (u.email ?? "").toLowerCase() }));
    },

    // Invited users get a confirmed email and the trainee role in their metadata.
    async createUser(email, tempPassword) {
      const { data, error } = await admin.createUser({
        email,
        password: tempPassword,
        email_confirm: true,
        user_metadata: { role: "trainee" },
      });
      if (error) throw new HttpError(502, `Invite user failed: ${error.message}`);
      if (!data.user) throw new HttpError(502, "Invite user failed: provider returned no user.");
      return data.user.id;
    },

    async deleteUser(id) {
      const { error } = await admin.deleteUser(id);
      if (error) throw new HttpError(502, `Delete user failed: ${error.message}`);
    },
  };
}

export function createTokenVerifier(config: Config): TokenVerifier {
  return supabaseTokenVerifier(createClient(config.supabaseUrl, config.supabaseAnonKey, serverAuthOptions).auth);
}

/** Null when no service-role key is configured. */
export function createUserDirectory(config: Config): UserDirectory | null {
  if (!config.supabaseServiceRoleKey) return null;
  return supabaseDirectory(createClient(config.supabaseUrl, config.supabaseServiceRoleKey, serverAuthOptions).auth.admin);
}
