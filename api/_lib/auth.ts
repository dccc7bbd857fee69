import { normalizeEmail, resolveRole, type Role } from "../../src/authGate";
import { bearerToken, HttpError, type ApiRequest } from "./http";
import type { TokenVerifier } from "./supabase";

export type Caller = { email: string; role: Role };

export async function authenticate(req: ApiRequest, verifier: TokenVerifier, adminEmails: ReadonlySet<string>): Promise<Caller> {
  const token = bearerToken(req);
  if (!token) throw new HttpError(401, "Sign in required.");

  const email = await verifier.emailForToken(token);
  if (!email) throw new HttpError(401, "Invalid or expired session.");

  const normalized = normalizeEmail(email);
  return { email: normalized, role: resolveRole(normalized, adminEmails) };
}

export async function requireAdmin(req: ApiRequest, verifier: TokenVerifier, adminEmails: ReadonlySet<string>): Promise<Caller> {
  const caller = await authenticate(req, verifier, adminEmails);
  if (caller.role !== "administrator") throw new HttpError(403, "Administrator access required.");
  return caller;
}
