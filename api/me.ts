import { authenticate } from "./_lib/auth";
import { json, sendError, type Handler } from "./_lib/http";
import type { Logger } from "./_lib/logger";
import type { TokenVerifier } from "./_lib/supabase";

export type MeDeps = { verifier: TokenVerifier; adminEmails: ReadonlySet<string>; logger: Logger };

// GET /api/me -> { email, role } for the bearer token's owner
export function createMeHandler({ verifier, adminEmails, logger }: MeDeps): Handler {
  return async (req, res) => {
    if (req.method !== "GET") return json(res, 405, { error: "Method Not Allowed" });

    try {
      const caller = await authenticate(req, verifier, adminEmails);
      json(res, 200, caller);
    } catch (e) {
      sendError(res, e, logger);
    }
  };
}
