import { z } from "zod";
import { requireAdmin } from "../_lib/auth";
import { HttpError, json, queryParam, sendError, type Handler } from "../_lib/http";
import type { Logger } from "../_lib/logger";
import type { TokenVerifier, UserDirectory } from "../_lib/supabase";

export type AdminUsersDeps = {
  /** Null when the service-role key is not configured. */
  directory: UserDirectory | null;
  verifier: TokenVerifier;
  adminEmails: ReadonlySet<string>;
  logger: Logger;
};

const inviteSchema = z.object({
  email: z.string().trim().min(1),
  password: z.string().min(1),
});

const ALLOWED = new Set(["GET", "POST", "DELETE"]);

/**
 * /api/admin/users
 *   GET            -> { users: { id, email }[] }
 *   POST           { email, password } -> 201 { id }
 *   DELETE ?id=... -> { deleted }
 */
export function createAdminUsersHandler({ directory, verifier, adminEmails, logger }: AdminUsersDeps): Handler {
  return async (req, res) => {
    if (!req.method || !ALLOWED.has(req.method)) return json(res, 405, { error: "Method Not Allowed" });

    try {
      const caller = await requireAdmin(req, verifier, adminEmails);
      if (!directory) throw new HttpError(503, "Admin functions require SUPABASE_SERVICE_ROLE_KEY.");

      if (req.method === "GET") {
        const users = await directory.listUsers();
        return json(res, 200, { users });
      }

      if (req.method === "POST") {
        const parsed = inviteSchema.safeParse(req.body);
        if (!parsed.success) throw new HttpError(400, "Provide email and temporary password.");
        const id = await directory.createUser(parsed.data.email, parsed.data.password);
        logger.info("User created", { id, by: caller.email });
        return json(res, 201, { id });
      }

      const id = queryParam(req, "id");
      if (!id) throw new HttpError(400, "Missing user id.");
      await directory.deleteUser(id);
      logger.info("User deleted", { id, by: caller.email });
      json(res, 200, { deleted: id });
    } catch (e) {
      if (e instanceof HttpError && e.status === 502) logger.error("Identity provider call failed", e);
      sendError(res, e, logger);
    }
  };
}
