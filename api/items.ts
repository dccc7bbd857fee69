import { authenticate } from "./_lib/auth";
import { json, sendError, type Handler } from "./_lib/http";
import { loadItemBank } from "./_lib/itemSource";
import type { Logger } from "./_lib/logger";
import type { TokenVerifier } from "./_lib/supabase";

export type ItemsDeps = {
  itemsPath: string;
  verifier: TokenVerifier;
  adminEmails: ReadonlySet<string>;
  logger: Logger;
};

// GET /api/items -> { items, warning? }; signed-in callers only.
export function createItemsHandler({ itemsPath, verifier, adminEmails, logger }: ItemsDeps): Handler {
  return async (req, res) => {
    if (req.method !== "GET") return json(res, 405, { error: "Method Not Allowed" });

    try {
      await authenticate(req, verifier, adminEmails);
      const { bank, warning } = await loadItemBank(itemsPath, logger);
      json(res, 200, warning ? { items: bank.items, warning } : { items: bank.items });
    } catch (e) {
      sendError(res, e, logger);
    }
  };
}
