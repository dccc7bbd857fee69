import { createServer } from "node:http";
import { createAdminUsersHandler } from "./admin/users";
import { loadConfig } from "./_lib/config";
import { createLogger } from "./_lib/logger";
import { createRouter } from "./_lib/router";
import { createTokenVerifier, createUserDirectory } from "./_lib/supabase";
import { createItemsHandler } from "./items";
import { createMeHandler } from "./me";

// Throws on missing Supabase credentials: the API does not start without a backend.
const config = loadConfig();
const logger = createLogger("api", config.logLevel);

const verifier = createTokenVerifier(config);
const directory = createUserDirectory(config);
if (!directory) logger.warn("SUPABASE_SERVICE_ROLE_KEY is not set; admin operations are disabled.");

const router = createRouter(
  {
    "/api/items": createItemsHandler({ itemsPath: config.itemsPath, verifier, adminEmails: config.adminEmails, logger }),
    "/api/me": createMeHandler({ verifier, adminEmails: config.adminEmails, logger }),
    "/api/admin/users": createAdminUsersHandler({ directory, verifier, adminEmails: config.adminEmails, logger }),
  },
  logger
);

const server = createServer((req, res) => {
  router(req, res).catch((e: unknown) => logger.error("Request failed", e));
});

server.listen(config.port, () => {
  logger.info(`API listening on http://localhost:${config.port}`, { items: config.itemsPath, admins: config.adminEmails.size });
});
