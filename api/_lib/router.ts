import type { IncomingMessage, ServerResponse } from "node:http";
import { HttpError, json, sendError, type Handler } from "./http";
import type { Logger } from "./logger";

export type Routes = Record<string, Handler>;

export const MAX_BODY_BYTES = 64 * 1024;

async function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const tooLarge = new HttpError(413, `Request body exceeds ${maxBytes} bytes.`);
  if (Number(req.headers["content-length"] ?? 0) > maxBytes) throw tooLarge;

  // Past the cap, chunks are drained but not kept.
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    size += chunk.length;
    if (size <= maxBytes) chunks.push(Buffer.from(chunk));
  }
  if (size > maxBytes) throw tooLarge;

  const text = Buffer.concat(chunks).toString("utf8");
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    throw new HttpError(400, "Request body is not valid JSON.");
  }
}

export type RouterOptions = { maxBodyBytes?: number };

/** Dispatches on the request path; query strings are left for the handler. */
export function createRouter(routes: Routes, logger: Logger, { maxBodyBytes = MAX_BODY_BYTES }: RouterOptions = {}) {
  return async (req: IncomingMessage, res: ServerResponse) => {
    const path = new URL(req.url ?? "/", "http://localhost").pathname.replace(/\/+$/, "");
    const handler = routes[path];
    if (!handler) return json(res, 404, { error: `No route for ${path || "/"}` });

    try {
      const body = await readJsonBody(req, maxBodyBytes);
      await handler({ method: req.method, url: req.url, headers: req.headers, body }, res);
    } catch (e) {
      sendError(res, e, logger);
    }
  };
}
