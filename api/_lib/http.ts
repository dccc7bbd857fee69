import type { IncomingHttpHeaders } from "node:http";
import type { Logger } from "./logger";

export type ApiRequest = {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  /** Parsed JSON body, or undefined when the request had none. */
  body: unknown;
};

export interface ApiResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body: string): unknown;
}

export type Handler = (req: ApiRequest, res: ApiResponse) => Promise<void>;

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export function json(res: ApiResponse, status: number, body: unknown) {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

export function bearerToken(req: ApiRequest): string | null {
  const header = req.headers.authorization;
  if (typeof header !== "string") return null;
  const m = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return m ? m[1] : null;
}

export function queryParam(req: ApiRequest, name: string): string | null {
  return new URL(req.url ?? "/", "http://localhost").searchParams.get(name);
}

export function sendError(res: ApiResponse, e: unknown, logger: Logger) {
  if (e instanceof HttpError) return json(res, e.status, { error: e.message });
  logger.error("Unhandled API error", e);
  json(res, 500, { error: e instanceof Error ? e.message : String(e) });
}
