import { z } from "zod";
import { parseServedItems } from "./itemBank";
import type { Item } from "./itemTypes";
import type { Role } from "./authGate";

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

const errorBodySchema = z.object({ error: z.string() });

async function request(path: string, init: RequestInit = {}, token?: string): Promise<unknown> {
  const headers = new Headers(init.headers);
  if (token) headers.set("Authorization", `Bearer ${token}`);
  if (init.body) headers.set("Content-Type", "application/json");

  const res = await fetch(path, { ...init, headers });
  const txt = await res.text().catch(() => "");

  let body: unknown = undefined;
  if (txt) {
    try {
      body = JSON.parse(txt);
    } catch {
      body = undefined;
    }
  }

  if (!res.ok) {
    const parsed = errorBodySchema.safeParse(body);
    throw new ApiError(res.status, parsed.success ? parsed.data.error : `Request failed (${res.status}): ${txt || res.statusText}`);
  }
  return body;
}

function decode<T>(schema: z.ZodType<T>, body: unknown, what: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) throw new Error(`Invalid ${what} response from server.`);
  return parsed.data;
}

const bankResponseSchema = z.object({ items: z.unknown(), warning: z.string().optional() });
const meSchema = z.object({ email: z.string(), role: z.enum(["unauthenticated", "trainee", "administrator"]) });
const usersSchema = z.object({ users: z.array(z.object({ id: z.string(), email: z.string() })) });
const createdSchema = z.object({ id: z.string() });

export type BankPayload = { items: Item[]; warning?: string };
export type Me = { email: string; role: Role };
export type AdminUser = { id: string; email: string };

export async function fetchItems(token: string): Promise<BankPayload> {
  const body = decode(bankResponseSchema, await request("/api/items", {}, token), "items");
  return { items: parseServedItems(body.items), warning: body.warning };
}

export async function fetchMe(token: string): Promise<Me> {
  return decode(meSchema, await request("/api/me", {}, token), "session");
}

export async function listUsers(token: string): Promise<AdminUser[]> {
  return decode(usersSchema, await request("/api/admin/users", {}, token), "user list").users;
}

export async function createUser(token: string, email: string, password: string): Promise<string> {
  const body = await request("/api/admin/users", { method: "POST", body: JSON.stringify({ email, password }) }, token);
  return decode(createdSchema, body, "create user").id;
}

export async function deleteUser(token: string, id: string): Promise<void> {
  await request(`/api/admin/users?id=${encodeURIComponent(id)}`, { method: "DELETE" }, token);
}
