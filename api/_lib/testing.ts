import { vi } from "vitest";
import type { ApiRequest, ApiResponse } from "./http";
import type { Logger } from "./logger";
import type { DirectoryUser, TokenVerifier, UserDirectory } from "./supabase";

export function fakeLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

export type CapturedResponse = ApiResponse & {
  headers: Record<string, string>;
  body: string;
  /** Parsed JSON body. */
  json(): unknown;
};

export function fakeResponse(): CapturedResponse {
  return {
    statusCode: 200,
    headers: {},
    body: "",
    setHeader(name, value) {
      this.headers[name.toLowerCase()] = value;
    },
    end(body) {
      this.body = body;
    },
    json() {
      return JSON.parse(this.body);
    },
  };
}

export function request(method: string, url: string, init: { token?: string; body?: unknown } = {}): ApiRequest {
  return {
    method,
    url,
    headers: init.token ? { authorization: `Bearer ${init.token}` } : {},
    body: init.body,
  };
}

/** Maps tokens to the email of their owner. */
export function fakeVerifier(tokens: Record<string, string>): TokenVerifier {
  return {
    async emailForToken(token) {
      return tokens[token] ?? null;
    },
  };
}

export function fakeDirectory(initial: DirectoryUser[] = []) {
  const users = [...initial];
  let seq = 0;
  const directory = {
    users,
    listUsers: vi.fn(async () => [...users]),
    createUser: vi.fn(async (email: string, _tempPassword: string) => {
      seq += 1;
      const id = `user-${seq}`;
      users.push({ id, email });
      return id;
    }),
    deleteUser: vi.fn(async (id: string) => {
      const i = users.findIndex((u) => u.id === id);
      if (i >= 0) users.splice(i, 1);
    }),
  } satisfies UserDirectory & { users: DirectoryUser[] };
  return directory;
}
