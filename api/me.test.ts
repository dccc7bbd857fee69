import { describe, expect, it } from "vitest";
import { parseAdminEmails } from "../src/authGate";
import { fakeLogger, fakeResponse, fakeVerifier, request } from "./_lib/testing";
import { createMeHandler } from "./me";

const handler = createMeHandler({
  verifier: fakeVerifier({ "admin-token": "Admin@X.com", "trainee-token": "trainee@x.com" }),
  adminEmails: parseAdminEmails("admin@x.com"),
  logger: fakeLogger(),
});

describe("me handler", () => {
  it("resolves an administrator case-insensitively", async () => {
    const res = fakeResponse();
    await handler(request("GET", "/api/me", { token: "admin-token" }), res);
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ email: "admin@x.com", role: "administrator" });
  });

  it("resolves a trainee", async () => {
    const res = fakeResponse();
    await handler(request("GET", "/api/me", { token: "trainee-token" }), res);
    expect(res.json()).toEqual({ email: "trainee@x.com", role: "trainee" });
  });

  it("is 401 without a token", async () => {
    const res = fakeResponse();
    await handler(request("GET", "/api/me"), res);
    expect(res.statusCode).toBe(401);
  });

  it("ignores a malformed authorization header", async () => {
    const res = fakeResponse();
    await handler({ method: "GET", url: "/api/me", headers: { authorization: "Basic abc" }, body: undefined }, res);
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: "Sign in required." });
  });
});
