import { afterEach, describe, expect, it, vi } from "vitest";
import { createIdentityClient, type PasswordAuthApi } from "./identityClient";

function fakeAuth(overrides: Partial<PasswordAuthApi> = {}): PasswordAuthApi {
  return {
    signInWithPassword: vi.fn(async () => ({
      data: { user: { id: "u1", email: "Trainee@Example.com" }, session: { access_token: "test-token" } },
      error: null,
    })),
    signUp: vi.fn(async () => ({ error: null })),
    signOut: vi.fn(async () => ({ error: null })),
    ...overrides,
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("signIn", () => {
  it("returns the identity with a normalized email", async () => {
    const auth = fakeAuth();
    const res = await createIdentityClient(auth).signIn("trainee@example.com", "test-password");
    expect(res).toEqual({ ok: true, identity: { id: "u1", email: "trainee@example.com", accessToken: "test-token" } });
    expect(auth.signInWithPassword).toHaveBeenCalledWith({ email: "trainee@example.com", password: "test-password" });
  });

  it("turns a provider error into a message", async () => {
    const auth = fakeAuth({
      signInWithPassword: vi.fn(async () => ({ data: { user: null, session: null }, error: { message: "Invalid login credentials" } })),
    });
    expect(await createIdentityClient(auth).signIn("x@example.com", "wrong")).toEqual({
      ok: false,
      message: "Sign-in failed: Invalid login credentials",
    });
  });

  it("catches a thrown error", async () => {
    const auth = fakeAuth({
      signInWithPassword: vi.fn(async () => {
        throw new Error("network down");
      }),
    });
    expect(await createIdentityClient(auth).signIn("x@example.com", "pw")).toEqual({ ok: false, message: "Sign-in failed: network down" });
  });

  it("falls back to the typed email when the provider omits it", async () => {
    const auth = fakeAuth({
      signInWithPassword: vi.fn(async () => ({ data: { user: { id: "u2" }, session: { access_token: "t" } }, error: null })),
    });
    const res = await createIdentityClient(auth).signIn(" New@Example.com", "pw");
    expect(res.ok && res.identity.email).toBe("new@example.com");
  });
});

describe("signUp", () => {
  it("reports success", async () => {
    expect(await createIdentityClient(fakeAuth()).signUp("n@example.com", "pw")).toEqual({
      ok: true,
      message: "Account created. Please sign in above.",
    });
  });

  it("reports a provider error", async () => {
    const auth = fakeAuth({ signUp: vi.fn(async () => ({ error: { message: "User already registered" } })) });
    expect(await createIdentityClient(auth).signUp("n@example.com", "pw")).toEqual({
      ok: false,
      message: "Sign-up failed: User already registered",
    });
  });
});

describe("signOut", () => {
  it("warns instead of throwing when the provider fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const auth = fakeAuth({
      signOut: vi.fn(async () => {
        throw new Error("offline");
      }),
    });
    await expect(createIdentityClient(auth).signOut()).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith("Sign-out failed: offline");
  });
});
