export type Role = "unauthenticated" | "trainee" | "administrator";
export type Tab = "Practice" | "My Account" | "Admin";

export function normalizeEmail(email: string) {
  return email.trim().toLowerCase();
}

/** Parses a comma-separated allow-list such as `"admin1@x.com, admin2@x.com"`. */
export function parseAdminEmails(raw: string | undefined): ReadonlySet<string> {
  const emails = (raw ?? "").split(",").map(normalizeEmail).filter(Boolean);
  return new Set(emails);
}

export function resolveRole(email: string | null, adminEmails: ReadonlySet<string>): Role {
  if (email === null) return "unauthenticated";
  return adminEmails.has(normalizeEmail(email)) ? "administrator" : "trainee";
}

export function visibleTabs(role: Role): Tab[] {
  return role === "administrator" ? ["Practice", "My Account", "Admin"] : ["Practice", "My Account"];
}
