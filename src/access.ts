import type { Me } from "./apiClient";
import type { Role } from "./authGate";
import type { Identity } from "./itemTypes";

export type Access = { role: Role; notice: string | null };

/**
 * Looks up the role of `who`. Resolves to null when `isCurrent` reports that
 * the identity was replaced (sign-out, another sign-in) while the lookup ran.
 * Any lookup failure downgrades to trainee.
 */
export async function resolveAccess(
  who: Identity,
  lookup: (token: string) => Promise<Me>,
  isCurrent: (who: Identity) => boolean
): Promise<Access | null> {
  let access: Access;
  try {
    const me = await lookup(who.accessToken);
    access = { role: me.role, notice: null };
  } catch (e) {
    access = { role: "trainee", notice: `Could not verify account role: ${e instanceof Error ? e.message : String(e)}` };
  }
  return isCurrent(who) ? access : null;
}
