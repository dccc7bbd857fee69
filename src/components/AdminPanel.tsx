import { useCallback, useEffect, useState } from "react";
import { createUser, deleteUser, listUsers, type AdminUser } from "../apiClient";

type Message = { kind: "ok" | "error" | "warn"; text: string };

function describe(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

export function AdminPanel({ token }: { token: string }) {
  const [users, setUsers] = useState<AdminUser[] | null>(null);
  const [email, setEmail] = useState("");
  const [tempPassword, setTempPassword] = useState("");
  const [message, setMessage] = useState<Message | null>(null);
  const [busy, setBusy] = useState(false);

  const refresh = useCallback(async () => {
    try {
      setUsers(await listUsers(token));
    } catch (e) {
      setUsers([]);
      setMessage({ kind: "error", text: describe(e) });
    }
  }, [token]);

  useEffect(() => {
    void refresh();
  }, [refresh]);

  async function invite() {
    if (!email.trim() || !tempPassword) {
      setMessage({ kind: "warn", text: "Provide email and temporary password." });
      return;
    }
    setBusy(true);
    try {
      const id = await createUser(token, email.trim(), tempPassword);
      setMessage({ kind: "ok", text: `User created with id: ${id}` });
      setEmail("");
      setTempPassword("");
      await refresh();
    } catch (e) {
      setMessage({ kind: "error", text: describe(e) });
    } finally {
      setBusy(false);
    }
  }

  async function remove(u: AdminUser) {
    setBusy(true);
    try {
      await deleteUser(token, u.id);
      setMessage({ kind: "ok", text: `Deleted ${u.email}` });
      await refresh();
    } catch (e) {
      setMessage({ kind: "error", text: describe(e) });
    } finally {
      setBusy(false);
    }
  }

  return (
    <div className="card">
      <h2>Admin Panel</h2>
      <p className="muted small">Admin features require SUPABASE_SERVICE_ROLE_KEY on the API server and your email in ADMIN_EMAILS.</p>
      {message && <div className={"note " + message.kind}>{message.text}</div>}

      <details open>
        <summary>Invite / Create User</summary>
        <div className="row">
          <input placeholder="User email" value={email} onChange={(e) => setEmail(e.target.value)} />
          <input type="password" placeholder="Temporary password" value={tempPassword} onChange={(e) => setTempPassword(e.target.value)} />
          <button className="btn" onClick={() => void invite()} disabled={busy}>Create user</button>
        </div>
      </details>

      <details open>
        <summary>List / Delete Users</summary>
        {users === null && <div className="muted small">Loading…</div>}
        {users !== null && users.length === 0 && <div className="muted">No users or failed to load.</div>}
        {users !== null && users.length > 0 && (
          <>
            <div className="muted small">Total: {users.length}</div>
            <ul className="userList">
              {users.map((u) => (
                <li key={u.id}>
                  <b>{u.email}</b> <span className="muted small">id: <code>{u.id}</code></span>
                  <button className="btn tiny danger" onClick={() => void remove(u)} disabled={busy}>Delete {u.email}</button>
                </li>
              ))}
            </ul>
          </>
        )}
      </details>
    </div>
  );
}
