import { type FormEvent, useEffect, useRef, useState } from "react";
import { resolveAccess } from "./access";
import { fetchItems, fetchMe } from "./apiClient";
import { visibleTabs, type Role, type Tab } from "./authGate";
import { AdminPanel } from "./components/AdminPanel";
import { McqPlayer } from "./components/McqPlayer";
import type { IdentityClient } from "./identityClient";
import { createItemBank, EMPTY_BANK } from "./itemBank";
import type { ItemBank, QuizSession } from "./itemTypes";
import { applyFilter, createSession, signedIn, signedOut } from "./quizSession";

export const APP_TITLE = "MCQ Exam Trainer";
const COPYRIGHT = "All rights reserved.";

type BankState = { bank: ItemBank; warning: string | null; error: string | null; loading: boolean };
const NO_BANK: BankState = { bank: EMPTY_BANK, warning: null, error: null, loading: false };

export default function App({ identity }: { identity: IdentityClient }) {
  const [session, setSession] = useState<QuizSession>(createSession);
  const [role, setRole] = useState<Role>("unauthenticated");
  const [roleNotice, setRoleNotice] = useState<string | null>(null);
  const [tab, setTab] = useState<Tab>("Practice");
  const [bankState, setBankState] = useState<BankState>(NO_BANK);
  const currentUserId = useRef<string | null>(null);

  const user = session.identity;
  const tabs = visibleTabs(role);
  const activeTab = tabs.includes(tab) ? tab : "Practice";

  useEffect(() => {
    if (!user) return;
    let cancelled = false;
    setBankState({ ...NO_BANK, loading: true });

    fetchItems(user.accessToken)
      .then(({ items, warning }) => {
        if (cancelled) return;
        const bank = createItemBank(items);
        setBankState({ bank, warning: warning ?? null, error: null, loading: false });
        // Re-clamp the cursor against the freshly loaded bank.
        setSession((s) => applyFilter(s, bank, s.filter));
      })
      .catch((e: unknown) => {
        if (cancelled) return;
        setBankState({ ...NO_BANK, error: e instanceof Error ? e.message : String(e) });
      });

    return () => {
      cancelled = true;
    };
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [user?.id]);

  async function handleSignIn(email: string, password: string): Promise<string | null> {
    const res = await identity.signIn(email, password);
    if (!res.ok) return res.message;

    setSession((s) => signedIn(s, res.identity));
    currentUserId.current = res.identity.id;
    const access = await resolveAccess(res.identity, fetchMe, (who) => currentUserId.current === who.id);
    if (access) {
      setRole(access.role);
      setRoleNotice(access.notice);
    }
    return null;
  }

  async function handleSignOut() {
    currentUserId.current = null;
    await identity.signOut();
    setSession(signedOut());
    setRole("unauthenticated");
    setRoleNotice(null);
    setBankState(NO_BANK);
    setTab("Practice");
  }

  return (
    <div className="app">
      <header className="topbar">
        <div className="brand">
          <div className="title">{APP_TITLE}</div>
          <div className="subtitle">{COPYRIGHT}</div>
        </div>
        <nav className="status">
          {tabs.map((t) => (
            <button key={t} className={"btn " + (t === activeTab ? "" : "ghost")} onClick={() => setTab(t)}>{t}</button>
          ))}
        </nav>
      </header>

      {activeTab === "Practice" && (
        !user ? (
          <>
            <div className="note warn">Please sign in to start practicing.</div>
            <AuthBlock onSignIn={handleSignIn} onSignUp={(e, p) => identity.signUp(e, p)} />
          </>
        ) : (
          <>
            <ProfileBox email={user.email} onSignOut={handleSignOut} />
            {bankState.loading && <div className="card muted">Loading question bank…</div>}
            {bankState.error && <div className="note error">Could not load the question bank: {bankState.error}</div>}
            {!bankState.loading && !bankState.error && (
              <McqPlayer bank={bankState.bank} session={session} setSession={setSession} warning={bankState.warning} />
            )}
          </>
        )
      )}

      {activeTab === "My Account" && (
        !user ? (
          <>
            <div className="note">Create an account or sign in below.</div>
            <AuthBlock onSignIn={handleSignIn} onSignUp={(e, p) => identity.signUp(e, p)} />
          </>
        ) : (
          <div className="card">
            <h2>My Account</h2>
            <ProfileBox email={user.email} onSignOut={handleSignOut} />
            {roleNotice && <div className="note warn">{roleNotice}</div>}
            <p className="muted">Your progress is kept for this session only.</p>
          </div>
        )
      )}

      {activeTab === "Admin" && user && role === "administrator" && <AdminPanel token={user.accessToken} />}

      <footer className="footer muted small">{COPYRIGHT}</footer>
    </div>
  );
}

function ProfileBox({ email, onSignOut }: { email: string; onSignOut: () => Promise<void> }) {
  return (
    <div className="row">
      <span className="muted small">Signed in as <b>{email}</b></span>
      <button className="btn ghost" onClick={() => void onSignOut()}>Sign out</button>
    </div>
  );
}

function AuthBlock({
  onSignIn,
  onSignUp,
}: {
  onSignIn: (email: string, password: string) => Promise<string | null>;
  onSignUp: (email: string, password: string) => Promise<{ ok: boolean; message: string }>;
}) {
  const [signInEmail, setSignInEmail] = useState("");
  const [signInPw, setSignInPw] = useState("");
  const [signUpEmail, setSignUpEmail] = useState("");
  const [signUpPw, setSignUpPw] = useState("");
  const [signInError, setSignInError] = useState<string | null>(null);
  const [signUpResult, setSignUpResult] = useState<{ ok: boolean; message: string } | null>(null);

  async function submitSignIn(e: FormEvent) {
    e.preventDefault();
    setSignInError(await onSignIn(signInEmail, signInPw));
  }

  async function submitSignUp(e: FormEvent) {
    e.preventDefault();
    setSignUpResult(await onSignUp(signUpEmail, signUpPw));
  }

  return (
    <div className="card">
      <h3>Sign In</h3>
      <form onSubmit={(e) => void submitSignIn(e)} className="row">
        <input type="email" placeholder="Email" value={signInEmail} onChange={(e) => setSignInEmail(e.target.value)} />
        <input type="password" placeholder="Password" value={signInPw} onChange={(e) => setSignInPw(e.target.value)} />
        <button className="btn" type="submit">Sign in</button>
      </form>
      {signInError && <div className="note error">{signInError}</div>}

      <h3>Create a new account</h3>
      <form onSubmit={(e) => void submitSignUp(e)} className="row">
        <input type="email" placeholder="Email (new account)" value={signUpEmail} onChange={(e) => setSignUpEmail(e.target.value)} />
        <input type="password" placeholder="Password" value={signUpPw} onChange={(e) => setSignUpPw(e.target.value)} />
        <button className="btn ghost" type="submit">Create account</button>
      </form>
      {signUpResult && <div className={"note " + (signUpResult.ok ? "ok" : "error")}>{signUpResult.message}</div>}
    </div>
  );
}
