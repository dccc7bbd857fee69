import React from "react";
import ReactDOM from "react-dom/client";
import App from "./App";
import { loadClientConfig } from "./config";
import { createBrowserIdentityClient } from "./identityClient";
import "./styles.css";

const container = document.getElementById("root");
if (!container) throw new Error("Missing #root element.");
const root = ReactDOM.createRoot(container);

try {
  const identity = createBrowserIdentityClient(loadClientConfig(import.meta.env));
  root.render(
    <React.StrictMode>
      <App identity={identity} />
    </React.StrictMode>
  );
} catch (e) {
  // Refuse to run against an undefined backend.
  root.render(
    <div className="app">
      <div className="note error">{e instanceof Error ? e.message : String(e)}</div>
    </div>
  );
}
