import React from "react";
import ReactDOM from "react-dom/client";
import { BrowserRouter } from "react-router-dom";

import App from "./App";
import { AppProviders } from "./AppProviders";
import { loadConfig } from "./lib/config";
import { createI18n, SUPPORTED_LOCALES } from "./lib/i18n";
import { createLogger } from "./lib/logger";

import "./styles/theme.css";
import "./styles/globals.css";

// =============================================================================
// Boot
// =============================================================================

const log = createLogger("boot");

const config = loadConfig(import.meta.env, SUPPORTED_LOCALES);
const i18n = createI18n({ fallbackLocale: config.defaultLocale });

for (const w of config.warnings) log.warn(w);

const rootEl = document.getElementById("root");
if (!rootEl) throw new Error("Missing #root element in index.html");

// =============================================================================
// React bootstrap
// =============================================================================
// Creates the React root and wires up the app-level providers:
// - AppProviders: configuration + i18next instance
// - BrowserRouter: client-side routing (React Router)
// - StrictMode: extra checks/warnings in development builds
ReactDOM.createRoot(rootEl).render(
  <React.StrictMode>
    <AppProviders config={config} i18n={i18n}>
      <BrowserRouter>
        <App />
      </BrowserRouter>
    </AppProviders>
  </React.StrictMode>
);
