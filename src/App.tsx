import { Route, Routes } from "react-router-dom";

import { AppShell } from "./components/ui";
import Editor from "./pages/Editor";
import Settings from "./pages/Settings";

// =============================================================================
// App routes
// =============================================================================
// Defines the client-side routes and wraps every page with the shared layout
// (navigation, header, spacing, etc.) via <AppShell />.
export default function App() {
  return (
    <AppShell>
      <Routes>
        {/* Responsive toolbar demo */}
        <Route path="/" element={<Editor />} />

        {/* Locale + breakpoint/viewport details */}
        <Route path="/settings" element={<Settings />} />
      </Routes>
    </AppShell>
  );
}
