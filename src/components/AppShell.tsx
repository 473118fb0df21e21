import type { ReactNode } from "react";

export function AppShell({ sidebar, children }: { sidebar: ReactNode; children: ReactNode }) {
  return (
    <div className="app-shell">
      {sidebar}
      <main className="app-main">
        <h1 className="brand">Integrated Financial Dashboard</h1>
        <p className="page-subtitle">
          <strong>Big Tech</strong>, <strong>traditional companies</strong> and <strong>macro indicators</strong>{" "}
          side by side.
        </p>
        {children}
        <footer className="app-footer">Daily closes from the Yahoo Finance chart API. Rendered with React and Recharts.</footer>
      </main>
    </div>
  );
}
