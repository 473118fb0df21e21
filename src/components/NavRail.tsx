import { NavLink } from "react-router-dom";

export const TABS = [
  { to: "/market", label: "Stocks (Big Tech vs Traditional)", icon: "≡" },
  { to: "/macro", label: "FX & Rates", icon: "◎" },
  { to: "/insights", label: "Insights", icon: "✶" },
];

export function NavRail() {
  return (
    <nav className="nav-rail" aria-label="Dashboard tabs">
      {TABS.map((tab) => (
        <NavLink
          key={tab.to}
          to={tab.to}
          className={({ isActive }) => `nav-rail-item${isActive ? " active" : ""}`}
        >
          <span className="nav-rail-icon">{tab.icon}</span>
          <span className="nav-rail-label">{tab.label}</span>
        </NavLink>
      ))}
    </nav>
  );
}
