import { BIG_TECH, GROUP_LABELS, TRADITIONAL } from "../config";

const GROUPS = [
  { label: GROUP_LABELS.primary, symbols: BIG_TECH },
  { label: GROUP_LABELS.secondary, symbols: TRADITIONAL },
];

/** Toggle chips for the stock comparison; selection order is preserved. */
export function SymbolPicker({
  selected,
  onChange,
}: {
  selected: string[];
  onChange: (next: string[]) => void;
}) {
  function toggle(symbol: string) {
    onChange(selected.includes(symbol) ? selected.filter((s) => s !== symbol) : [...selected, symbol]);
  }

  return (
    <div className="symbol-picker" role="group" aria-label="Select companies to compare">
      {GROUPS.map((group) => (
        <div key={group.label} className="symbol-picker-group">
          <span className="nav-section-label">{group.label}</span>
          {group.symbols.map((symbol) => (
            <button
              key={symbol}
              type="button"
              className={`chip${selected.includes(symbol) ? " active" : ""}`}
              aria-pressed={selected.includes(symbol)}
              onClick={() => toggle(symbol)}
            >
              {symbol}
            </button>
          ))}
        </div>
      ))}
    </div>
  );
}
