/**
 * "Fetched 3m ago" stamp for the cached table.
 */
import { useEffect, useState } from "react";

export function formatAge(date: Date, now: number = Date.now()): string {
  const sec = Math.floor((now - date.getTime()) / 1000);
  if (sec < 60) return "< 1m ago";
  const min = Math.floor(sec / 60);
  if (min < 60) return `${min}m ago`;
  const hr = Math.floor(min / 60);
  return `${hr}h ago`;
}

export function LastRefreshed({ at, ttlMs }: { at: Date | null; ttlMs: number }) {
  const [, tick] = useState(0);

  useEffect(() => {
    if (!at) return;
    const id = window.setInterval(() => tick((n) => n + 1), 30_000);
    return () => window.clearInterval(id);
  }, [at]);

  if (!at) return null;

  return (
    <span className="last-refreshed" title={at.toLocaleTimeString()}>
      Fetched {formatAge(at)} · cached for {Math.round(ttlMs / 60_000)}m
    </span>
  );
}
