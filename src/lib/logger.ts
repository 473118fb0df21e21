/**
 * Console logger.
 * - debug/info only outside production builds
 * - warn/error always, with timestamps
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const isDev = import.meta.env.MODE !== "production";

function fmt(level: LogLevel, msg: unknown, args: unknown[]): unknown[] {
  const ts = new Date().toISOString();
  return [`[${ts}] [${level.toUpperCase()}]`, msg, ...args];
}

export const logger = {
  debug: (msg: unknown, ...args: unknown[]) => {
    if (isDev) console.debug(...fmt("debug", msg, args));
  },
  info: (msg: unknown, ...args: unknown[]) => {
    if (isDev) console.info(...fmt("info", msg, args));
  },
  warn: (msg: unknown, ...args: unknown[]) => console.warn(...fmt("warn", msg, args)),
  error: (msg: unknown, ...args: unknown[]) => console.error(...fmt("error", msg, args)),
};
