/**
 * Lightweight leveled logger.
 *
 * Reads `LOG_LEVEL` from the environment (after the CLI has loaded the
 * config directory's .env file) and gates output accordingly.  Supports the
 * standard levels: error, warn, info, debug.
 *
 * Usage:
 *   import { createLogger } from '../shared/logger.js';
 *   const log = createLogger('token-store');
 *   log.info('Token refreshed');   // [2026-02-21 12:00:00] [INFO]  [token-store] Token refreshed
 *   log.debug('Payload', data);    // only shown when LOG_LEVEL=debug
 *
 * Every level is written to stderr.  When the proxy runs, stdout carries the
 * MCP stdio transport and must contain nothing but JSON-RPC frames.  Level
 * tags are coloured only when stderr is a terminal and NO_COLOR is unset.
 */

// ── Log levels (lower = more severe) ────────────────────────────────────

const LEVELS = { error: 0, warn: 1, info: 2, debug: 3 } as const;
type LevelName = keyof typeof LEVELS;

// ANSI colour codes for each level
const COLORS: Record<LevelName, string> = {
  error: '\x1b[31m', // red
  warn: '\x1b[33m', // yellow
  info: '\x1b[32m', // green
  debug: '\x1b[34m', // blue
};
const RESET = '\x1b[0m';

function isLevelName(value: string): value is LevelName {
  return value in LEVELS;
}

// ── Resolve effective settings lazily ───────────────────────────────────

let resolvedThreshold: number | null = null;
let resolvedColor: boolean | null = null;

function threshold(): number {
  if (resolvedThreshold === null) {
    const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
    resolvedThreshold = isLevelName(env) ? LEVELS[env] : LEVELS.info;
  }
  return resolvedThreshold;
}

// MCP clients usually pipe the proxy's stderr into a log file
function useColor(): boolean {
  if (resolvedColor === null) {
    resolvedColor = !process.env.NO_COLOR && process.stderr.isTTY === true;
  }
  return resolvedColor;
}

/** Forget cached settings so the next log line re-reads `LOG_LEVEL` and `NO_COLOR`. */
export function resetLogLevel(): void {
  resolvedThreshold = null;
  resolvedColor = null;
}

// ── Formatting ──────────────────────────────────────────────────────────

function timestamp(): string {
  const d = new Date();
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

function formatMessage(level: LevelName, mod: string, msg: string): string {
  const tag = level.toUpperCase().padEnd(5);
  const label = useColor() ? `${COLORS[level]}${tag}${RESET}` : tag;
  return `[${timestamp()}] [${label}] [${mod}] ${msg}`;
}

/** Shorten a bearer token or key to a prefix that is safe to print. */
export function redact(secret: string, visible = 6): string {
  if (secret.length <= visible) return '***';
  return `${secret.slice(0, visible)}…`;
}

// ── Logger interface ────────────────────────────────────────────────────

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Create a child logger with a fixed module label.
 *
 * @param module - Short identifier for the module (e.g., 'flow', 'proxy', 'relay').
 */
export function createLogger(module: string): Logger {
  const emit = (level: LevelName, message: string, args: unknown[]) => {
    if (LEVELS[level] > threshold()) return;
    console.error(formatMessage(level, module, message), ...args);
  };

  return {
    error: (message: string, ...args: unknown[]) => emit('error', message, args),
    warn: (message: string, ...args: unknown[]) => emit('warn', message, args),
    info: (message: string, ...args: unknown[]) => emit('info', message, args),
    debug: (message: string, ...args: unknown[]) => emit('debug', message, args),
  };
}
