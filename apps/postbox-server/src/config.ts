import fs from "node:fs";
import path from "node:path";

export const DEFAULT_PORT = 1357;
export const DEFAULT_PORT_FILE = "myport.info";

export interface RateLimitConfig {
  maxRequests: number;
  windowMs: number;
}

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  /** SQLite file inside dataDir */
  databaseFile: string;
  maxPayloadSize: number;
  idleTimeoutMs: number;
  shutdownGraceMs: number;
  maxConnections: number;
  /** Answer every failure with 9000, as version-1 servers did */
  legacyErrors: boolean;
  rateLimit: RateLimitConfig | null;
  retentionDays: number | null;
  statusPort: number | null;
}

type Env = Record<string, string | undefined>;

function parsePort(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const port = parseInt(trimmed, 10);
  return port >= 1 && port <= 65535 ? port : null;
}

function intFromEnv(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min) {
    console.warn(`[server] Ignoring ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function optionalIntFromEnv(env: Env, name: string, min = 1): number | null {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return null;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min) {
    console.warn(`[server] Ignoring ${name}="${raw}"`);
    return null;
  }
  return value;
}

/**
 * Resolve the TCP port: PORT wins, then the port file, then the default.
 * A missing or unusable port file is not fatal.
 */
function resolvePort(env: Env): number {
  if (env.PORT !== undefined && env.PORT.trim() !== "") {
    const port = parsePort(env.PORT);
    if (port !== null) return port;
    console.warn(`[server] Ignoring PORT="${env.PORT}", using ${DEFAULT_PORT}`);
    return DEFAULT_PORT;
  }

  const portFile = env.PORT_FILE ?? DEFAULT_PORT_FILE;
  let contents: string;
  try {
    contents = fs.readFileSync(portFile, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`[server] Could not read port file ${portFile} (${reason}), using ${DEFAULT_PORT}`);
    return DEFAULT_PORT;
  }

  const port = parsePort(contents);
  if (port === null) {
    console.warn(`[server] Port file ${portFile} does not hold a valid port, using ${DEFAULT_PORT}`);
    return DEFAULT_PORT;
  }
  return port;
}

export function loadConfig(env: Env = process.env): Readonly<ServerConfig> {
  const dataDir = env.DATA_DIR ?? "./data";
  const rateLimitMax = intFromEnv(env, "RATE_LIMIT_MAX", 0);

  return Object.freeze({
    port: resolvePort(env),
    host: env.HOST ?? "0.0.0.0",
    dataDir,
    databaseFile: path.join(dataDir, "postbox.sqlite"),
    maxPayloadSize: intFromEnv(env, "MAX_PAYLOAD_SIZE", 16 * 1024 * 1024),
    idleTimeoutMs: intFromEnv(env, "IDLE_TIMEOUT_MS", 30_000, 1),
    shutdownGraceMs: intFromEnv(env, "SHUTDOWN_GRACE_MS", 5_000),
    maxConnections: intFromEnv(env, "MAX_CONNECTIONS", 100, 1),
    legacyErrors: env.LEGACY_ERRORS === "true",
    rateLimit:
      rateLimitMax > 0
        ? { maxRequests: rateLimitMax, windowMs: intFromEnv(env, "RATE_LIMIT_WINDOW_MS", 10_000, 1) }
        : null,
    retentionDays: optionalIntFromEnv(env, "MESSAGE_RETENTION_DAYS"),
    statusPort: optionalIntFromEnv(env, "STATUS_PORT", 0),
  });
}
