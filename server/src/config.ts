import { DEFAULT_DB_PATH } from './db.js';

export interface ServerConfig {
  port: number;
  dbPath: string;
  /** Hours the projection is drawn against when a request names none */
  targetHours: number;
}

export const DEFAULT_PORT = 8787;
export const DEFAULT_TARGET_HOURS = 80;

function positiveNumber(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.warn(`[Config] Ignoring ${name}=${raw}; using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = positiveNumber(env.PORT, 'PORT', DEFAULT_PORT);
  return {
    port: Number.isInteger(port) ? port : DEFAULT_PORT,
    dbPath: env.LEDGER_DB_PATH?.trim() || DEFAULT_DB_PATH,
    targetHours: positiveNumber(env.LEDGER_TARGET_HOURS, 'LEDGER_TARGET_HOURS', DEFAULT_TARGET_HOURS),
  };
}
