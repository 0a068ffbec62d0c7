import { config as dotenvConfig } from 'dotenv';

// Load .env file if present
dotenvConfig();

export interface EngineConfig {
  host: string;
  port: number;
  secret: string;
  dir: string;       // Download directory passed to the engine, empty = engine default
  timeoutMs: number;
}

export interface Config {
  port: number;
  host: string;
  dataPath: string;
  reconcileIntervalMs: number;
  maxTorrentSize: number;
  engine: EngineConfig;
}

let config: Config | null = null;

function parseIntEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function getConfig(): Config {
  if (!config) {
    config = {
      port: parseIntEnv(process.env.PORT, 8080),
      host: process.env.HOST || '0.0.0.0',
      dataPath: process.env.DATA_PATH || './data',
      reconcileIntervalMs: parseIntEnv(process.env.RECONCILE_INTERVAL_MS, 2000),
      maxTorrentSize: parseIntEnv(process.env.MAX_TORRENT_SIZE, 10 * 1024 * 1024),
      engine: {
        host: process.env.ARIA2_HOST || '127.0.0.1',
        port: parseIntEnv(process.env.ARIA2_PORT, 6800),
        secret: process.env.ARIA2_SECRET || '',
        dir: process.env.ARIA2_DIR || '',
        timeoutMs: parseIntEnv(process.env.ENGINE_TIMEOUT_MS, 5000),
      },
    };
  }
  return config;
}

export function reloadConfig(): void {
  config = null;
  getConfig();
}
