import 'dotenv/config';

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) throw new Error(`Missing required environment variable: ${name}`);
  return value;
}

function intEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Environment variable ${name} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

function boolEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1';
}

const certPath = process.env.SSL_CERT_PATH ?? null;
const keyPath = process.env.SSL_KEY_PATH ?? null;

export const config = {
  port: Number(process.env.PORT) || 3000,
  host: process.env.HOST ?? '0.0.0.0',
  logLevel: process.env.LOG_LEVEL ?? 'info',

  apiKey: requireEnv('API_KEY'),

  databasePath: process.env.DATABASE_PATH ?? './directory-sync.db',

  // HTTPS only when both halves of the pair are configured
  ssl: certPath && keyPath ? { certPath, keyPath } : null,

  sync: {
    intervalMinutes: intEnv('SYNC_INTERVAL_MINUTES', 30),
    autoDisable: boolEnv('SYNC_AUTO_DISABLE', true),
  },

  http: {
    connectTimeoutMs: intEnv('HTTP_CONNECT_TIMEOUT_MS', 10_000),
    requestTimeoutMs: intEnv('HTTP_REQUEST_TIMEOUT_MS', 30_000),
    maxRetries: intEnv('HTTP_MAX_RETRIES', 1),
    maxRateLimitRetries: intEnv('HTTP_MAX_RATE_LIMIT_RETRIES', 3),
    backoffMs: intEnv('HTTP_BACKOFF_MS', 1000),
  },
} as const;
