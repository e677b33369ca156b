import path from 'node:path';

export interface AppConfig {
  telegramToken: string;
  port: number;
  stateFile: string;
  pollIntervalMs: number;
  pollInitialDelayMs: number;
  lichessUrl: string;
  lichessTimeoutMs: number;
  production: boolean;
  publicUrl?: string;
  sentryDsn?: string;
}

export const STATE_FILE_NAME = 'data_bot.json';
export const DEFAULT_LICHESS_URL = 'https://lichess.org';

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

// Localhost stays on plain http to avoid certificate issues in development
function withScheme(url: string): string {
  if (/^https?:\/\//.test(url)) return url;
  const bare = url.replace(/^\/+/, '');
  return bare.startsWith('localhost') || bare.startsWith('127.0.0.1') ? `http://${bare}` : `https://${bare}`;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const telegramToken = env.TELEGRAM_TOKEN?.trim();
  if (!telegramToken) {
    throw new Error('Missing required env: TELEGRAM_TOKEN');
  }

  // Render mounts its persistent disk under RENDER_DATA_DIR
  const dataDir = env.DATA_DIR || env.RENDER_DATA_DIR || '.';

  return {
    telegramToken,
    port: intFromEnv(env.PORT, 8080),
    stateFile: path.join(dataDir, STATE_FILE_NAME),
    pollIntervalMs: intFromEnv(env.POLL_INTERVAL_MS, 120_000),
    pollInitialDelayMs: intFromEnv(env.POLL_INITIAL_DELAY_MS, 10_000),
    lichessUrl: (env.LICHESS_URL || DEFAULT_LICHESS_URL).replace(/\/+$/, ''),
    lichessTimeoutMs: intFromEnv(env.LICHESS_TIMEOUT_MS, 10_000) || 10_000,
    production: env.NODE_ENV === 'production',
    publicUrl: env.PUBLIC_URL ? withScheme(env.PUBLIC_URL).replace(/\/+$/, '') : undefined,
    sentryDsn: env.SENTRY_DSN || undefined
  };
}
