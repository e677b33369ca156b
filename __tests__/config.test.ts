import path from 'path';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('requires a Telegram token', () => {
    expect(() => loadConfig({})).toThrow('Missing required env: TELEGRAM_TOKEN');
  });

  it('applies defaults', () => {
    const config = loadConfig({ TELEGRAM_TOKEN: 'test-token' });
    expect(config).toEqual({
      telegramToken: 'test-token',
      port: 8080,
      stateFile: 'data_bot.json',
      pollIntervalMs: 120000,
      pollInitialDelayMs: 10000,
      lichessUrl: 'https://lichess.org',
      lichessTimeoutMs: 10000,
      production: false,
      publicUrl: undefined,
      sentryDsn: undefined
    });
  });

  it('keeps state on the Render disk when DATA_DIR is unset', () => {
    const config = loadConfig({ TELEGRAM_TOKEN: 'test-token', RENDER_DATA_DIR: '/var/data' });
    expect(config.stateFile).toBe(path.join('/var/data', 'data_bot.json'));
  });

  it('falls back on invalid numbers', () => {
    const config = loadConfig({ TELEGRAM_TOKEN: 'test-token', PORT: 'abc', POLL_INTERVAL_MS: '-5' });
    expect(config.port).toBe(8080);
    expect(config.pollIntervalMs).toBe(120000);
  });

  it('reads the Lichess request timeout', () => {
    expect(loadConfig({ TELEGRAM_TOKEN: 'test-token', LICHESS_TIMEOUT_MS: '2500' }).lichessTimeoutMs).toBe(2500);
    expect(loadConfig({ TELEGRAM_TOKEN: 'test-token', LICHESS_TIMEOUT_MS: '0' }).lichessTimeoutMs).toBe(10000);
  });

  it('adds a scheme to the public url', () => {
    expect(loadConfig({ TELEGRAM_TOKEN: 'test-token', PUBLIC_URL: 'my-bot.example.com/' }).publicUrl)
      .toBe('https://my-bot.example.com');
    expect(loadConfig({ TELEGRAM_TOKEN: 'test-token', PUBLIC_URL: 'localhost:3000' }).publicUrl)
      .toBe('http://localhost:3000');
  });
});
