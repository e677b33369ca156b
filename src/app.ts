import express from 'express';
import { t } from './i18n';
import { log } from './log';
import { register } from './metrics';

export function createApp() {
  const app = express();

  // Liveness probe of the hosting platform
  app.get('/', (_req, res) => {
    res.status(200).send(t('health'));
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', register.contentType);
      res.end(await register.metrics());
    } catch (err) {
      log.error({ err }, 'Failed to collect metrics');
      res.status(500).end();
    }
  });

  return app;
}
