import path from 'node:path';
import i18n from 'i18next';
import Backend from 'i18next-fs-backend';
import { log } from './log';

export const LANGUAGES = ['en', 'pt'] as const;

const i18nInstance = i18n.createInstance();

// With initImmediate off the backend reads the files synchronously, so `t` works on import
i18nInstance.use(Backend).init({
  lng: process.env.BOT_LANG || 'en',
  fallbackLng: 'en',
  supportedLngs: [...LANGUAGES],
  preload: [...LANGUAGES],
  ns: ['common'],
  defaultNS: 'common',
  initImmediate: false,
  backend: { loadPath: path.join(__dirname, '..', 'locales', '{{lng}}', 'common.json') },
  interpolation: {
    escapeValue: false // Telegram Markdown is escaped by the callers
  }
}).catch(err => log.error({ err }, 'Failed to initialise translations'));

export const t = i18nInstance.t.bind(i18nInstance);
export default i18nInstance;
