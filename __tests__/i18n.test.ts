import i18n, { t } from '../src/i18n';

describe('translations', () => {
  test('are loaded from locales/ on import', () => {
    expect(t('health')).toBe('Chess watcher bot is alive!');
  });

  test('has the Portuguese texts too', () => {
    expect(i18n.hasResourceBundle('pt', 'common')).toBe(true);
    expect(t('color.white', { lng: 'pt' })).toBe('Brancas');
  });
});
