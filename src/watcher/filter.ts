import { t } from '../i18n';
import { GameStatus, isSpeed, WatchConfig } from '../types';
import { capitalize, escapeMarkdown } from '../utils/markdown';

export type CheckMode = 'scheduled' | 'manual';

export type Decision =
  | { notify: true; message: string }
  | { notify: false; reason: 'speed' | 'duplicate' };

export function speedAllowed(speed: string, config: Pick<WatchConfig, 'allowedSpeeds'>): boolean {
  if (config.allowedSpeeds.size === 0) return true;
  return isSpeed(speed) && config.allowedSpeeds.has(speed);
}

export function formatNotification(status: GameStatus, mode: CheckMode = 'scheduled'): string {
  return t(mode === 'manual' ? 'notify.manual' : 'notify.auto', {
    player: escapeMarkdown(capitalize(status.playerId)),
    opponent: escapeMarkdown(status.opponent),
    speed: status.speed ? capitalize(status.speed) : t('unknown'),
    color: t(`color.${status.color}`),
    url: status.url
  });
}

/**
 * Decides whether a detected game produces a notification. Speed filter
 * first, then the dedup set, which manual checks skip.
 */
export function evaluate(status: GameStatus, config: WatchConfig, mode: CheckMode = 'scheduled'): Decision {
  if (!speedAllowed(status.speed, config)) return { notify: false, reason: 'speed' };
  if (mode === 'scheduled' && config.notifiedGameIds.has(status.gameId)) {
    return { notify: false, reason: 'duplicate' };
  }
  return { notify: true, message: formatNotification(status, mode) };
}
