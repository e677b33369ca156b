import { NoChatRegisteredError } from '../errors';
import { GameStatusSource } from '../lichess/client';
import { log } from '../log';
import { checkFailures, notificationsSent } from '../metrics';
import { StateStore } from '../store/state';
import { withLock } from '../utils/lock';
import { CheckMode, evaluate } from './filter';

export interface MessageSender {
  send(chatId: number, text: string): Promise<void>;
}

export interface WatcherOptions {
  intervalMs: number;
  initialDelayMs: number;
}

export interface CycleReport {
  skipped: boolean;
  found: number;
  sent: number;
  failed: number;
}

/**
 * Polls every watched player on a fixed interval and relays new games to
 * the registered chat. Scheduled cycles and `checkNow` share one lock.
 */
export class GameWatcher {
  private startTimer: NodeJS.Timeout | null = null;
  private intervalTimer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly lockKey: string;

  constructor(
    private readonly store: StateStore,
    private readonly client: GameStatusSource,
    private readonly sender: MessageSender,
    private readonly options: WatcherOptions = { intervalMs: 120_000, initialDelayMs: 10_000 }
  ) {
    this.lockKey = `watch:${store.filePath}`;
  }

  start() {
    this.stop();
    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      this.tick();
      this.intervalTimer = setInterval(() => this.tick(), this.options.intervalMs);
    }, this.options.initialDelayMs);
    log.info(this.options, 'Game watcher scheduled');
  }

  stop() {
    if (this.startTimer) clearTimeout(this.startTimer);
    if (this.intervalTimer) clearInterval(this.intervalTimer);
    this.startTimer = null;
    this.intervalTimer = null;
  }

  get running() {
    return this.startTimer !== null || this.intervalTimer !== null;
  }

  runCycle(): Promise<CycleReport> {
    return withLock(this.lockKey, async () => {
      const chatId = this.store.snapshot().targetChatId;
      if (chatId === null) {
        log.warn('Skipping scheduled check: no chat registered, use /start');
        return { skipped: true, found: 0, sent: 0, failed: 0 };
      }
      log.info('Checking watched players');
      return this.checkAll(chatId, 'scheduled');
    });
  }

  /**
   * On-demand check. Reports every active game again, even ones already
   * notified, and leaves the dedup set untouched.
   */
  checkNow(): Promise<CycleReport> {
    return withLock(this.lockKey, async () => {
      const chatId = this.store.snapshot().targetChatId;
      if (chatId === null) throw new NoChatRegisteredError();
      return this.checkAll(chatId, 'manual');
    });
  }

  // A slow cycle makes the next ticks drop out instead of queueing on the lock
  private tick() {
    if (this.inFlight) {
      log.warn('Previous check still running, skipping this tick');
      return;
    }
    this.inFlight = this.runCycle()
      .then(report => log.debug(report, 'Check finished'))
      .catch(err => log.error({ err }, 'Scheduled check failed'))
      .finally(() => {
        this.inFlight = null;
      });
  }

  private async checkAll(chatId: number, mode: CheckMode): Promise<CycleReport> {
    const report: CycleReport = { skipped: false, found: 0, sent: 0, failed: 0 };

    for (const player of this.store.snapshot().monitoredPlayers) {
      try {
        const current = await this.client.fetchCurrentGame(player);
        if (current.kind === 'none') continue;
        report.found++;

        // Re-read so a game marked earlier in this cycle is seen
        const decision = evaluate(current.status, this.store.snapshot(), mode);
        if (!decision.notify) {
          log.debug({ player, gameId: current.status.gameId, reason: decision.reason }, 'Notification suppressed');
          continue;
        }

        await this.sender.send(chatId, decision.message);
        notificationsSent.inc({ mode });
        report.sent++;
        if (mode === 'scheduled') await this.store.markNotified(current.status.gameId);
        log.info({ player, gameId: current.status.gameId, mode }, 'Game notification sent');
      } catch (err) {
        report.failed++;
        checkFailures.inc();
        log.error({ err, player }, 'Failed to check player');
      }
    }

    return report;
  }
}
