import type { Telegram } from 'telegraf';
import type { MessageSender } from '../watcher/watcher';

export class TelegramSender implements MessageSender {
  constructor(private readonly telegram: Pick<Telegram, 'sendMessage'>) {}

  async send(chatId: number, text: string): Promise<void> {
    await this.telegram.sendMessage(chatId, text, { parse_mode: 'Markdown' });
  }
}
