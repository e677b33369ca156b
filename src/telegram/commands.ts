import type { Telegraf } from 'telegraf';
import { NoChatRegisteredError } from '../errors';
import { t } from '../i18n';
import { log } from '../log';
import { isRecord } from '../utils/guards';
import type { StateStore } from '../store/state';
import { capitalize } from '../utils/markdown';
import type { GameWatcher } from '../watcher/watcher';

// The slice of a Telegraf command context the handlers use
export interface CommandContext {
  chat?: { id: number };
  args: string[];
  reply(text: string, extra?: { parse_mode?: 'Markdown' }): Promise<unknown>;
}

export interface CommandDeps {
  store: StateStore;
  watcher: Pick<GameWatcher, 'checkNow'>;
}

type Handler = (ctx: CommandContext, deps: CommandDeps) => Promise<void>;

const SHOW_WORDS = ['show', 'ver'];
const CLEAR_WORDS = ['all', 'todos'];

export async function handleStart(ctx: CommandContext, { store }: CommandDeps) {
  if (!ctx.chat) return;
  const chatId = ctx.chat.id;
  await store.setChat(chatId);
  await ctx.reply(t('welcome'));
  log.info({ chatId }, 'Notifications chat registered');
}

export async function handleHelp(ctx: CommandContext) {
  await ctx.reply(t('help'), { parse_mode: 'Markdown' });
}

export async function handleCheck(ctx: CommandContext, { watcher }: CommandDeps) {
  await ctx.reply(t('checking'));
  try {
    const report = await watcher.checkNow();
    if (report.found === 0) await ctx.reply(t('nobodyPlaying'));
  } catch (err) {
    if (!(err instanceof NoChatRegisteredError)) throw err;
    await ctx.reply(t('needStart'));
  }
}

export async function handleList(ctx: CommandContext, { store }: CommandDeps) {
  const players = store.snapshot().monitoredPlayers;
  if (players.length === 0) {
    await ctx.reply(t('listEmpty'));
    return;
  }
  const lines = players.map(p => `- \`${p}\``).join('\n');
  await ctx.reply(`${t('listHeader')}\n${lines}`, { parse_mode: 'Markdown' });
}

export async function handleAdd(ctx: CommandContext, { store }: CommandDeps) {
  const [username] = ctx.args;
  if (!username) {
    await ctx.reply(t('addUsage'));
    return;
  }
  const result = await store.addPlayer(username);
  const player = capitalize(username.trim());
  await ctx.reply(t(result === 'added' ? 'playerAdded' : 'playerExists', { player }));
}

export async function handleRemove(ctx: CommandContext, { store }: CommandDeps) {
  const [username] = ctx.args;
  if (!username) {
    await ctx.reply(t('removeUsage'));
    return;
  }
  const result = await store.removePlayer(username);
  const player = capitalize(username.trim());
  await ctx.reply(t(result === 'removed' ? 'playerRemoved' : 'playerNotFound', { player }));
}

export async function handleSpeed(ctx: CommandContext, { store }: CommandDeps) {
  if (ctx.args.length === 0) {
    await ctx.reply(t('speedUsage'));
    return;
  }

  const first = ctx.args[0].toLowerCase();
  if (SHOW_WORDS.includes(first)) {
    const speeds = [...store.snapshot().allowedSpeeds];
    await ctx.reply(speeds.length ? t('speedCurrent', { speeds: speeds.join(', ') }) : t('speedNone'));
    return;
  }
  if (CLEAR_WORDS.includes(first)) {
    await store.clearSpeedFilter();
    await ctx.reply(t('speedCleared'));
    return;
  }

  const updated = await store.setSpeedFilter(ctx.args);
  await ctx.reply(updated ? t('speedUpdated', { speeds: updated.join(', ') }) : t('speedInvalid'));
}

/** True for a message that starts with a bot command, such as `/add alice`. */
export function isCommandUpdate(update: unknown): boolean {
  if (!isRecord(update) || !isRecord(update.message)) return false;
  const entities = update.message.entities;
  if (!Array.isArray(entities)) return false;
  const first: unknown = entities[0];
  return isRecord(first) && first.type === 'bot_command' && first.offset === 0;
}

// English names first, then the aliases of the original Portuguese bot
export const COMMANDS: ReadonlyArray<[string[], Handler]> = [
  [['start'], handleStart],
  [['help', 'ajuda'], handleHelp],
  [['check', 'verificar'], handleCheck],
  [['list', 'listar_gms', 'listargms'], handleList],
  [['add', 'adicionargm', 'adicionar_gm'], handleAdd],
  [['remove', 'removergm', 'remover_gm'], handleRemove],
  [['speed', 'filtroritmo', 'filtro_ritmo'], handleSpeed]
];

export function registerCommands(bot: Pick<Telegraf, 'command'>, deps: CommandDeps) {
  for (const [names, handler] of COMMANDS) {
    bot.command(names, ctx => handler(ctx, deps));
  }
}
