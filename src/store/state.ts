import { promises as fs } from 'node:fs';
import path from 'node:path';
import { StateFileError } from '../errors';
import { log } from '../log';
import { withLock } from '../utils/lock';
import { isSpeed, PersistedState, Speed, WatchConfig } from '../types';
import { isRecord } from '../utils/guards';

export const DEFAULT_PLAYERS = ['magnuscarlsen', 'hikaru'];

export type AddPlayerResult = 'added' | 'exists';
export type RemovePlayerResult = 'removed' | 'not_found';

interface MutableState {
  monitoredPlayers: string[];
  allowedSpeeds: Speed[];
  notifiedGameIds: Set<string>;
  targetChatId: number | null;
}

const normalizePlayer = (id: string) => id.trim().toLowerCase();

function defaults(): MutableState {
  return {
    monitoredPlayers: [...DEFAULT_PLAYERS],
    allowedSpeeds: [],
    notifiedGameIds: new Set(),
    targetChatId: null
  };
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function stringList(filePath: string, raw: Record<string, unknown>, field: keyof PersistedState): string[] {
  const value = raw[field];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new StateFileError(filePath, `"${field}" must be an array of strings`);
  }
  return value;
}

function decode(filePath: string, text: string): MutableState {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StateFileError(filePath, 'invalid JSON', { cause: err });
  }
  if (!isRecord(raw)) {
    throw new StateFileError(filePath, 'expected a JSON object');
  }
  const speeds = stringList(filePath, raw, 'ritmos_permitidos');
  const allowedSpeeds = speeds.filter(isSpeed);
  if (allowedSpeeds.length !== speeds.length) {
    throw new StateFileError(filePath, `unknown speed in "ritmos_permitidos": ${speeds.join(', ')}`);
  }

  const chatId = raw.chat_id ?? null;
  let targetChatId: number | null = null;
  if (typeof chatId === 'number' && Number.isInteger(chatId)) {
    targetChatId = chatId;
  } else if (chatId !== null) {
    throw new StateFileError(filePath, '"chat_id" must be an integer or null');
  }

  return {
    monitoredPlayers: stringList(filePath, raw, 'gms_a_monitorar'),
    allowedSpeeds,
    notifiedGameIds: new Set(stringList(filePath, raw, 'partidas_notificadas')),
    targetChatId
  };
}

function encode(state: MutableState): PersistedState {
  return {
    gms_a_monitorar: [...state.monitoredPlayers],
    partidas_notificadas: [...state.notifiedGameIds],
    ritmos_permitidos: [...state.allowedSpeeds],
    chat_id: state.targetChatId
  };
}

/**
 * Owns the watcher configuration and its JSON file. Every mutation runs
 * under a per-file lock and ends with a full rewrite of the file.
 */
export class StateStore {
  private state: MutableState = defaults();
  private readonly lockKey: string;

  constructor(readonly filePath: string) {
    this.lockKey = `state:${path.resolve(filePath)}`;
  }

  static async open(filePath: string): Promise<StateStore> {
    const store = new StateStore(filePath);
    await store.load();
    return store;
  }

  /** Loads the file, creating it with defaults when absent. Throws `StateFileError` when corrupt. */
  load(): Promise<void> {
    return withLock(this.lockKey, async () => {
      let text: string;
      try {
        text = await fs.readFile(this.filePath, 'utf8');
      } catch (err) {
        if (!isMissing(err)) throw err;
        this.state = defaults();
        await this.write();
        log.info({ file: this.filePath }, 'No state file found, created one with defaults');
        return;
      }
      this.state = decode(this.filePath, text);
      log.info({ file: this.filePath, players: this.state.monitoredPlayers.length }, 'State loaded');
    });
  }

  persist(): Promise<void> {
    return withLock(this.lockKey, () => this.write());
  }

  snapshot(): WatchConfig {
    return {
      monitoredPlayers: [...this.state.monitoredPlayers],
      allowedSpeeds: new Set(this.state.allowedSpeeds),
      notifiedGameIds: new Set(this.state.notifiedGameIds),
      targetChatId: this.state.targetChatId
    };
  }

  addPlayer(id: string): Promise<AddPlayerResult> {
    const player = normalizePlayer(id);
    return this.mutate<AddPlayerResult>(state => {
      if (state.monitoredPlayers.includes(player)) return { result: 'exists', changed: false };
      state.monitoredPlayers.push(player);
      return { result: 'added', changed: true };
    });
  }

  removePlayer(id: string): Promise<RemovePlayerResult> {
    const player = normalizePlayer(id);
    return this.mutate<RemovePlayerResult>(state => {
      const index = state.monitoredPlayers.indexOf(player);
      if (index === -1) return { result: 'not_found', changed: false };
      state.monitoredPlayers.splice(index, 1);
      return { result: 'removed', changed: true };
    });
  }

  /**
   * Replaces the speed filter with the valid speeds found in `speeds`.
   * Resolves to the new filter, or `null` (store untouched) when none is valid.
   */
  setSpeedFilter(speeds: readonly string[]): Promise<Speed[] | null> {
    const valid = [...new Set(speeds.map(s => s.trim().toLowerCase()).filter(isSpeed))];
    return this.mutate<Speed[] | null>(state => {
      if (valid.length === 0) return { result: null, changed: false };
      state.allowedSpeeds = valid;
      return { result: [...valid], changed: true };
    });
  }

  clearSpeedFilter(): Promise<void> {
    return this.mutate<void>(state => {
      state.allowedSpeeds = [];
      return { result: undefined, changed: true };
    });
  }

  setChat(chatId: number): Promise<void> {
    return this.mutate<void>(state => {
      state.targetChatId = chatId;
      return { result: undefined, changed: true };
    });
  }

  markNotified(gameId: string): Promise<void> {
    return this.mutate<void>(state => {
      state.notifiedGameIds.add(gameId);
      return { result: undefined, changed: true };
    });
  }

  private mutate<T>(apply: (state: MutableState) => { result: T; changed: boolean }): Promise<T> {
    return withLock(this.lockKey, async () => {
      const { result, changed } = apply(this.state);
      if (changed) await this.write();
      return result;
    });
  }

  // Write-then-rename so a crash mid-write leaves the previous file in place
  private async write(): Promise<void> {
    const tmp = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(encode(this.state), null, 2) + '\n', 'utf8');
      await fs.rename(tmp, this.filePath);
    } catch (err) {
      log.error({ err, file: this.filePath }, 'Failed to save state');
      throw err;
    }
    log.debug({ file: this.filePath }, 'State saved');
  }
}
