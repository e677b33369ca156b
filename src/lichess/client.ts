import axios from 'axios';
import { DEFAULT_LICHESS_URL } from '../config';
import { GameStatus } from '../types';
import { isRecord } from '../utils/guards';

export type CurrentGame = { kind: 'active'; status: GameStatus } | { kind: 'none' };

export interface GameStatusSource {
  fetchCurrentGame(playerId: string): Promise<CurrentGame>;
}

export interface HttpResponse {
  status: number;
  data: unknown;
}

export type HttpGet = (url: string) => Promise<HttpResponse>;

function field(value: unknown, ...keys: string[]): unknown {
  let cur = value;
  for (const key of keys) {
    if (!isRecord(cur)) return undefined;
    cur = cur[key];
  }
  return cur;
}

/**
 * Reads a `current-game` payload. Returns `null` when the payload has no
 * game id or no opponent block, which Lichess sends for games being set up.
 */
export function parseCurrentGame(playerId: string, body: unknown, baseUrl = DEFAULT_LICHESS_URL): GameStatus | null {
  const player = playerId.toLowerCase();
  const gameId = field(body, 'id');
  const opponent = field(body, 'opponent');
  if (typeof gameId !== 'string' || !gameId || opponent === undefined) return null;

  const username = field(opponent, 'username');
  const speed = field(body, 'speed');
  const white = field(body, 'players', 'white', 'user', 'name');

  return {
    playerId: player,
    gameId,
    opponent: typeof username === 'string' && username ? username : 'Unknown',
    speed: typeof speed === 'string' ? speed.toLowerCase() : '',
    color: typeof white === 'string' && white.toLowerCase() === player ? 'white' : 'black',
    url: `${baseUrl}/${gameId}`
  };
}

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface LichessClientOptions {
  timeoutMs?: number;
  get?: HttpGet;
}

export class LichessClient implements GameStatusSource {
  private readonly get: HttpGet;

  constructor(private readonly baseUrl = DEFAULT_LICHESS_URL, { timeoutMs = DEFAULT_TIMEOUT_MS, get }: LichessClientOptions = {}) {
    if (get) {
      this.get = get;
    } else {
      const http = axios.create({
        baseURL: baseUrl,
        timeout: timeoutMs,
        headers: { Accept: 'application/json' },
        // Non-200 means "not playing", not a failure
        validateStatus: () => true
      });
      this.get = url => http.get<unknown>(url);
    }
  }

  async fetchCurrentGame(playerId: string): Promise<CurrentGame> {
    const res = await this.get(`/api/user/${encodeURIComponent(playerId)}/current-game`);
    if (res.status !== 200) return { kind: 'none' };
    const status = parseCurrentGame(playerId, res.data, this.baseUrl);
    return status ? { kind: 'active', status } : { kind: 'none' };
  }
}
