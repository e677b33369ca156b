export const SPEEDS = ['bullet', 'blitz', 'rapid', 'classical'] as const;
export type Speed = (typeof SPEEDS)[number];

export function isSpeed(value: string): value is Speed {
  return SPEEDS.some(s => s === value);
}

export type PieceColor = 'white' | 'black';

// One live game of a monitored player, as reported by the chess server
export interface GameStatus {
  playerId: string;      // normalized (lower-case) monitored player
  gameId: string;
  opponent: string;
  speed: string;         // lower-cased; may be outside SPEEDS or empty
  color: PieceColor;
  url: string;
}

// Read-only view of the watcher configuration
export interface WatchConfig {
  monitoredPlayers: readonly string[];
  allowedSpeeds: ReadonlySet<Speed>;   // empty = no filter
  notifiedGameIds: ReadonlySet<string>;
  targetChatId: number | null;
}

// On-disk layout of data_bot.json
export interface PersistedState {
  gms_a_monitorar: string[];
  partidas_notificadas: string[];
  ritmos_permitidos: string[];
  chat_id: number | null;
}
