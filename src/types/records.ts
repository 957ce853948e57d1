import type { PlayerRole } from './game.js';

// Ids are int8 in the store and travel as canonical decimal strings.

export type MatchRecord = {
  matchId: string;
  guildId: string;
  connectCode: string;
  /** unix seconds */
  startTime: number;
  /** unix seconds, -1 while the match is still running */
  endTime: number;
  winType: number;
};

export type RawEvent = {
  eventId: number;
  userId: string | null;
  matchId: string;
  /** unix seconds */
  eventTime: number;
  eventType: number;
  payload: string;
};

export type UserOutcomeRecord = {
  userId: string;
  guildId: string;
  matchId: string;
  playerName: string;
  role: PlayerRole;
  color: number;
  won: boolean;
};
