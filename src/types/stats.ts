import type { WinCondition, WinningFaction } from './game.js';

export type TimelineEntryKind =
  | 'Tasks'
  | 'Discuss'
  | 'PlayerDeath'
  | 'PlayerDisconnect'
  | 'PlayerExiled';

export type TimelineEntry = {
  kind: TimelineEntryKind;
  /** seconds since match start */
  offset: number;
  /** raw action payload; empty for phase entries */
  data: string;
};

export type MatchStatistics = {
  startTime: number;
  endTime: number;
  durationSeconds: number;
  winCondition: WinCondition;
  winningFaction: WinningFaction;
  winnerNames: string[];
  loserNames: string[];
  meetings: number;
  deaths: number;
  exiles: number;
  disconnects: number;
  timeline: TimelineEntry[];
};

// ── Ranking rows

export type ModeCount<T> = {
  mode: T;
  count: number;
};

export type CoPlayerRanking = {
  userId: string;
  count: number;
  percent: number;
};

export type WinRateRanking = {
  userId: string;
  wins: number;
  total: number;
  winRate: number;
};

export type BestTeammateRanking = {
  userId: string;
  teammateId: string;
  total: number;
  wins: number;
  winRate: number;
};

export type WorstTeammateRanking = {
  userId: string;
  teammateId: string;
  total: number;
  losses: number;
  lossRate: number;
};

export type ActionWinRate = {
  userId: string;
  totalAction: number;
  total: number;
  winRate: number;
};

export type FirstTargetRanking = {
  userId: string;
  count: number;
  total: number;
  rate: number;
};

export type KilledByRanking = {
  userId: string;
  imposterId: string;
  deaths: number;
  encounters: number;
  deathRate: number;
};
