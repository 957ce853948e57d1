import { EVENT_KIND, GAME_PHASE, PLAYER_ACTION, type PlayerActionName, type PlayerRole } from '../../src/types/game.js';
import type { MatchRecord, RawEvent, UserOutcomeRecord } from '../../src/types/records.js';

let nextEventId = 1;

export function match(overrides: Partial<MatchRecord> = {}): MatchRecord {
  return {
    matchId: '1',
    guildId: '100',
    connectCode: 'ABCDEF',
    startTime: 1000,
    endTime: 1100,
    winType: 1,
    ...overrides,
  };
}

export function phaseEvent(phase: 'tasks' | 'discuss' | 'lobby', eventTime: number, matchId = '1'): RawEvent {
  return {
    eventId: nextEventId++,
    userId: null,
    matchId,
    eventTime,
    eventType: EVENT_KIND.state,
    payload: String(GAME_PHASE[phase]),
  };
}

export function actionPayload(action: PlayerActionName, name: string): string {
  return JSON.stringify({ Action: PLAYER_ACTION[action], Name: name, Color: 0, IsDead: false, Disconnected: false });
}

export function actionEvent(
  action: PlayerActionName,
  name: string,
  eventTime: number,
  opts: { matchId?: string; userId?: string | null } = {}
): RawEvent {
  return {
    eventId: nextEventId++,
    userId: opts.userId ?? null,
    matchId: opts.matchId ?? '1',
    eventTime,
    eventType: EVENT_KIND.player,
    payload: actionPayload(action, name),
  };
}

export function outcome(
  userId: string,
  matchId: string,
  opts: { role?: PlayerRole; won?: boolean; name?: string; color?: number; guildId?: string } = {}
): UserOutcomeRecord {
  return {
    userId,
    guildId: opts.guildId ?? '100',
    matchId,
    playerName: opts.name ?? `player${userId}`,
    role: opts.role ?? 'crewmate',
    color: opts.color ?? 0,
    won: opts.won ?? false,
  };
}
