import { PLAYER_ROLE } from '../types/game.js';
import type { MatchRecord, RawEvent, UserOutcomeRecord } from '../types/records.js';

type Cell = string | number | boolean | null | undefined;

const NEEDS_QUOTES = /[",\r\n]/;

function cell(v: Cell): string {
  if (v == null) return '';
  const s = String(v);
  return NEEDS_QUOTES.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

// Every line, header included, ends with a trailing comma.
function toCsv<T>(header: readonly string[], items: readonly (T | null | undefined)[], row: (item: T) => Cell[]): string {
  let out = header.join(',') + ',\n';
  for (const item of items) {
    if (item == null) continue;
    out += row(item).map(cell).join(',') + ',\n';
  }
  return out;
}

export function matchesToCsv(matches: readonly (MatchRecord | null | undefined)[]): string {
  return toCsv(
    ['game_id', 'guild_id', 'connect_code', 'start_time', 'win_type', 'end_time'],
    matches,
    (m) => [m.matchId, m.guildId, m.connectCode, m.startTime, m.winType, m.endTime]
  );
}

export function eventsToCsv(events: readonly (RawEvent | null | undefined)[]): string {
  return toCsv(
    ['event_id', 'user_id', 'game_id', 'event_time', 'event_type', 'payload'],
    events,
    (e) => [e.eventId, e.userId, e.matchId, e.eventTime, e.eventType, e.payload]
  );
}

export function outcomesToCsv(outcomes: readonly (UserOutcomeRecord | null | undefined)[]): string {
  return toCsv(
    ['user_id', 'guild_id', 'game_id', 'player_name', 'player_color', 'player_role', 'player_won'],
    outcomes,
    (o) => [o.userId, o.guildId, o.matchId, o.playerName, o.color, PLAYER_ROLE[o.role], o.won]
  );
}
