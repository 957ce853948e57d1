import { EVENT_KIND, PLAYER_ACTION, PLAYER_ROLE, roleFromCode, type PlayerActionName, type PlayerRole } from '../types/game.js';
import type { MatchRecord, RawEvent, UserOutcomeRecord } from '../types/records.js';
import { poolClient, type SqlClient, type SqlRow } from './client.js';
import { StoreError } from './errors.js';

export type MatchCountFilter = {
  guildId: string;
  finishedOnly?: boolean;
  winTypes?: readonly number[];
};

export type UserMatchCountFilter = {
  userId: string;
  guildId?: string;
  role?: PlayerRole;
  won?: boolean;
};

export type UserMatchListFilter = {
  guildId: string;
  userId?: string;
  role?: PlayerRole;
  /** Only matches this user took part in. */
  sharedWithUserId?: string;
};

export type ActionEventFilter = {
  guildId: string;
  action: PlayerActionName;
  userId?: string;
  /** Only matches this user took part in. */
  sharedWithUserId?: string;
};

/**
 * Read access to the match tables. Implementations throw `StoreError` when a
 * query cannot be executed or its rows cannot be read.
 */
export interface StatsRepository {
  findMatch(matchId: string): Promise<MatchRecord | null>;
  /** Ordered by event time, then insertion. */
  listMatchEvents(matchId: string): Promise<RawEvent[]>;
  listMatchOutcomes(matchId: string): Promise<UserOutcomeRecord[]>;
  countMatches(filter: MatchCountFilter): Promise<number>;
  countUserMatches(filter: UserMatchCountFilter): Promise<number>;
  countUserGuilds(userId: string): Promise<number>;
  /** Fact rows ordered by match, then user. */
  listUserMatches(filter: UserMatchListFilter): Promise<UserOutcomeRecord[]>;
  /** Player-action events of one kind in a guild's matches, ordered by event time. */
  listActionEvents(filter: ActionEventFilter): Promise<RawEvent[]>;
}

type GameRow = {
  game_id: string;
  guild_id: string;
  connect_code: string;
  start_time: number;
  end_time: number;
  win_type: number;
};

type GameEventRow = {
  event_id: number | string;
  user_id: string | null;
  game_id: string;
  event_time: number;
  event_type: number;
  payload: string;
};

type UserGameRow = {
  user_id: string;
  guild_id: string;
  game_id: string;
  player_name: string;
  player_color: number;
  player_role: number;
  player_won: boolean;
};

type CountRow = { count: number };

const EVENT_COLUMNS =
  'ge.event_id, ge.user_id::text AS user_id, ge.game_id::text AS game_id, ge.event_time, ge.event_type, ge.payload::text AS payload';

const USER_GAME_COLUMNS =
  'ug.user_id::text AS user_id, ug.guild_id::text AS guild_id, ug.game_id::text AS game_id, ug.player_name, ug.player_color, ug.player_role, ug.player_won';

// The payload's action key may come in any letter case.
function actionMatches(param: string): string {
  return (
    "CASE WHEN jsonb_typeof(ge.payload) = 'object' THEN EXISTS (" +
    `SELECT 1 FROM jsonb_each_text(ge.payload) kv WHERE lower(kv.key) = 'action' AND kv.value = ${param}` +
    ') ELSE false END'
  );
}

function toMatch(row: GameRow): MatchRecord {
  return {
    matchId: row.game_id,
    guildId: row.guild_id,
    connectCode: row.connect_code,
    startTime: row.start_time,
    endTime: row.end_time,
    winType: row.win_type,
  };
}

function toEvent(row: GameEventRow): RawEvent {
  return {
    eventId: Number(row.event_id),
    userId: row.user_id,
    matchId: row.game_id,
    eventTime: row.event_time,
    eventType: row.event_type,
    payload: row.payload,
  };
}

function toOutcome(row: UserGameRow): UserOutcomeRecord {
  return {
    userId: row.user_id,
    guildId: row.guild_id,
    matchId: row.game_id,
    playerName: row.player_name,
    role: roleFromCode(row.player_role),
    color: row.player_color,
    won: row.player_won,
  };
}

/** Collects `AND`-ed conditions with positional parameters. */
class Where {
  private readonly parts: string[] = [];
  readonly values: unknown[] = [];

  add(sql: (param: string) => string, value: unknown): this {
    this.values.push(value);
    this.parts.push(sql(`$${this.values.length}`));
    return this;
  }

  raw(sql: string): this {
    this.parts.push(sql);
    return this;
  }

  toString(): string {
    return this.parts.length > 0 ? `WHERE ${this.parts.join(' AND ')}` : '';
  }
}

export class PgStatsRepository implements StatsRepository {
  constructor(private readonly db: SqlClient = poolClient()) {}

  async findMatch(matchId: string): Promise<MatchRecord | null> {
    const rows = await this.run<GameRow>(
      'findMatch',
      'SELECT game_id::text AS game_id, guild_id::text AS guild_id, connect_code, start_time, end_time, win_type ' +
        'FROM games WHERE game_id = $1',
      [matchId]
    );
    const row = rows[0];
    return row ? toMatch(row) : null;
  }

  async listMatchEvents(matchId: string): Promise<RawEvent[]> {
    const rows = await this.run<GameEventRow>(
      'listMatchEvents',
      `SELECT ${EVENT_COLUMNS} FROM game_events ge WHERE ge.game_id = $1 ORDER BY ge.event_time, ge.event_id`,
      [matchId]
    );
    return rows.map(toEvent);
  }

  async listMatchOutcomes(matchId: string): Promise<UserOutcomeRecord[]> {
    const rows = await this.run<UserGameRow>(
      'listMatchOutcomes',
      `SELECT ${USER_GAME_COLUMNS} FROM users_games ug WHERE ug.game_id = $1`,
      [matchId]
    );
    return rows.map(toOutcome);
  }

  async countMatches(filter: MatchCountFilter): Promise<number> {
    const where = new Where().add((p) => `guild_id = ${p}`, filter.guildId);
    if (filter.finishedOnly) where.raw('end_time != -1');
    if (filter.winTypes) where.add((p) => `win_type = ANY(${p}::smallint[])`, [...filter.winTypes]);

    return this.count('countMatches', `SELECT COUNT(*)::int AS count FROM games ${where}`, where.values);
  }

  async countUserMatches(filter: UserMatchCountFilter): Promise<number> {
    const where = new Where().add((p) => `user_id = ${p}`, filter.userId);
    if (filter.guildId !== undefined) where.add((p) => `guild_id = ${p}`, filter.guildId);
    if (filter.role !== undefined) where.add((p) => `player_role = ${p}`, PLAYER_ROLE[filter.role]);
    if (filter.won !== undefined) where.add((p) => `player_won = ${p}`, filter.won);

    return this.count('countUserMatches', `SELECT COUNT(*)::int AS count FROM users_games ${where}`, where.values);
  }

  async countUserGuilds(userId: string): Promise<number> {
    return this.count(
      'countUserGuilds',
      'SELECT COUNT(DISTINCT guild_id)::int AS count FROM users_games WHERE user_id = $1',
      [userId]
    );
  }

  async listUserMatches(filter: UserMatchListFilter): Promise<UserOutcomeRecord[]> {
    const where = new Where().add((p) => `ug.guild_id = ${p}`, filter.guildId);
    if (filter.userId !== undefined) where.add((p) => `ug.user_id = ${p}`, filter.userId);
    if (filter.role !== undefined) where.add((p) => `ug.player_role = ${p}`, PLAYER_ROLE[filter.role]);
    if (filter.sharedWithUserId !== undefined) {
      where.add((p) => `ug.game_id IN (SELECT game_id FROM users_games WHERE user_id = ${p})`, filter.sharedWithUserId);
    }

    const rows = await this.run<UserGameRow>(
      'listUserMatches',
      `SELECT ${USER_GAME_COLUMNS} FROM users_games ug ${where} ORDER BY ug.game_id, ug.user_id`,
      where.values
    );
    return rows.map(toOutcome);
  }

  async listActionEvents(filter: ActionEventFilter): Promise<RawEvent[]> {
    const where = new Where()
      .add((p) => `g.guild_id = ${p}`, filter.guildId)
      .add((p) => `ge.event_type = ${p}`, EVENT_KIND.player)
      .add((p) => actionMatches(p), String(PLAYER_ACTION[filter.action]));
    if (filter.userId !== undefined) where.add((p) => `ge.user_id = ${p}`, filter.userId);
    if (filter.sharedWithUserId !== undefined) {
      where.add((p) => `ge.game_id IN (SELECT game_id FROM users_games WHERE user_id = ${p})`, filter.sharedWithUserId);
    }

    const rows = await this.run<GameEventRow>(
      'listActionEvents',
      `SELECT ${EVENT_COLUMNS} FROM game_events ge INNER JOIN games g ON g.game_id = ge.game_id ${where} ` +
        'ORDER BY ge.event_time, ge.event_id',
      where.values
    );
    return rows.map(toEvent);
  }

  private async count(name: string, text: string, values: readonly unknown[]): Promise<number> {
    const rows = await this.run<CountRow>(name, text, values);
    const n = Number(rows[0]?.count);
    if (!Number.isFinite(n)) throw new StoreError(`${name} returned no count`, name);
    return n;
  }

  private async run<R extends SqlRow>(name: string, text: string, values: readonly unknown[]): Promise<R[]> {
    try {
      return await this.db.query<R>(text, values);
    } catch (err) {
      throw new StoreError(`${name} failed`, name, { cause: err });
    }
  }
}
