import { describe, expect, it } from 'vitest';

import type { SqlClient, SqlRow } from '../../src/db/client.js';
import { StoreError } from '../../src/db/errors.js';
import { PgStatsRepository } from '../../src/db/stats.repository.js';

type Call = { text: string; values: readonly unknown[] };

/** Records every query and answers with canned rows. */
class FakeSqlClient implements SqlClient {
  readonly calls: Call[] = [];

  constructor(private readonly respond: (text: string) => SqlRow[] = () => []) {}

  async query<R extends SqlRow>(text: string, values: readonly unknown[]): Promise<R[]> {
    this.calls.push({ text, values });
    const rows: SqlRow[] = this.respond(text);
    // canned rows are trusted to have the shape the query selects
    return rows.filter((row): row is R => typeof row === 'object');
  }

  get last(): Call | undefined {
    return this.calls[this.calls.length - 1];
  }
}

describe('PgStatsRepository', () => {
  it('maps a game row to a match record', async () => {
    const db = new FakeSqlClient(() => [
      { game_id: '55', guild_id: '100', connect_code: 'QWERTY', start_time: 10, end_time: 70, win_type: 4 },
    ]);

    const match = await new PgStatsRepository(db).findMatch('55');

    expect(match).toEqual({
      matchId: '55',
      guildId: '100',
      connectCode: 'QWERTY',
      startTime: 10,
      endTime: 70,
      winType: 4,
    });
    expect(db.last?.values).toEqual(['55']);
    expect(db.last?.text).toContain('FROM games WHERE game_id = $1');
  });

  it('returns null for a missing match', async () => {
    expect(await new PgStatsRepository(new FakeSqlClient()).findMatch('1')).toBeNull();
  });

  it('orders match events by time and id', async () => {
    const db = new FakeSqlClient(() => [
      { event_id: '12', user_id: null, game_id: '5', event_time: 20, event_type: 2, payload: '2' },
    ]);

    const events = await new PgStatsRepository(db).listMatchEvents('5');

    expect(events).toEqual([{ eventId: 12, userId: null, matchId: '5', eventTime: 20, eventType: 2, payload: '2' }]);
    expect(db.last?.text).toContain('ORDER BY ge.event_time, ge.event_id');
  });

  it('decodes role codes on outcome rows', async () => {
    const db = new FakeSqlClient(() => [
      {
        user_id: '1',
        guild_id: '100',
        game_id: '5',
        player_name: 'Ann',
        player_color: 3,
        player_role: 1,
        player_won: true,
      },
    ]);

    const outcomes = await new PgStatsRepository(db).listMatchOutcomes('5');

    expect(outcomes).toEqual([
      { userId: '1', guildId: '100', matchId: '5', playerName: 'Ann', role: 'imposter', color: 3, won: true },
    ]);
  });

  it('builds the match count filter in parameter order', async () => {
    const db = new FakeSqlClient(() => [{ count: 7 }]);

    const n = await new PgStatsRepository(db).countMatches({ guildId: '100', finishedOnly: true, winTypes: [2, 3] });

    expect(n).toBe(7);
    expect(db.last).toEqual({
      text: 'SELECT COUNT(*)::int AS count FROM games WHERE guild_id = $1 AND end_time != -1 AND win_type = ANY($2::smallint[])',
      values: ['100', [2, 3]],
    });
  });

  it('numbers only the filters that are set', async () => {
    const db = new FakeSqlClient(() => [{ count: 2 }]);

    await new PgStatsRepository(db).countUserMatches({ userId: '1', role: 'imposter', won: false });

    expect(db.last).toEqual({
      text: 'SELECT COUNT(*)::int AS count FROM users_games WHERE user_id = $1 AND player_role = $2 AND player_won = $3',
      values: ['1', 1, false],
    });
  });

  it('filters action events by payload action code', async () => {
    const db = new FakeSqlClient();

    await new PgStatsRepository(db).listActionEvents({ guildId: '100', action: 'exiled', userId: '9' });

    expect(db.last?.values).toEqual(['100', 3, '6', '9']);
    expect(db.last?.text).toContain("WHERE lower(kv.key) = 'action' AND kv.value = $3) ELSE false END AND ge.user_id = $4");
  });

  it('scopes action events to the matches of one user', async () => {
    const db = new FakeSqlClient();

    await new PgStatsRepository(db).listActionEvents({ guildId: '100', action: 'died', sharedWithUserId: '7' });

    expect(db.last?.values).toEqual(['100', 3, '2', '7']);
    expect(db.last?.text).toContain(' AND ge.game_id IN (SELECT game_id FROM users_games WHERE user_id = $4) ORDER BY');
  });

  it('scopes fact rows to the matches of one user', async () => {
    const db = new FakeSqlClient();

    await new PgStatsRepository(db).listUserMatches({ guildId: '100', role: 'crewmate', sharedWithUserId: '7' });

    expect(db.last?.values).toEqual(['100', 0, '7']);
    expect(db.last?.text).toContain(
      'WHERE ug.guild_id = $1 AND ug.player_role = $2 AND ug.game_id IN (SELECT game_id FROM users_games WHERE user_id = $3) ORDER BY ug.game_id, ug.user_id'
    );
  });

  it('wraps query failures in StoreError', async () => {
    const cause = new Error('connection refused');
    const db: SqlClient = {
      query: () => Promise.reject(cause),
    };

    const err = await new PgStatsRepository(db).countUserGuilds('1').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StoreError);
    expect(err).toMatchObject({ message: 'countUserGuilds failed', query: 'countUserGuilds', cause });
  });

  it('rejects a count query that returns no row', async () => {
    await expect(new PgStatsRepository(new FakeSqlClient()).countUserGuilds('1')).rejects.toThrow(
      'countUserGuilds returned no count'
    );
  });
});
