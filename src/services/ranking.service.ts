import { PgStatsRepository, type StatsRepository } from '../db/stats.repository.js';
import type { PlayerActionName, PlayerRole } from '../types/game.js';
import type { UserOutcomeRecord } from '../types/records.js';
import type {
  ActionWinRate,
  BestTeammateRanking,
  CoPlayerRanking,
  FirstTargetRanking,
  KilledByRanking,
  ModeCount,
  WinRateRanking,
  WorstTeammateRanking,
} from '../types/stats.js';
import { winCodesForFaction } from '../utils/classify-outcome.js';
import { compareIds } from '../utils/compare-ids.js';

/** Returned by the scalar counts when the store could not answer. */
export const UNKNOWN_COUNT = -1;

type PairTally = {
  userId: string;
  teammateId: string;
  total: number;
  wins: number;
};

type LogContext = Record<string, string | number | undefined>;

const rate = (part: number, total: number): number => (part / total) * 100;

function groupBy<T, K>(items: readonly T[], key: (item: T) => K): Map<K, T[]> {
  const out = new Map<K, T[]>();
  for (const item of items) {
    const k = key(item);
    const bucket = out.get(k);
    if (bucket) bucket.push(item);
    else out.set(k, [item]);
  }
  return out;
}

/** Most frequent values first; equal counts keep first-seen order. */
function modeRanking<T>(rows: readonly UserOutcomeRecord[], column: (row: UserOutcomeRecord) => T): ModeCount<T>[] {
  const counts = new Map<T, number>();
  for (const row of rows) {
    const v = column(row);
    counts.set(v, (counts.get(v) ?? 0) + 1);
  }
  return [...counts].map(([mode, count]) => ({ mode, count })).sort((a, b) => b.count - a.count);
}

function matchKey(matchId: string, userId: string): string {
  return `${matchId}:${userId}`;
}

/**
 * Shared-match tallies between same-role players. With `userId`, only that
 * user's pairs are counted; otherwise each unordered pair is counted once,
 * with the numerically larger id in `userId`.
 */
function tallyTeammates(rows: readonly UserOutcomeRecord[], userId?: string): PairTally[] {
  const tallies = new Map<string, PairTally>();

  for (const players of groupBy(rows, (r) => r.matchId).values()) {
    for (const a of players) {
      if (userId !== undefined && a.userId !== userId) continue;

      for (const b of players) {
        if (a.userId === b.userId) continue;
        if (userId === undefined && compareIds(a.userId, b.userId) < 0) continue;

        const key = `${a.userId}|${b.userId}`;
        const tally = tallies.get(key) ?? { userId: a.userId, teammateId: b.userId, total: 0, wins: 0 };
        tally.total++;
        if (a.won) tally.wins++;
        tallies.set(key, tally);
      }
    }
  }

  return [...tallies.values()];
}

function byPair(a: { userId: string; teammateId: string }, b: { userId: string; teammateId: string }): number {
  return compareIds(a.userId, b.userId) || compareIds(a.teammateId, b.teammateId);
}

function toBest(tallies: readonly PairTally[], leaderboardMin: number): BestTeammateRanking[] {
  return tallies
    .filter((t) => t.total >= leaderboardMin)
    .map((t) => ({ ...t, winRate: rate(t.wins, t.total) }))
    .sort((a, b) => b.winRate - a.winRate || b.wins - a.wins || b.total - a.total || byPair(a, b));
}

function toWorst(tallies: readonly PairTally[], leaderboardMin: number): WorstTeammateRanking[] {
  return tallies
    .filter((t) => t.total >= leaderboardMin)
    .map((t) => {
      const losses = t.total - t.wins;
      return {
        userId: t.userId,
        teammateId: t.teammateId,
        total: t.total,
        losses,
        lossRate: rate(losses, t.total),
      };
    })
    .sort((a, b) => b.lossRate - a.lossRate || b.losses - a.losses || b.total - a.total || byPair(a, b));
}

/**
 * Cross-match leaderboards for a guild. Every method is best-effort: a store
 * failure is logged and reported as `UNKNOWN_COUNT` or an empty list.
 */
export class RankingService {
  constructor(private readonly repo: StatsRepository = new PgStatsRepository()) {}

  // ── Counts

  countGuildMatches(guildId: string): Promise<number> {
    return this.scalar('countGuildMatches', { guildId }, () =>
      this.repo.countMatches({ guildId, finishedOnly: true })
    );
  }

  countGuildWinsByFaction(guildId: string, faction: PlayerRole): Promise<number> {
    return this.scalar('countGuildWinsByFaction', { guildId, faction }, () =>
      this.repo.countMatches({ guildId, winTypes: winCodesForFaction(faction) })
    );
  }

  countUserMatches(userId: string, guildId?: string): Promise<number> {
    return this.scalar('countUserMatches', { userId, guildId }, () =>
      this.repo.countUserMatches({ userId, guildId })
    );
  }

  countUserGuilds(userId: string): Promise<number> {
    return this.scalar('countUserGuilds', { userId }, () => this.repo.countUserGuilds(userId));
  }

  countUserWins(userId: string, guildId?: string): Promise<number> {
    return this.scalar('countUserWins', { userId, guildId }, () =>
      this.repo.countUserMatches({ userId, guildId, won: true })
    );
  }

  countUserMatchesAsRole(userId: string, role: PlayerRole, guildId?: string): Promise<number> {
    return this.scalar('countUserMatchesAsRole', { userId, role, guildId }, () =>
      this.repo.countUserMatches({ userId, guildId, role })
    );
  }

  countUserWinsAsRole(userId: string, role: PlayerRole, guildId?: string): Promise<number> {
    return this.scalar('countUserWinsAsRole', { userId, role, guildId }, () =>
      this.repo.countUserMatches({ userId, guildId, role, won: true })
    );
  }

  // ── Mode rankings

  colorRanking(userId: string, guildId: string): Promise<ModeCount<number>[]> {
    return this.list('colorRanking', { userId, guildId }, async () =>
      modeRanking(await this.repo.listUserMatches({ guildId, userId }), (r) => r.color)
    );
  }

  nameRanking(userId: string, guildId: string): Promise<ModeCount<string>[]> {
    return this.list('nameRanking', { userId, guildId }, async () =>
      modeRanking(await this.repo.listUserMatches({ guildId, userId }), (r) => r.playerName)
    );
  }

  matchCountRanking(guildId: string): Promise<ModeCount<string>[]> {
    return this.list('matchCountRanking', { guildId }, async () =>
      modeRanking(await this.repo.listUserMatches({ guildId }), (r) => r.userId)
    );
  }

  coPlayerRanking(userId: string, guildId: string): Promise<CoPlayerRanking[]> {
    return this.list('coPlayerRanking', { userId, guildId }, async () => {
      const rows = await this.repo.listUserMatches({ guildId, sharedWithUserId: userId });
      const byMatch = groupBy(rows, (r) => r.matchId);
      const own = rows.filter((r) => r.userId === userId);

      const counts = new Map<string, number>();
      for (const mine of own) {
        for (const other of byMatch.get(mine.matchId) ?? []) {
          if (other.userId === userId) continue;
          counts.set(other.userId, (counts.get(other.userId) ?? 0) + 1);
        }
      }

      return [...counts]
        .map(([otherId, count]) => ({ userId: otherId, count, percent: rate(count, own.length) }))
        .sort((a, b) => b.percent - a.percent);
    });
  }

  // ── Win rates

  winRateRanking(guildId: string, role?: PlayerRole): Promise<WinRateRanking[]> {
    return this.list('winRateRanking', { guildId, role }, async () => {
      const rows = await this.repo.listUserMatches({ guildId, role });
      return [...groupBy(rows, (r) => r.userId)]
        .map(([userId, games]) => {
          const wins = games.filter((g) => g.won).length;
          return { userId, wins, total: games.length, winRate: rate(wins, games.length) };
        })
        .sort((a, b) => b.winRate - a.winRate);
    });
  }

  // ── Teammates

  bestTeammates(userId: string, guildId: string, role: PlayerRole, leaderboardMin: number): Promise<BestTeammateRanking[]> {
    return this.list('bestTeammates', { userId, guildId, role }, async () =>
      toBest(
        tallyTeammates(await this.repo.listUserMatches({ guildId, role, sharedWithUserId: userId }), userId),
        leaderboardMin
      )
    );
  }

  worstTeammates(userId: string, guildId: string, role: PlayerRole, leaderboardMin: number): Promise<WorstTeammateRanking[]> {
    return this.list('worstTeammates', { userId, guildId, role }, async () =>
      toWorst(
        tallyTeammates(await this.repo.listUserMatches({ guildId, role, sharedWithUserId: userId }), userId),
        leaderboardMin
      )
    );
  }

  guildBestTeammates(guildId: string, role: PlayerRole, leaderboardMin: number): Promise<BestTeammateRanking[]> {
    return this.list('guildBestTeammates', { guildId, role }, async () =>
      toBest(tallyTeammates(await this.repo.listUserMatches({ guildId, role })), leaderboardMin)
    );
  }

  guildWorstTeammates(guildId: string, role: PlayerRole, leaderboardMin: number): Promise<WorstTeammateRanking[]> {
    return this.list('guildWorstTeammates', { guildId, role }, async () =>
      toWorst(tallyTeammates(await this.repo.listUserMatches({ guildId, role })), leaderboardMin)
    );
  }

  // ── Actions

  actionWinRate(userId: string, guildId: string, action: PlayerActionName, role: PlayerRole): Promise<ActionWinRate[]> {
    return this.list('actionWinRate', { userId, guildId, action, role }, async () => {
      const [rows, events] = await Promise.all([
        this.repo.listUserMatches({ guildId, userId, role }),
        this.repo.listActionEvents({ guildId, action, userId }),
      ]);
      if (rows.length === 0) return [];

      const matchIds = new Set(rows.map((r) => r.matchId));
      const wins = rows.filter((r) => r.won).length;
      return [
        {
          userId,
          totalAction: events.filter((e) => matchIds.has(e.matchId)).length,
          total: rows.length,
          winRate: rate(wins, rows.length),
        },
      ];
    });
  }

  userFirstTargets(
    userId: string,
    guildId: string,
    action: PlayerActionName,
    leaderboardSize: number
  ): Promise<FirstTargetRanking[]> {
    return this.list('userFirstTargets', { userId, guildId, action }, async () =>
      (await this.firstTargets(guildId, action, userId))
        .filter((r) => r.userId === userId)
        .sort((a, b) => b.count - a.count)
        .slice(0, leaderboardSize)
    );
  }

  guildFirstTargets(
    guildId: string,
    action: PlayerActionName,
    leaderboardMin: number,
    leaderboardSize: number
  ): Promise<FirstTargetRanking[]> {
    return this.list('guildFirstTargets', { guildId, action }, async () =>
      (await this.firstTargets(guildId, action))
        .filter((r) => r.total >= leaderboardMin)
        .sort((a, b) => b.rate - a.rate || b.count - a.count || compareIds(a.userId, b.userId))
        .slice(0, leaderboardSize)
    );
  }

  userKilledBy(userId: string, guildId: string): Promise<KilledByRanking[]> {
    return this.list('userKilledBy', { userId, guildId }, () => this.killedBy(guildId, userId));
  }

  guildKilledBy(guildId: string, leaderboardMin: number): Promise<KilledByRanking[]> {
    return this.list('guildKilledBy', { guildId }, async () =>
      (await this.killedBy(guildId)).filter((r) => r.encounters >= leaderboardMin)
    );
  }

  /**
   * Per user: in how many matches they were the subject of the match's first
   * `action` event, against their Crewmate match count in the guild. With
   * `userId`, only that user's matches are read.
   */
  private async firstTargets(guildId: string, action: PlayerActionName, userId?: string): Promise<FirstTargetRanking[]> {
    const [events, rows] = await Promise.all([
      this.repo.listActionEvents({ guildId, action, sharedWithUserId: userId }),
      this.repo.listUserMatches({ guildId, userId }),
    ]);

    const firstByMatch = new Map<string, string | null>();
    for (const e of events) {
      if (!firstByMatch.has(e.matchId)) firstByMatch.set(e.matchId, e.userId);
    }

    const played = new Set(rows.map((r) => matchKey(r.matchId, r.userId)));
    const crewTotals = new Map<string, number>();
    for (const r of rows) {
      if (r.role === 'crewmate') crewTotals.set(r.userId, (crewTotals.get(r.userId) ?? 0) + 1);
    }

    const counts = new Map<string, number>();
    for (const [matchId, victimId] of firstByMatch) {
      if (victimId === null || !played.has(matchKey(matchId, victimId))) continue;
      counts.set(victimId, (counts.get(victimId) ?? 0) + 1);
    }

    const out: FirstTargetRanking[] = [];
    for (const [victimId, count] of counts) {
      const total = crewTotals.get(victimId) ?? 0;
      if (total === 0) continue;
      out.push({ userId: victimId, count, total, rate: rate(count, total) });
    }
    return out;
  }

  /** How often each Crewmate died in matches shared with each Imposter. */
  private async killedBy(guildId: string, userId?: string): Promise<KilledByRanking[]> {
    const [rows, deaths] = await Promise.all([
      this.repo.listUserMatches({ guildId, sharedWithUserId: userId }),
      this.repo.listActionEvents({ guildId, action: 'died', userId }),
    ]);

    const died = new Set<string>();
    for (const e of deaths) {
      if (e.userId !== null) died.add(matchKey(e.matchId, e.userId));
    }

    const tallies = new Map<string, KilledByRanking>();
    for (const players of groupBy(rows, (r) => r.matchId).values()) {
      const imposters = players.filter((p) => p.role === 'imposter');
      for (const crew of players) {
        if (crew.role !== 'crewmate') continue;
        if (userId !== undefined && crew.userId !== userId) continue;

        const crewDied = died.has(matchKey(crew.matchId, crew.userId));
        for (const imp of imposters) {
          const key = `${crew.userId}|${imp.userId}`;
          const t = tallies.get(key) ?? { userId: crew.userId, imposterId: imp.userId, deaths: 0, encounters: 0, deathRate: 0 };
          t.encounters++;
          if (crewDied) t.deaths++;
          tallies.set(key, t);
        }
      }
    }

    return [...tallies.values()]
      .map((t) => ({ ...t, deathRate: rate(t.deaths, t.encounters) }))
      .sort(
        (a, b) =>
          b.deathRate - a.deathRate ||
          b.deaths - a.deaths ||
          b.encounters - a.encounters ||
          compareIds(a.userId, b.userId) ||
          compareIds(a.imposterId, b.imposterId)
      );
  }

  private async scalar(name: string, ctx: LogContext, run: () => Promise<number>): Promise<number> {
    try {
      return await run();
    } catch (err) {
      console.error(`${name} failed`, { err, ...ctx });
      return UNKNOWN_COUNT;
    }
  }

  private async list<T>(name: string, ctx: LogContext, run: () => Promise<T[]>): Promise<T[]> {
    try {
      return await run();
    } catch (err) {
      console.error(`${name} failed`, { err, ...ctx });
      return [];
    }
  }
}
