import { afterEach, describe, expect, it, vi } from 'vitest';

import { RankingService } from '../../src/services/ranking.service.js';
import { StatsService } from '../../src/services/stats.service.js';
import { buildStatsEmbed } from '../../src/ui/embeds/stats.js';
import { match, outcome } from '../helpers/fixtures.js';
import { InMemoryStatsRepository } from '../helpers/in-memory-stats.repository.js';

afterEach(() => {
  vi.restoreAllMocks();
});

function repo(): InMemoryStatsRepository {
  return new InMemoryStatsRepository(
    [match({ matchId: '1' }), match({ matchId: '2' }), match({ matchId: '3', guildId: '200' })],
    [],
    [
      outcome('1', '1', { won: true, color: 2, name: 'Ann' }),
      outcome('2', '1', { won: true }),
      outcome('1', '2', { role: 'imposter', color: 3, name: 'Ann' }),
      outcome('1', '3', { guildId: '200' }),
    ]
  );
}

describe('StatsService.getUserSummary', () => {
  it('combines counts and rankings for one user', async () => {
    const summary = await new StatsService(new RankingService(repo())).getUserSummary({
      userId: '1',
      guildId: '100',
      leaderboardMin: 1,
    });

    expect(summary).toEqual({
      userId: '1',
      games: 2,
      wins: 1,
      guilds: 2,
      crewmate: { games: 1, wins: 1 },
      imposter: { games: 1, wins: 0 },
      colors: [
        { mode: 2, count: 1 },
        { mode: 3, count: 1 },
      ],
      names: [{ mode: 'Ann', count: 2 }],
      bestTeammate: { userId: '1', teammateId: '2', total: 1, wins: 1, winRate: 100 },
      worstTeammate: { userId: '1', teammateId: '2', total: 1, losses: 0, lossRate: 0 },
    });
  });

  it('reports unknown counts when the store fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failing = repo();
    failing.failing = true;

    const summary = await new StatsService(new RankingService(failing)).getUserSummary({
      userId: '1',
      guildId: '100',
      leaderboardMin: 1,
    });

    expect(summary.games).toBe(-1);
    expect(summary.crewmate).toEqual({ games: -1, wins: -1 });
    expect(summary.colors).toEqual([]);
    expect(summary.bestTeammate).toBeNull();
  });
});

describe('buildStatsEmbed', () => {
  it('renders the summary fields', async () => {
    const summary = await new StatsService(new RankingService(repo())).getUserSummary({
      userId: '1',
      guildId: '100',
      leaderboardMin: 1,
    });

    const json = buildStatsEmbed({ targetMention: '<@1>', summary }).toJSON();

    expect(json.description).toBe('Stats for <@1>');
    expect(json.fields).toEqual([
      { name: 'Games', value: '2', inline: true },
      { name: 'Wins', value: '1', inline: true },
      { name: 'Servers', value: '2', inline: true },
      { name: 'Crewmate', value: '```\nGames: 1\nWins: 1\nWin%: 100.0%\n```', inline: true },
      { name: 'Imposter', value: '```\nGames: 1\nWins: 0\nWin%: 0.0%\n```', inline: true },
      { name: 'Favorite color', value: 'Green (1)', inline: true },
      { name: 'Names', value: 'Ann (2)', inline: false },
      { name: 'Best crewmate', value: '<@2> 100.0% (1/1)', inline: true },
      { name: 'Worst crewmate', value: '<@2> 0.0% (0/1)', inline: true },
    ]);
  });
});
