import type { PlayerRole } from '../types/game.js';
import type { BestTeammateRanking, ModeCount, WorstTeammateRanking } from '../types/stats.js';
import { RankingService } from './ranking.service.js';

export type RoleRecord = {
  games: number;
  wins: number;
};

export type UserStatsSummary = {
  userId: string;
  games: number;
  wins: number;
  guilds: number;
  crewmate: RoleRecord;
  imposter: RoleRecord;
  colors: ModeCount<number>[];
  names: ModeCount<string>[];
  bestTeammate: BestTeammateRanking | null;
  worstTeammate: WorstTeammateRanking | null;
};

/** Combines several rankings into the per-user card. Counts may be -1 when the store failed. */
export class StatsService {
  constructor(private readonly rankings: RankingService = new RankingService()) {}

  async getUserSummary(opts: {
    userId: string;
    guildId: string;
    leaderboardMin: number;
  }): Promise<UserStatsSummary> {
    const { userId, guildId, leaderboardMin } = opts;

    const roleRecord = async (role: PlayerRole): Promise<RoleRecord> => {
      const [games, wins] = await Promise.all([
        this.rankings.countUserMatchesAsRole(userId, role, guildId),
        this.rankings.countUserWinsAsRole(userId, role, guildId),
      ]);
      return { games, wins };
    };

    const [games, wins, guilds, crewmate, imposter, colors, names, best, worst] = await Promise.all([
      this.rankings.countUserMatches(userId, guildId),
      this.rankings.countUserWins(userId, guildId),
      this.rankings.countUserGuilds(userId),
      roleRecord('crewmate'),
      roleRecord('imposter'),
      this.rankings.colorRanking(userId, guildId),
      this.rankings.nameRanking(userId, guildId),
      this.rankings.bestTeammates(userId, guildId, 'crewmate', leaderboardMin),
      this.rankings.worstTeammates(userId, guildId, 'crewmate', leaderboardMin),
    ]);

    return {
      userId,
      games,
      wins,
      guilds,
      crewmate,
      imposter,
      colors,
      names,
      bestTeammate: best[0] ?? null,
      worstTeammate: worst[0] ?? null,
    };
  }
}
