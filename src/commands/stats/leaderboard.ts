import {
  ChatInputCommandInteraction,
  SlashCommandBuilder,
} from 'discord.js';

import { config } from '../../config.js';
import { EMOJI_ERROR } from '../../config/constants.js';
import type { PlayerRole } from '../../types/game.js';
import { RankingService } from '../../services/ranking.service.js';
import { buildLeaderboardEmbed, formatRow } from '../../ui/embeds/leaderboard.js';
import { replyError } from '../../utils/reply-error.js';

const KINDS = [
  'win-rate',
  'best-teammates',
  'worst-teammates',
  'first-killed',
  'first-exiled',
  'killed-by',
  'games-played',
] as const;

export type LeaderboardKind = (typeof KINDS)[number];

const ROLES = ['crewmate', 'imposter'] satisfies readonly PlayerRole[];

const TITLES: Record<LeaderboardKind, string> = {
  'win-rate': 'Win rate',
  'best-teammates': 'Best teammates',
  'worst-teammates': 'Worst teammates',
  'first-killed': 'Most often killed first',
  'first-exiled': 'Most often exiled first',
  'killed-by': 'Most often killed by',
  'games-played': 'Games played',
};

// Kinds that take the `role` option.
const ROLE_KINDS: ReadonlySet<LeaderboardKind> = new Set<LeaderboardKind>(['win-rate', 'best-teammates', 'worst-teammates']);

export function leaderboardTitle(kind: LeaderboardKind, role: PlayerRole | undefined): string {
  return role && ROLE_KINDS.has(kind) ? `${TITLES[kind]} (${role})` : TITLES[kind];
}

function isKind(v: string): v is LeaderboardKind {
  return (KINDS as readonly string[]).includes(v);
}

function isRole(v: string): v is PlayerRole {
  return (ROLES as readonly string[]).includes(v);
}

export const data = new SlashCommandBuilder()
  .setName('leaderboard')
  .setDescription('Show a server leaderboard.')
  .setDMPermission(false)
  .addStringOption((opt) =>
    opt
      .setName('kind')
      .setDescription('Which leaderboard')
      .setRequired(true)
      .addChoices(...KINDS.map((k) => ({ name: k, value: k })))
  )
  .addStringOption((opt) =>
    opt
      .setName('role')
      .setDescription('crewmate or imposter (win rate and teammates)')
      .setRequired(false)
      .addChoices(
        { name: 'crewmate', value: 'crewmate' },
        { name: 'imposter', value: 'imposter' }
      )
  );

async function leaderboardLines(
  rankings: RankingService,
  guildId: string,
  kind: LeaderboardKind,
  role: PlayerRole | undefined
): Promise<string[]> {
  const { leaderboardMin, leaderboardSize } = config.stats;
  const top = <T>(rows: T[], fmt: (row: T) => string): string[] => rows.slice(0, leaderboardSize).map(fmt);

  switch (kind) {
    case 'win-rate':
      return top(await rankings.winRateRanking(guildId, role), formatRow.winRate);
    case 'best-teammates':
      return top(await rankings.guildBestTeammates(guildId, role ?? 'crewmate', leaderboardMin), formatRow.bestTeammate);
    case 'worst-teammates':
      return top(await rankings.guildWorstTeammates(guildId, role ?? 'crewmate', leaderboardMin), formatRow.worstTeammate);
    case 'first-killed':
      return top(
        await rankings.guildFirstTargets(guildId, 'died', leaderboardMin, leaderboardSize),
        formatRow.firstTarget
      );
    case 'first-exiled':
      return top(
        await rankings.guildFirstTargets(guildId, 'exiled', leaderboardMin, leaderboardSize),
        formatRow.firstTarget
      );
    case 'killed-by':
      return top(await rankings.guildKilledBy(guildId, leaderboardMin), formatRow.killedBy);
    case 'games-played':
      return top(await rankings.matchCountRanking(guildId), formatRow.matchCount);
  }
}

export async function execute(interaction: ChatInputCommandInteraction): Promise<void> {
  try {
    if (!interaction.inGuild()) {
      await replyError(interaction, `${EMOJI_ERROR} This command only works in a server.`);
      return;
    }

    const kind = interaction.options.getString('kind', true);
    if (!isKind(kind)) {
      await replyError(interaction, `${EMOJI_ERROR} Invalid leaderboard.`);
      return;
    }

    const roleRaw = interaction.options.getString('role');
    if (roleRaw != null && !isRole(roleRaw)) {
      await replyError(interaction, `${EMOJI_ERROR} Invalid role.`);
      return;
    }
    const role = roleRaw ?? undefined;

    await interaction.deferReply();

    const rankings = new RankingService();
    const [lines, games] = await Promise.all([
      leaderboardLines(rankings, interaction.guildId, kind, role),
      rankings.countGuildMatches(interaction.guildId),
    ]);

    const embed = buildLeaderboardEmbed({
      title: leaderboardTitle(kind, role),
      subtitle: games >= 0 ? `${games} games recorded` : undefined,
      lines,
    });

    await interaction.editReply({ embeds: [embed], allowedMentions: { parse: [] } });
  } catch (err: unknown) {
    console.error('leaderboard failed', {
      err,
      guildId: interaction.guildId ?? null,
      channelId: interaction.channelId,
      userId: interaction.user.id,
    });

    await replyError(interaction, `${EMOJI_ERROR} Leaderboard failed due to an unexpected error.`);
  }
}
