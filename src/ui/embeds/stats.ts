import { EmbedBuilder } from 'discord.js';

import { EMOJI_ROOM_RANKINGS, LEADERBOARD_EMBED_COLOR } from '../../config/constants.js';
import { colorName } from '../../data/player-colors.js';
import type { RoleRecord, UserStatsSummary } from '../../services/stats.service.js';

type BuildStatsEmbedOpts = Readonly<{
  targetMention: string;
  summary: UserStatsSummary;
}>;

function fmtCount(n: number): string {
  return n < 0 ? '—' : String(n);
}

function fmtRecord(rec: RoleRecord): string {
  if (rec.games < 0 || rec.wins < 0) return '—';
  const rate = rec.games > 0 ? ((rec.wins / rec.games) * 100).toFixed(1) : '0.0';

  const lines = [`Games: ${rec.games}`, `Wins: ${rec.wins}`, `Win%: ${rate}%`];
  return '```\n' + lines.join('\n') + '\n```';
}

export function buildStatsEmbed(opts: BuildStatsEmbedOpts): EmbedBuilder {
  const { summary } = opts;

  const embed = new EmbedBuilder()
    .setTitle(`${EMOJI_ROOM_RANKINGS} Stats`)
    .setDescription(`Stats for ${opts.targetMention}`)
    .setColor(LEADERBOARD_EMBED_COLOR)
    .addFields(
      { name: 'Games', value: fmtCount(summary.games), inline: true },
      { name: 'Wins', value: fmtCount(summary.wins), inline: true },
      { name: 'Servers', value: fmtCount(summary.guilds), inline: true },
      { name: 'Crewmate', value: fmtRecord(summary.crewmate), inline: true },
      { name: 'Imposter', value: fmtRecord(summary.imposter), inline: true }
    );

  const color = summary.colors[0];
  if (color) {
    embed.addFields({ name: 'Favorite color', value: `${colorName(color.mode)} (${color.count})`, inline: true });
  }

  if (summary.names.length > 0) {
    embed.addFields({
      name: 'Names',
      value: summary.names.slice(0, 5).map((n) => `${n.mode} (${n.count})`).join(', '),
      inline: false,
    });
  }

  if (summary.bestTeammate) {
    const b = summary.bestTeammate;
    embed.addFields({
      name: 'Best crewmate',
      value: `<@${b.teammateId}> ${b.winRate.toFixed(1)}% (${b.wins}/${b.total})`,
      inline: true,
    });
  }
  if (summary.worstTeammate) {
    const w = summary.worstTeammate;
    embed.addFields({
      name: 'Worst crewmate',
      value: `<@${w.teammateId}> ${w.lossRate.toFixed(1)}% (${w.losses}/${w.total})`,
      inline: true,
    });
  }

  return embed;
}
