import { EmbedBuilder } from 'discord.js';

import {
  EMOJI_FIRST_PLACE,
  EMOJI_ROOM_RANKINGS,
  EMOJI_SECOND_PLACE,
  EMOJI_THIRD_PLACE,
  LEADERBOARD_EMBED_COLOR,
  MAX_DISCORD_LEN,
} from '../../config/constants.js';
import type {
  BestTeammateRanking,
  FirstTargetRanking,
  KilledByRanking,
  ModeCount,
  WinRateRanking,
  WorstTeammateRanking,
} from '../../types/stats.js';

const MEDALS = [EMOJI_FIRST_PLACE, EMOJI_SECOND_PLACE, EMOJI_THIRD_PLACE];

type BuildLeaderboardEmbedOpts = Readonly<{
  title: string;
  subtitle?: string;
  lines: readonly string[];
}>;

const pct = (v: number): string => `${v.toFixed(1)}%`;
const mention = (id: string): string => `<@${id}>`;

export function rankPrefix(index: number): string {
  return MEDALS[index] ?? `\`#${index + 1}\``;
}

export const formatRow = {
  winRate: (r: WinRateRanking): string => `${mention(r.userId)} ${pct(r.winRate)} (${r.wins}/${r.total})`,
  bestTeammate: (r: BestTeammateRanking): string =>
    `${mention(r.userId)} & ${mention(r.teammateId)} ${pct(r.winRate)} (${r.wins} wins / ${r.total})`,
  worstTeammate: (r: WorstTeammateRanking): string =>
    `${mention(r.userId)} & ${mention(r.teammateId)} ${pct(r.lossRate)} (${r.losses} losses / ${r.total})`,
  firstTarget: (r: FirstTargetRanking): string =>
    `${mention(r.userId)} ${pct(r.rate)} (${r.count} of ${r.total} games)`,
  killedBy: (r: KilledByRanking): string =>
    `${mention(r.userId)} by ${mention(r.imposterId)} ${pct(r.deathRate)} (${r.deaths}/${r.encounters})`,
  matchCount: (r: ModeCount<string>): string => `${mention(r.mode)} ${r.count} games`,
} as const;

export function buildLeaderboardEmbed(opts: BuildLeaderboardEmbedOpts): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(`${EMOJI_ROOM_RANKINGS} ${opts.title}`)
    .setColor(LEADERBOARD_EMBED_COLOR);

  if (opts.lines.length === 0) {
    embed.setDescription(`${opts.subtitle ? `${opts.subtitle}\n` : ''}No games recorded yet.`);
    return embed;
  }

  let body = opts.subtitle ? `${opts.subtitle}\n` : '';
  for (let i = 0; i < opts.lines.length; i++) {
    const line = `${rankPrefix(i)} ${opts.lines[i]}\n`;
    if (body.length + line.length > MAX_DISCORD_LEN) break;
    body += line;
  }

  return embed.setDescription(body.trimEnd());
}
