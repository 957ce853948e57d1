import {
  AttachmentBuilder,
  ChatInputCommandInteraction,
  SlashCommandBuilder,
} from 'discord.js';

import { config } from '../../config.js';
import { EMOJI_ERROR } from '../../config/constants.js';
import { MatchStatsService, type MatchReport } from '../../services/match-stats.service.js';
import { buildMatchStatsEmbed } from '../../ui/embeds/match-stats.js';
import { parseMatchRef } from '../../utils/parse-ids.js';
import { eventsToCsv, matchesToCsv, outcomesToCsv } from '../../utils/records-to-csv.js';
import { replyError } from '../../utils/reply-error.js';

export const data = new SlashCommandBuilder()
  .setName('match-stats')
  .setDescription('Show the statistics and timeline of a finished game.')
  .setDMPermission(false)
  .addStringOption((opt) =>
    opt
      .setName('match')
      .setDescription('Game id, e.g. ABCDEF:1234 or 1234')
      .setRequired(true)
  )
  .addBooleanOption((opt) =>
    opt
      .setName('export')
      .setDescription('Attach the raw game records as CSV')
      .setRequired(false)
  );

function csvAttachments(report: MatchReport): AttachmentBuilder[] {
  const id = report.match.matchId;
  return [
    new AttachmentBuilder(Buffer.from(matchesToCsv([report.match])), { name: `game-${id}.csv` }),
    new AttachmentBuilder(Buffer.from(eventsToCsv(report.events)), { name: `game-${id}-events.csv` }),
    new AttachmentBuilder(Buffer.from(outcomesToCsv(report.outcomes)), { name: `game-${id}-players.csv` }),
  ];
}

export async function execute(interaction: ChatInputCommandInteraction): Promise<void> {
  try {
    if (!interaction.inGuild()) {
      await replyError(interaction, `${EMOJI_ERROR} This command only works in a server.`);
      return;
    }

    const ref = parseMatchRef(interaction.options.getString('match', true));
    if (!ref) {
      await replyError(interaction, `${EMOJI_ERROR} Invalid game id.`);
      return;
    }

    await interaction.deferReply();

    const report = await new MatchStatsService().getMatchStatistics(ref.matchId);
    const belongsHere =
      report !== null &&
      report.match.guildId === interaction.guildId &&
      (ref.connectCode === null || ref.connectCode === report.match.connectCode.toUpperCase());
    if (!report || !belongsHere) {
      await replyError(interaction, `${EMOJI_ERROR} No game found with that id on this server.`);
      return;
    }

    const embed = buildMatchStatsEmbed({
      combinedId: `${report.match.connectCode}:${report.match.matchId}`,
      stats: report.stats,
      timeOffsetMinutes: config.stats.timeOffsetMinutes,
    });

    const files = interaction.options.getBoolean('export') ? csvAttachments(report) : [];
    await interaction.editReply({ embeds: [embed], files, allowedMentions: { parse: [] } });
  } catch (err: unknown) {
    console.error('match-stats failed', {
      err,
      guildId: interaction.guildId ?? null,
      channelId: interaction.channelId,
      userId: interaction.user.id,
    });

    await replyError(interaction, `${EMOJI_ERROR} Match stats failed due to an unexpected error.`);
  }
}
