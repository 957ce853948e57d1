import {
  ChatInputCommandInteraction,
  SlashCommandBuilder,
} from 'discord.js';

import { config } from '../../config.js';
import { EMOJI_ERROR } from '../../config/constants.js';
import { StatsService } from '../../services/stats.service.js';
import { buildStatsEmbed } from '../../ui/embeds/stats.js';
import { parseDiscordUserId } from '../../utils/parse-ids.js';
import { replyError } from '../../utils/reply-error.js';

export const data = new SlashCommandBuilder()
  .setName('stats')
  .setDescription('View game stats for yourself or another user on this server.')
  .setDMPermission(false)
  .addStringOption((opt) =>
    opt
      .setName('mention')
      .setDescription('Optional: @user or user id')
      .setRequired(false)
  );

export async function execute(interaction: ChatInputCommandInteraction): Promise<void> {
  try {
    if (!interaction.inGuild()) {
      await replyError(interaction, `${EMOJI_ERROR} This command only works in a server.`);
      return;
    }

    const mentionRaw = interaction.options.getString('mention');
    let targetId = interaction.user.id;
    if (mentionRaw != null) {
      const parsed = parseDiscordUserId(mentionRaw);
      if (!parsed) {
        await replyError(interaction, `${EMOJI_ERROR} Invalid mention/user id.`);
        return;
      }
      targetId = parsed;
    }

    await interaction.deferReply();

    const summary = await new StatsService().getUserSummary({
      userId: targetId,
      guildId: interaction.guildId,
      leaderboardMin: config.stats.leaderboardMin,
    });

    if (summary.games === 0) {
      await replyError(interaction, `${EMOJI_ERROR} No games recorded for that user on this server.`);
      return;
    }

    const embed = buildStatsEmbed({ targetMention: `<@${targetId}>`, summary });
    await interaction.editReply({ embeds: [embed], allowedMentions: { parse: [] } });
  } catch (err: unknown) {
    console.error('stats failed', {
      err,
      guildId: interaction.guildId ?? null,
      channelId: interaction.channelId,
      userId: interaction.user.id,
    });

    await replyError(interaction, `${EMOJI_ERROR} Stats failed due to an unexpected error.`);
  }
}
