import { MessageFlags, type ChatInputCommandInteraction } from 'discord.js';

export async function replyError(interaction: ChatInputCommandInteraction, msg: string): Promise<void> {
  const base = { content: msg, allowedMentions: { parse: [] } };

  try {
    if (interaction.deferred) {
      await interaction.editReply(base);
      return;
    }

    const payload = { ...base, flags: MessageFlags.Ephemeral } as const;
    if (interaction.replied) {
      await interaction.followUp(payload);
      return;
    }
    await interaction.reply(payload);
  } catch (err) {
    console.error('replyError failed', { err, interactionId: interaction.id });
  }
}
