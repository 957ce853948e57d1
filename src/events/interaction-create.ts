import { Events, type Interaction } from 'discord.js';

import { EMOJI_ERROR, EMOJI_FAIL } from '../config/constants.js';
import { replyError } from '../utils/reply-error.js';

export const name = Events.InteractionCreate;
export const once = false;

const seen = new Map<string, number>();
const TTL_MS = 2 * 60_000;
let lastSweep = 0;

function shouldHandle(interactionId: string): boolean {
  const now = Date.now();
  const prev = seen.get(interactionId);
  if (prev && now - prev < TTL_MS) return false;

  seen.set(interactionId, now);

  if (now - lastSweep > 30_000 && seen.size > 200) {
    for (const [id, ts] of seen) {
      if (now - ts > TTL_MS) seen.delete(id);
    }
    lastSweep = now;
  }

  return true;
}

export async function execute(interaction: Interaction): Promise<void> {
  if (!interaction.isChatInputCommand()) return;
  if (!shouldHandle(interaction.id)) return;

  const command = interaction.client.commands.get(interaction.commandName);
  if (!command) {
    await replyError(
      interaction,
      `${EMOJI_FAIL} Command not found. The bot may be updating, try again in a moment.`
    );
    return;
  }

  try {
    await command.execute(interaction);
  } catch (err) {
    console.error('Command execution failed', {
      err,
      commandName: interaction.commandName,
      interactionId: interaction.id,
      guildId: interaction.guildId,
      channelId: interaction.channelId,
      userId: interaction.user.id,
    });

    await replyError(interaction, `${EMOJI_ERROR} Something went wrong while running that command.`);
  }
}
