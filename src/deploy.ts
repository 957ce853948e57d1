import { REST, Routes, type Collection } from 'discord.js';

import { config } from './config.js';
import type { Command } from './types/command.js';

export async function deployCommands(commands: Collection<string, Command>): Promise<void> {
  const body = commands.map((command) => command.data.toJSON());
  const rest = new REST().setToken(config.discord.token);

  if (config.discord.guildId) {
    await rest.put(Routes.applicationGuildCommands(config.discord.clientId, config.discord.guildId), { body });
    console.log(`🚀 Deployed ${body.length} guild commands to ${config.discord.guildId}.`);
    return;
  }

  await rest.put(Routes.applicationCommands(config.discord.clientId), { body });
  console.log(`🚀 Deployed ${body.length} global commands.`);
}
