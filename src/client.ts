import { Client, Collection, GatewayIntentBits } from 'discord.js';

import { commands } from './commands/index.js';
import * as interactionCreate from './events/interaction-create.js';
import * as ready from './events/ready.js';
import type { Command } from './types/command.js';

const client = new Client({
  intents: [GatewayIntentBits.Guilds],
});

client.commands = new Collection<string, Command>();

export async function initClient(): Promise<void> {
  for (const command of commands) {
    client.commands.set(command.data.name, command);
  }

  client.once(ready.name, (c) => {
    void ready.execute(c);
  });
  client.on(interactionCreate.name, (interaction) => {
    void interactionCreate.execute(interaction);
  });

  console.log(`📦 Loaded ${client.commands.size} commands.`);
}

export default client;
