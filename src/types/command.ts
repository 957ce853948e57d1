import type {
  ChatInputCommandInteraction,
  Collection,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';

export type Command = {
  data: {
    name: string;
    toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody;
  };
  execute(interaction: ChatInputCommandInteraction): Promise<void>;
};

declare module 'discord.js' {
  interface Client {
    commands: Collection<string, Command>;
  }
}
