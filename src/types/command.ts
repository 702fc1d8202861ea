import {
  ChatInputCommandInteraction,
  AutocompleteInteraction,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import type { BotContext } from './client';

/**
 * Command category enumeration
 */
export enum CommandCategory {
  MUSIC = 'music',
  PLAYLIST = 'playlist',
  GENERAL = 'general',
  ADMIN = 'admin',
}

/**
 * What a slash command builder exposes once options are added
 */
export interface CommandData {
  readonly name: string;
  readonly description: string;
  toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody;
}

/**
 * Command interface
 */
export interface Command {
  data: CommandData;
  category: CommandCategory;
  cooldown?: number; // in seconds
  ownerOnly?: boolean;
  execute: (interaction: ChatInputCommandInteraction, context: BotContext) => Promise<void>;
  autocomplete?: (interaction: AutocompleteInteraction, context: BotContext) => Promise<void>;
}

export interface CooldownCheck {
  onCooldown: boolean;
  /** Seconds */
  timeLeft?: number;
}
