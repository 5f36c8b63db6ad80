import type { BotCommand } from '../types/bot.js';

// "/portscan" or "/portscan@SomeBot"
const COMMAND_TOKEN = /^\/([a-z_]+)(?:@\w+)?$/i;

/**
 * Parses a chat message into a command. Returns null for text that is not a
 * command at all.
 */
export function parseCommand(text: string): BotCommand | null {
  const tokens = text.trim().split(/\s+/);
  const match = tokens[0]?.match(COMMAND_TOKEN);
  if (!match?.[1]) return null;

  const name = match[1].toLowerCase();
  const args = tokens.slice(1);
  const [first] = args;

  switch (name) {
    case 'start':
      return { name: 'start' };
    case 'help':
      return { name: 'help' };
    case 'check':
      return first ? { name: 'check', host: first } : { name: 'usage', command: 'check' };
    case 'portscan':
      if (!first) return { name: 'usage', command: 'portscan' };
      return {
        name: 'portscan',
        host: first,
        portSpec: args.length > 1 ? args.slice(1).join(',') : null,
      };
    case 'http':
      return first ? { name: 'http', url: first } : { name: 'usage', command: 'http' };
    default:
      return { name: 'unknown', command: name };
  }
}
