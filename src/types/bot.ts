// Chat command types

export type BotCommand =
  | { name: 'start' }
  | { name: 'help' }
  | { name: 'check'; host: string }
  | { name: 'portscan'; host: string; portSpec: string | null }
  | { name: 'http'; url: string }
  | { name: 'usage'; command: 'check' | 'portscan' | 'http' }
  | { name: 'unknown'; command: string };

export type BotCommandName = BotCommand['name'];
