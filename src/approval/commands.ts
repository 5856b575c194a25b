export type BotCommand = 'generate' | 'review' | 'queue' | 'status' | 'stop' | 'help';

export interface ParsedCommand {
  command: BotCommand;
  args: string;
}

// Checked in order; the first prefix the command word starts with wins.
const COMMAND_PREFIXES: Array<[string, BotCommand]> = [
  ['/generate', 'generate'],
  ['/review', 'review'],
  ['/queue', 'queue'],
  ['/status', 'status'],
  ['/stop', 'stop'],
  ['/help', 'help'],
  ['/start', 'help'],
];

/**
 * Match a chat message against the bot commands, case-insensitively.
 * A `@botname` suffix on the command word is ignored. Returns null for
 * anything that is not a known command.
 */
export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim();
  const lower = trimmed.toLowerCase();
  for (const [prefix, command] of COMMAND_PREFIXES) {
    if (!lower.startsWith(prefix)) continue;
    let rest = trimmed.slice(prefix.length);
    const mention = /^@\S+/.exec(rest);
    if (mention) rest = rest.slice(mention[0].length);
    return { command, args: rest.trim() };
  }
  return null;
}
