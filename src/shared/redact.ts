// Patterns that indicate secret values (never log these)
const SECRET_PATTERNS: Array<[RegExp, string]> = [
  // Telegram bot tokens embedded in API URLs: /bot123456:AAE.../
  [/bot\d+:[A-Za-z0-9_-]{20,}/g, 'bot[REDACTED]'],
  [/bearer\s+[^\s"]+/gi, '[REDACTED]'],
  [/authorization:\s*[^\s"]+/gi, '[REDACTED]'],
  [/(refresh_token|access_token|client_secret)(["']?\s*[:=]\s*["']?)[^"'&\s]+/gi, '$1$2[REDACTED]'],
];

/**
 * Redact potential secret values from a string for safe logging.
 */
export function redact(input: string): string {
  let output = input;
  for (const [pattern, replacement] of SECRET_PATTERNS) {
    output = output.replace(pattern, replacement);
  }
  return output;
}
