export const DISCORD_BOT_EVENTS = {
  CONNECTED: 'discord-bot.connected',
  DISCONNECTED: 'discord-bot.disconnected',
  ERROR: 'discord-bot.error',
} as const;

/**
 * Accent colors for Discord embeds.
 * Values are decimal representations of hex colors for discord.js.
 */
export const EMBED_COLORS = {
  /** Leaderboard post: Amber #f59e0b */
  LEADERBOARD: 0xf59e0b,
  /** Nobody on any board: Slate #64748b */
  EMPTY: 0x64748b,
} as const;

/**
 * Convert Discord.js errors into operator-friendly messages.
 * Shared between DiscordBotService and DiscordBotClientService.
 */
export function friendlyDiscordErrorMessage(error: unknown): string {
  if (!(error instanceof Error)) return 'Failed to connect with provided token';
  const raw = error.message;

  if (
    /disallowed intent|privileged intent/i.test(raw) ||
    ('code' in error && error.code === 4014)
  ) {
    return 'Missing required privileged intent: Server Members. Enable it in the Discord Developer Portal under Bot > Privileged Gateway Intents.';
  }
  if (/invalid token|TOKEN_INVALID/i.test(raw)) {
    return 'Invalid bot token. Please check the token and try again.';
  }
  if (/getaddrinfo|ENOTFOUND/i.test(raw)) {
    return 'Unable to reach Discord servers. Check your internet connection.';
  }
  if (/ECONNREFUSED/i.test(raw)) {
    return 'Connection to Discord was refused. Try again in a few moments.';
  }

  return 'Failed to connect with provided token';
}
