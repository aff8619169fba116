import { Injectable } from '@nestjs/common';
import { EmbedBuilder, escapeMarkdown } from 'discord.js';
import type {
  BadgeTier,
  BoardScope,
  LeaderboardBoardDto,
  LeaderboardEntryDto,
  LeaderboardSnapshotDto,
} from '@presence-board/contract';
import { EMBED_COLORS } from '../discord-bot.constants';

/** Discord caps embed field values at 1024 characters. */
export const FIELD_VALUE_LIMIT = 1024;

export const EMPTY_BOARD_TEXT = '**nobody qualified 😴**';

const SCOPE_TITLES: Record<BoardScope, string> = {
  day: '📅 Today',
  week: '📆 This Week',
  month: '🗓️ This Month',
};

const BADGE_EMOJI: Record<BadgeTier, string> = {
  legend: '🚀',
  blazing: '🔥',
  strong: '💪',
  present: '✅',
  idle: '😴',
};

const MEDALS = ['🥇', '🥈', '🥉'];
const KEYCAPS = ['4️⃣', '5️⃣', '6️⃣', '7️⃣', '8️⃣', '9️⃣', '🔟'];

/** Rotates with the day number so consecutive posts look different. */
const DAY_FLARES = ['💥', '👑', '🔥', '⚡', '🌟', '🏁', '🎯', '💫', '🧠', '🦁', '🛡️', '🌙', '🚀', '✨', '💎'];

export function rankIcon(rank: number): string {
  if (rank >= 1 && rank <= 3) return MEDALS[rank - 1];
  if (rank >= 4 && rank <= 10) return KEYCAPS[rank - 4];
  return `${rank}.`;
}

export function dayFlare(dayIndex: number): string {
  const n = DAY_FLARES.length;
  return DAY_FLARES[(((dayIndex - 1) % n) + n) % n];
}

/**
 * Renders a leaderboard snapshot as one Discord embed: a title with the day
 * number and one field per board.
 */
@Injectable()
export class LeaderboardEmbedFactory {
  buildLeaderboardEmbed(snapshot: LeaderboardSnapshotDto): EmbedBuilder {
    const dayIndex =
      snapshot.boards.find((b) => b.scope === 'day')?.index ?? 0;
    const empty = snapshot.boards.every((b) => b.entries.length === 0);

    const embed = new EmbedBuilder()
      .setTitle(`📊 LEADERBOARD - DAY ${dayIndex} ${dayFlare(dayIndex)}`)
      .setColor(empty ? EMBED_COLORS.EMPTY : EMBED_COLORS.LEADERBOARD)
      .setTimestamp(new Date(snapshot.postedAt))
      .addFields(
        snapshot.boards.map((board) => ({
          name: `${SCOPE_TITLES[board.scope]} - ${board.label}`,
          value: this.boardValue(board),
        })),
      );

    if (snapshot.quote) {
      embed.addFields({
        name: 'WORD OF THE DAY 🌟',
        value: `||***${escapeMarkdown(snapshot.quote)}***||`,
      });
    }
    if (snapshot.live) {
      embed.setFooter({ text: 'Includes the call in progress' });
    }
    return embed;
  }

  private boardValue(board: LeaderboardBoardDto): string {
    if (board.entries.length === 0) return EMPTY_BOARD_TEXT;

    const lines: string[] = [];
    let length = 0;
    for (const entry of board.entries) {
      const line = this.entryLine(entry);
      const added = (lines.length > 0 ? 1 : 0) + line.length;
      if (length + added > FIELD_VALUE_LIMIT) break;
      lines.push(line);
      length += added;
    }
    return lines.join('\n');
  }

  private entryLine(entry: LeaderboardEntryDto): string {
    const name = `**${escapeMarkdown(entry.displayName)}**`;
    const tail = entry.compliment ? ` - *${escapeMarkdown(entry.compliment)}*` : '';
    return `${rankIcon(entry.rank)} ${name} - ${entry.minutes}m ${BADGE_EMOJI[entry.badge]}${tail}`;
  }
}
