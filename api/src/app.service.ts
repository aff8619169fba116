import { Injectable, Inject } from '@nestjs/common';
import { DrizzleAsyncProvider } from './drizzle/drizzle.module';
import { sql } from 'drizzle-orm';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import type * as schema from './drizzle/schema';
import { DiscordBotClientService } from './discord-bot/discord-bot-client.service';

@Injectable()
export class AppService {
  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: PostgresJsDatabase<typeof schema>,
    private discordClient: DiscordBotClientService,
  ) {}

  async checkDatabaseHealth(): Promise<{
    connected: boolean;
    latencyMs: number;
  }> {
    const start = Date.now();
    try {
      await this.db.execute(sql`SELECT 1`);
      return { connected: true, latencyMs: Date.now() - start };
    } catch {
      return { connected: false, latencyMs: Date.now() - start };
    }
  }

  /** The bot is optional; a disconnected bot leaves the roster unknown. */
  checkDiscordHealth(): { connected: boolean; connecting: boolean } {
    return {
      connected: this.discordClient.isConnected(),
      connecting: this.discordClient.isConnecting(),
    };
  }
}
