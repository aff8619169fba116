import {
  Module,
  Global,
  Inject,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';
import { isPerfEnabled } from '../common/perf-logger';
import { PerfDrizzleLogger } from './perf-drizzle-logger';

export const DrizzleAsyncProvider = 'drizzleProvider';
export const POSTGRES_CLIENT = 'postgresClient';

/** Seconds to let open queries finish before the pool is closed. */
const SHUTDOWN_TIMEOUT_SECONDS = 5;

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: POSTGRES_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const connectionString = configService.get<string>('DATABASE_URL');
        if (!connectionString) {
          throw new Error('DATABASE_URL is undefined');
        }
        return postgres(connectionString, {
          max: Number(configService.get<string>('DB_POOL_MAX') ?? 10),
          idle_timeout: Number(
            configService.get<string>('DB_IDLE_TIMEOUT') ?? 30,
          ),
        });
      },
    },
    {
      provide: DrizzleAsyncProvider,
      inject: [POSTGRES_CLIENT],
      useFactory: (client: postgres.Sql) =>
        drizzle(client, {
          schema,
          logger: isPerfEnabled() ? new PerfDrizzleLogger() : undefined,
        }),
    },
  ],
  exports: [DrizzleAsyncProvider],
})
export class DrizzleModule implements OnApplicationShutdown {
  private readonly logger = new Logger(DrizzleModule.name);

  constructor(@Inject(POSTGRES_CLIENT) private readonly client: postgres.Sql) {}

  /**
   * Runs after every `beforeApplicationShutdown` hook, so the tracker's
   * final commit has already gone through.
   */
  async onApplicationShutdown(): Promise<void> {
    await this.client.end({ timeout: SHUTDOWN_TIMEOUT_SECONDS });
    this.logger.log('Database connections closed');
  }
}
