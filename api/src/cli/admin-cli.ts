/**
 * Admin CLI for a running tracker API.
 *
 * Usage:
 *   npm run cli -- backfill --start 2024-03-01 --end 2024-03-31 [--inspect]
 *   npm run cli -- post-now
 *   npm run cli -- live
 *   npm run cli -- reset --yes
 *
 * Reads ADMIN_API_TOKEN and API_URL (default http://localhost:$PORT) from
 * the environment or .env.
 */
import 'dotenv/config';
import { Command } from 'commander';
import { AdminApiClient } from './admin-api.client';
import { formatBackfillReport, hasFailures } from './backfill-report';

function createClient(): AdminApiClient {
  const token = process.env.ADMIN_API_TOKEN;
  if (!token) {
    throw new Error('ADMIN_API_TOKEN environment variable is required');
  }
  const baseUrl =
    process.env.API_URL ?? `http://localhost:${process.env.PORT ?? 3000}`;
  return new AdminApiClient({ baseUrl, token });
}

interface BackfillOptions {
  start?: string;
  end?: string;
  inspect: boolean;
}

const program = new Command();

program
  .name('presence-board')
  .description('Admin commands for the presence tracker');

program
  .command('backfill')
  .description('Replay historical boards to the leaderboard export')
  .option('--start <date>', 'first local date (YYYY-MM-DD)')
  .option('--end <date>', 'last local date, defaults to yesterday')
  .option('--inspect', 'build boards without sending them', false)
  .action(async (opts: BackfillOptions) => {
    const response = await createClient().backfill(opts);
    for (const line of formatBackfillReport(response)) console.log(line);
    if (hasFailures(response)) process.exitCode = 1;
  });

program
  .command('post-now')
  .description('Post the current leaderboard without marking the day')
  .action(async () => {
    const { snapshot } = await createClient().postNow();
    const day = snapshot.boards.find((board) => board.scope === 'day');
    console.log(
      `Posted DAY ${day?.index ?? '?'} board for ${snapshot.referenceDate}`,
    );
  });

program
  .command('live')
  .description('Show who is in the tracked call right now')
  .action(async () => {
    const live = await createClient().getLive();
    if (!live.callId) {
      console.log('No call in progress');
      return;
    }
    console.log(`Call ${live.callId} since ${live.startedAt ?? 'unknown'}`);
    for (const p of live.participants) {
      const mark = p.qualified ? '✓' : ' ';
      console.log(`${mark} ${p.displayName} joined ${p.joinedAt}`);
    }
  });

program
  .command('reset')
  .description('Wipe totals and compliments and start again at DAY 1')
  .option('--yes', 'confirm the reset', false)
  .action(async (opts: { yes: boolean }) => {
    if (!opts.yes) {
      console.error('Refusing to reset without --yes');
      process.exitCode = 1;
      return;
    }
    const { anchorDate } = await createClient().reset();
    console.log(`Reset done. New anchor date ${anchorDate}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
