#!/usr/bin/env node
import { Command } from 'commander';
import { config } from './config/config';
import { type AppContext, createAppContext } from './service/container';
import { startServer } from './server';
import { toBatchItem } from './service/batchPayload';
import type { BatchView } from './service/trendSwapService';
import { TRANSFORM_OUTCOMES } from './types/transform';
import { toUserFriendlyError } from './utils/userErrors';

const program = new Command();

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function printView(view: BatchView): void {
  console.log(`Status: ${view.status}`);
  if (view.status !== 'fresh') {
    console.log(view.message);
  }
  for (const item of view.items) {
    console.log(`  ${item.artifact}  [${item.sourceTag}] ${item.label} (${item.popularityScore})`);
  }
}

/**
 * Runs one command against a freshly wired context, mapping failures to an exit code.
 */
async function withContext(action: (context: AppContext) => Promise<number>): Promise<void> {
  try {
    process.exitCode = await action(createAppContext(config));
  } catch (error) {
    console.error(`Error: ${toUserFriendlyError(error, 'cli')}`);
    process.exitCode = 1;
  }
}

program
  .name('trendswap')
  .description('Trending image face-swap pipeline')
  .version('1.0.0');

program
  .command('batch')
  .description('print the current batch, generating it if the cache is empty or expired')
  .option('--json', 'print raw JSON')
  .action(async (options: { json?: boolean }) => {
    await withContext(async ({ service }) => {
      const view = await service.getCurrentBatch();
      if (options.json) printJson(view); else printView(view);
      return view.status === 'unavailable' ? 1 : 0;
    });
  });

program
  .command('regenerate')
  .description('generate a new batch regardless of cache state')
  .action(async () => {
    await withContext(async ({ service }) => {
      const view = await service.forceRegenerate();
      printView(view);
      const status = await service.cacheStatus();
      if (status.lastRun) {
        const tally = TRANSFORM_OUTCOMES.map(outcome => `${outcome}=${status.lastRun?.tally[outcome] ?? 0}`).join(' ');
        console.log(`Attempted ${status.lastRun.attempted} in ${status.lastRun.durationMs}ms: ${tally}`);
      }
      return view.status === 'unavailable' ? 1 : 0;
    });
  });

program
  .command('status')
  .description('show cache state')
  .action(async () => {
    await withContext(async ({ service }) => {
      printJson(await service.cacheStatus());
      return 0;
    });
  });

program
  .command('clear')
  .description('invalidate the batch cache')
  .action(async () => {
    await withContext(async ({ service }) => {
      await service.invalidate();
      console.log('Cache cleared');
      return 0;
    });
  });

program
  .command('swap <url>')
  .description('swap the reference face into a single image')
  .action(async (url: string) => {
    await withContext(async ({ service }) => {
      const result = await service.transformSingle(url);
      if (result.outcome === 'success') {
        printJson(toBatchItem(result));
        return 0;
      }
      console.error(`${result.outcome}: ${result.reason}`);
      return 2;
    });
  });

program
  .command('trends')
  .description('list current trend candidates')
  .option('-l, --limit <number>', 'maximum candidates to list', '20')
  .action(async (options: { limit: string }) => {
    await withContext(async ({ service }) => {
      const trends = await service.getTrends(parseInt(options.limit, 10) || 20);
      for (const candidate of trends) {
        console.log(`${String(candidate.popularityScore).padStart(7)}  [${candidate.sourceTag}] ${candidate.label}`);
        console.log(`         ${candidate.imageUrl}`);
      }
      return 0;
    });
  });

program
  .command('serve')
  .description('start the HTTP API')
  .action(async () => {
    try {
      await startServer(createAppContext(config));
    } catch (error) {
      console.error(`Error: ${toUserFriendlyError(error, 'serve')}`);
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${toUserFriendlyError(error, 'cli')}`);
  process.exitCode = 1;
});
