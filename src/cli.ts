#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { loadConfig, type AppConfig } from './config.js';
import { parseTargets } from './loader/tweets.js';
import { runPipeline } from './pipeline.js';
import { describeLatestRun } from './status.js';

const program = new Command();

function configFromEnv(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(`Configuration error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

program
  .name('kfin-watch')
  .description('Watch collected posts for incidents at Korean financial institutions and alert Mattermost')
  .version('0.1.0');

program
  .command('run')
  .description('Analyze the latest collected posts and send an alert if a threat is found')
  .option('--data-dir <dir>', 'Base directory of collected posts (overrides DATA_DIR)')
  .option('--targets <list>', 'Comma-separated targets (overrides TARGETS)')
  .action(async (opts: { dataDir?: string; targets?: string }) => {
    const env = configFromEnv();
    const config: AppConfig = {
      ...env,
      dataDir: opts.dataDir ?? env.dataDir,
      targets: opts.targets !== undefined ? parseTargets(opts.targets) : env.targets,
    };

    console.log('='.repeat(50));
    console.log('Korean financial threat analysis');
    console.log('='.repeat(50));
    const start = Date.now();

    const outcome = await runPipeline(config);

    const elapsed = ((Date.now() - start) / 1000).toFixed(1);
    if (outcome.status === 'completed') {
      const alert = outcome.analysis.relevant ? (outcome.dispatched ? 'alert sent' : 'alert not sent') : 'no alert';
      console.log(`\nDone in ${elapsed}s: ${outcome.tweetCount} posts, ${alert}`);
    } else {
      console.log(`\nDone in ${elapsed}s: nothing to do (${outcome.status})`);
    }
  });

program
  .command('status')
  .description('Show the most recent run record')
  .option('--data-dir <dir>', 'Base directory of collected posts (overrides DATA_DIR)')
  .action(async (opts: { dataDir?: string }) => {
    const dataDir = opts.dataDir ?? configFromEnv().dataDir;

    console.log('kfin-watch status:');
    for (const line of await describeLatestRun(dataDir)) {
      console.log(`  ${line}`);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
