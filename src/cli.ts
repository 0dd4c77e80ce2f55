import dotenv from 'dotenv';
dotenv.config();

import { subDays } from 'date-fns';
import { loadConfig } from './config';
import { loadCompanies } from './registry';
import { runAllSources } from './scrapers/runner';
import { openDatabase, closeDatabase, getJobStats, queryRecent, sqliteStore } from './db';
import { createLogger, setLogLevel } from './utils/logger';

const log = createLogger('CLI');

const [command, arg] = process.argv.slice(2);

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  openDatabase(config.databasePath);

  // Nothing in a run is fatal, but a hung remote must not keep the process alive forever
  const watchdog = setTimeout(() => {
    log.error(`Run exceeded ${config.runTimeoutMs}ms, aborting`);
    process.exit(1);
  }, config.runTimeoutMs);
  watchdog.unref();

  try {
    switch (command) {
      case 'scrape': {
        const target = arg || 'all';
        const companies = loadCompanies(config.companiesFile);
        const selected = target === 'all' ? companies : companies.filter(company => company.id === target);
        if (selected.length === 0) {
          throw new Error(`Unknown company: ${target}. Available: ${companies.map(c => c.id).join(', ')}`);
        }
        const summary = await runAllSources(selected, { store: sqliteStore, config });
        console.log(
          `\nNew jobs: ${summary.totalNew} | scraped ${summary.succeeded}/${summary.configured}` +
            ` | failed ${summary.failed} | not run ${summary.skipped}`
        );
        break;
      }

      case 'recent': {
        const days = arg ? parseInt(arg, 10) : 1;
        if (!Number.isInteger(days) || days < 1) {
          throw new Error(`Invalid number of days: ${arg}`);
        }
        const jobs = queryRecent(subDays(new Date(), days));
        console.log(`\n${jobs.length} jobs discovered in the last ${days} day(s):`);
        for (const job of jobs) {
          console.log(`  ${job.discoveredAt.slice(0, 10)}  ${job.companyId}  ${job.title}  (${job.location ?? 'n/a'})`);
          console.log(`    ${job.url}`);
        }
        break;
      }

      case 'stats': {
        const stats = getJobStats();
        console.log('\nStats:', JSON.stringify(stats, null, 2));
        break;
      }

      default:
        console.log(`
Usage:
  tsx src/cli.ts scrape [companyId]   Scrape one company or all of them (default: all)
  tsx src/cli.ts recent [days]        List jobs discovered in the last N days (default: 1)
  tsx src/cli.ts stats                Show job stats
        `);
    }
  } finally {
    clearTimeout(watchdog);
    closeDatabase();
  }
}

main().catch(err => {
  log.error('Error:', err);
  process.exit(1);
});
