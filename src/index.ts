#!/usr/bin/env node
/**
 * showcull command line
 *
 *   showcull [run]          scan, reconcile and act on unwatched shows
 *   showcull check          report store integrity problems
 *   showcull repair         fix what the integrity check found
 *   showcull backup [file]  snapshot the store
 *   showcull restore <file> replace the store with a snapshot
 *   showcull history [id]   print recorded decisions
 *   showcull link / merge   resolve identity reviews by hand
 */

import { Command } from 'commander';
import { App } from './app.js';
import { ConfigManager } from './config/ConfigManager.js';
import { ReadlineActionChooser } from './services/actions/ReadlineActionChooser.js';
import { formatReport } from './services/sweep/reportFormatter.js';
import { IdentitySource } from './types/models.js';
import { closeLogger, initializeLogger, logger } from './utils/logger.js';
import { getErrorMessage } from './utils/errorHandling.js';
import { ValidationError } from './errors/index.js';

const IDENTITY_SOURCES: readonly IdentitySource[] = ['plex', 'sonarr', 'tvdb', 'tmdb', 'imdb'];

/**
 * Load configuration, open the store, run `task`, and always close again
 */
async function withApp(task: (app: App) => Promise<void>, interactive = false): Promise<void> {
  const config = ConfigManager.fromEnvironment().validate();
  initializeLogger(config.logging);

  const chooser =
    interactive && !config.actions.skipConfirmation ? new ReadlineActionChooser(process.stdin, process.stdout) : null;
  const app = new App(config, chooser ? { chooser } : {});

  try {
    await app.start();
    await task(app);
  } finally {
    chooser?.close();
    await app.stop();
  }
}

function print(text: string): void {
  process.stdout.write(`${text}\n`);
}

async function runCommand(): Promise<void> {
  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      // Second Ctrl-C: stop immediately
      process.exit(130);
    }
    logger.warn('Received SIGINT, finishing the current show and stopping');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  try {
    await withApp(async (app) => {
      const report = await app.run(controller.signal);
      print(formatReport(report));

      if (report.fatalError) {
        logger.error('Run aborted', {
          completed: report.acted.length + report.kept.length,
          skipped: report.skipped.length,
          error: report.fatalError,
        });
        process.exitCode = 1;
      }
    }, true);
  } finally {
    process.off('SIGINT', onSigint);
  }
}

const program = new Command();

program.name('showcull').description('Find and remove TV shows nobody is watching').version('1.0.0');

program.command('run', { isDefault: true }).description('Scan the library and act on unwatched shows').action(runCommand);

program
  .command('check')
  .description('Check the store for corruption and orphaned rows')
  .action(() =>
    withApp(async (app) => {
      const report = await app.check();
      print(report.ok ? 'Store OK' : ['Problems found:', ...report.problems.map((p) => `  - ${p}`)].join('\n'));
      if (!report.ok) {
        process.exitCode = 1;
      }
    })
  );

program
  .command('repair')
  .description('Repair orphaned and corrupt rows')
  .action(() =>
    withApp(async (app) => {
      const result = await app.repair();
      print(
        `Restored ${result.restoredShows} shows, removed ${result.removedMappings} mappings and ` +
          `${result.removedRecords} records, cleared ${result.clearedPayloads} payloads`
      );
      if (result.invalidated.length > 0) {
        print(`Invalidated wholesale: ${result.invalidated.join(', ')}`);
      }
      if (!result.remaining.ok) {
        print(['Still failing:', ...result.remaining.problems.map((p) => `  - ${p}`)].join('\n'));
        process.exitCode = 1;
      }
    })
  );

program
  .command('backup [file]')
  .description('Write a snapshot of the store')
  .action((file: string | undefined) =>
    withApp(async (app) => {
      print(`Backup written to ${await app.backup(file)}`);
    })
  );

program
  .command('restore <file>')
  .description('Replace the store with a verified snapshot')
  .action((file: string) =>
    withApp(async (app) => {
      await app.restore(file);
      print(`Store restored from ${file}`);
    })
  );

program
  .command('history [canonicalId]')
  .description('Print recorded decisions')
  .action((canonicalId: string | undefined) =>
    withApp(async (app) => {
      const records = await app.history.list(canonicalId);
      for (const record of records) {
        const when = new Date(record.createdAt).toISOString();
        const simulated = record.simulated ? ' [simulated]' : '';
        const error = record.error ? ` (${record.error})` : '';
        const done = record.completedSteps.length > 0 ? ` done: ${record.completedSteps.join('; ')}` : '';
        const decision = `${record.action} <- ${record.requestedAction} ${record.outcome}`;
        print(`${when} ${record.canonicalId} ${decision}${simulated}${error}${done}`);
      }
    })
  );

program
  .command('link <source> <sourceId> <canonicalId>')
  .description('Attach a source record to a show')
  .action((source: string, sourceId: string, canonicalId: string) =>
    withApp(async (app) => {
      const sourceName = IDENTITY_SOURCES.find((candidate) => candidate === source);
      if (!sourceName) {
        throw new ValidationError(`Unknown source "${source}", expected one of: ${IDENTITY_SOURCES.join(', ')}`);
      }
      await app.identity.link(sourceName, sourceId, canonicalId);
      print(`Linked ${sourceName}:${sourceId} to ${canonicalId}`);
    })
  );

program
  .command('merge <fromId> <intoId>')
  .description('Fold one show into another')
  .action((fromId: string, intoId: string) =>
    withApp(async (app) => {
      print(`Merged into ${await app.identity.merge(fromId, intoId)}`);
    })
  );

void program
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Command failed', { error: getErrorMessage(error) });
    process.stderr.write(`${getErrorMessage(error)}\n`);
    process.exitCode = 1;
  })
  .finally(() => closeLogger());
