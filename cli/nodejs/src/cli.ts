#!/usr/bin/env node

import {
  MustGather,
  createLogger as createRuntimeLogger,
  loadConfig,
} from '@mgscope/runtime';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createLogger, type CliLogger } from './logger';
import { renderSummary, resourceNames } from './render';

function open(archivePath: string, log: CliLogger): MustGather {
  const config = loadConfig();
  return MustGather.from(archivePath, {
    logger: createRuntimeLogger(log.verbose || config.verbose),
    maxRootDepth: config.maxRootDepth,
  });
}

function run(verbose: boolean, command: (log: CliLogger) => void): void {
  const log = createLogger(verbose);
  try {
    command(log);
  } catch (error) {
    log.info(log.error(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}

yargs(hideBin(process.argv))
  .scriptName('mgscope')
  .usage('$0 <command> [options]')
  .option('verbose', {
    type: 'boolean',
    default: false,
    describe: 'Print debug output while reading the archive',
  })
  .command(
    ['summary <path>', '$0 <path>'],
    'Summarise a must-gather archive',
    (y) =>
      y
        .positional('path', {
          describe: 'Must-gather root, or a directory wrapping it',
          type: 'string',
          demandOption: true,
        })
        .option('json', {
          type: 'boolean',
          default: false,
          describe: 'Print the summary as JSON',
        }),
    (argv) =>
      run(argv.verbose, (log) => {
        const mustGather = open(argv.path, log);
        if (argv.json) {
          log.info(JSON.stringify({ ...mustGather.summary(), skipped: mustGather.skipped }, null, 2));
          return;
        }
        log.info(renderSummary(mustGather.summary(), mustGather.skipped, log));
      }),
  )
  .command(
    'resources <path> <kind>',
    'List the manifests of one resource kind',
    (y) =>
      y
        .positional('path', { type: 'string', demandOption: true })
        .positional('kind', { type: 'string', demandOption: true })
        .option('group', { type: 'string', default: 'core', describe: 'API group' })
        .option('namespace', { alias: 'n', type: 'string', describe: 'Namespace; cluster-scoped when omitted' }),
    (argv) =>
      run(argv.verbose, (log) => {
        const mustGather = open(argv.path, log);
        const { items, skipped } = mustGather.resources({
          kind: argv.kind,
          group: argv.group,
          namespace: argv.namespace,
        });
        for (const name of resourceNames(items)) {
          log.info(name);
        }
        for (const entry of skipped) {
          log.info(log.warn(`skipped ${entry.path}: ${entry.reason}`));
        }
      }),
  )
  .command(
    'locate <path> <kind>',
    'Print where a manifest or collection lives in the archive',
    (y) =>
      y
        .positional('path', { type: 'string', demandOption: true })
        .positional('kind', { type: 'string', demandOption: true })
        .option('group', { type: 'string', default: 'core', describe: 'API group' })
        .option('namespace', { alias: 'n', type: 'string', describe: 'Namespace; cluster-scoped when omitted' })
        .option('name', { type: 'string', describe: 'Resource name; the collection directory when omitted' }),
    (argv) =>
      run(argv.verbose, (log) => {
        const mustGather = open(argv.path, log);
        log.info(
          mustGather.manifestPath({
            name: argv.name,
            namespace: argv.namespace,
            kind: argv.kind,
            group: argv.group,
          }),
        );
      }),
  )
  .demandCommand(1, 'Please specify a must-gather path')
  .strict()
  .help()
  .version()
  .parse();
