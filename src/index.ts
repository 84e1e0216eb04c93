#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { validate } from './commands/validate.js';
import { dumpSchema } from './commands/dump-schema.js';
import { listSources } from './commands/sources.js';
import { VERSION } from './version.js';

interface CliValidateOptions {
  dir?: string;
  source?: string[];
  verbose?: boolean;
  json?: boolean;
  quiet?: boolean;
  refresh?: boolean;
  strictShapes?: boolean;
  env: boolean;
}

function fail(err: unknown): never {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('firstbase-validate')
    .description('Validate firstbase JSON documents against the GS1 Swagger schemas')
    .version(VERSION);

  program
    .command('validate [files...]', { isDefault: true })
    .description('Validate JSON documents (default: every *.json in the documents directory)')
    .option('--dir <dir>', 'Documents directory (default: ./firstbase_json)')
    .option('--source <key...>', 'Only validate against these schema sources')
    .option('-v, --verbose', 'Show per-file details')
    .option('--json', 'Output results as JSON')
    .option('--quiet', 'Suppress output, exit code only')
    .option('--refresh', 'Download schemas again instead of using the cache')
    .option('--strict-shapes', 'Report non-object values where a definition is expected')
    .option('--no-env', 'Skip loading .env file')
    .action(async (files: string[], options: CliValidateOptions) => {
      try {
        const result = await validate(files, {
          dir: options.dir,
          source: options.source,
          verbose: options.verbose,
          json: options.json,
          quiet: options.quiet,
          refresh: options.refresh,
          strictShapes: options.strictShapes,
          noEnv: options.env === false,
        });
        process.exit(result.valid ? 0 : 1);
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('dump-schema <name>')
    .description('Print a schema definition from every source')
    .option('--source <key...>', 'Only look in these schema sources')
    .option('--no-env', 'Skip loading .env file')
    .action(async (name: string, options: { source?: string[]; env: boolean }) => {
      try {
        await dumpSchema(name, { source: options.source, noEnv: options.env === false });
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('sources')
    .description('List configured schema sources and cache status')
    .option('--json', 'Output as JSON')
    .option('--no-env', 'Skip loading .env file')
    .action(async (options: { json?: boolean; env: boolean }) => {
      try {
        await listSources({ json: options.json, noEnv: options.env === false });
      } catch (err) {
        fail(err);
      }
    });

  return program;
}

// Only parse when run as CLI entry point (resolves symlinked bin paths)
const selfUrl = import.meta.url;
let isDirectRun = false;
try {
  if (process.argv[1]) {
    isDirectRun = selfUrl === pathToFileURL(realpathSync(process.argv[1])).href;
  }
} catch {
  isDirectRun = false;
}
if (isDirectRun) {
  await buildProgram().parseAsync();
}
