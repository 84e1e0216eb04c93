import { resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig, selectSources } from '../core/config.js';
import { clearSchemaCache, loadSchema, type LoadedSchema } from '../core/schema-loader.js';
import { findRootDefinition, ROOT_ENTITY } from '../core/root-definition.js';
import { StructuralValidator } from '../core/structural-validator.js';
import { createEntryPointPlan, validateFiles } from '../core/document-runner.js';
import { buildSourceReport, sourcePassed, type SourceReport } from '../core/report.js';
import { isDirectory, listJsonFiles } from '../utils/fs.js';
import { icons, rule, status } from '../utils/output.js';

export interface ValidateOptions {
  dir?: string;
  source?: string[];
  verbose?: boolean;
  json?: boolean;
  quiet?: boolean;
  refresh?: boolean;
  strictShapes?: boolean;
  noEnv?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ValidateRunResult {
  valid: boolean;
  files: number;
  sources: SourceReport[];
}

export class ValidateCommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidateCommandError';
  }
}

async function collectFiles(args: string[], documentsDir: string, cwd: string): Promise<string[]> {
  const jsonArgs = args.filter((file) => file.endsWith('.json'));
  if (jsonArgs.length > 0) {
    return jsonArgs.map((file) => resolve(cwd, file));
  }
  if (!(await isDirectory(documentsDir))) {
    throw new ValidateCommandError(`${documentsDir} not found.`);
  }
  return listJsonFiles(documentsDir);
}

export function printSummary(report: SourceReport, verbose = false): void {
  console.log(`\n${rule('=')}`);
  console.log(`  ${chalk.bold(report.label)}`);
  console.log(rule('='));
  console.log(`Files validated : ${report.files}`);
  console.log(`Valid           : ${report.valid}`);
  console.log(`With issues     : ${report.withIssues}`);

  if (verbose) {
    console.log(`\n${rule()}`);
    const documents = [...report.documents].sort((a, b) =>
      a.file < b.file ? -1 : a.file > b.file ? 1 : 0,
    );
    for (const doc of documents) {
      console.log(`  ${status(doc.valid)} ${doc.file}`);
      for (const issue of doc.issues) {
        console.log(`    ${chalk.yellow(issue.category)} ${issue.path}: ${issue.message}`);
      }
    }
  }

  if (report.patterns.length > 0) {
    console.log(`\n${rule()}`);
    console.log('ISSUE PATTERNS (unique path + message, count = files affected):');
    console.log(rule());
    for (const { pattern, count } of report.patterns) {
      console.log(`  ${String(count).padStart(4)}x  ${pattern}`);
    }
  } else {
    console.log(`\n${icons.success} All ${report.files} files passed validation.`);
  }
}

export async function validate(
  fileArgs: string[] = [],
  options: ValidateOptions = {},
): Promise<ValidateRunResult> {
  const cwd = options.cwd ?? process.cwd();
  const showText = !options.json && !options.quiet;
  const config = await loadConfig({
    cwd,
    noEnv: options.noEnv,
    env: options.env,
    documentsDir: options.dir,
  });
  const sources = selectSources(config.sources, options.source);

  if (options.refresh) {
    const removed = await clearSchemaCache(sources, config.cacheDir);
    if (showText && removed.length > 0) {
      console.log(chalk.dim(`Removed ${removed.length} cached schema(s)`));
    }
  }

  const files = await collectFiles(fileArgs, config.documentsDir, cwd);
  if (files.length === 0) {
    throw new ValidateCommandError('No JSON files to validate.');
  }

  const reports: SourceReport[] = [];
  for (const source of sources) {
    const spinner = showText ? ora(`Loading ${source.label}...`).start() : null;
    let loaded: LoadedSchema;
    try {
      loaded = await loadSchema(source, { cacheDir: config.cacheDir });
    } catch (err) {
      spinner?.fail(`Failed to load ${source.label}`);
      throw err;
    }
    spinner?.stop();

    const { schema } = loaded;
    const rootDefinition = findRootDefinition(schema);
    if (!rootDefinition) {
      throw new ValidateCommandError(`${ROOT_ENTITY} not found in ${source.label}`);
    }
    const rootProperties = schema.definitions.get(rootDefinition)?.properties.size ?? 0;

    if (showText) {
      console.log(
        `${source.label}: ${schema.definitions.size} definitions, ${ROOT_ENTITY} has ${rootProperties} properties`,
      );
      if (reports.length === 0) console.log(`Validating ${files.length} files...`);
    }

    const validator = new StructuralValidator(schema, { strictShapes: options.strictShapes });
    const results = await validateFiles(validator, createEntryPointPlan(rootDefinition), files);
    const report = buildSourceReport(
      {
        source: source.key,
        label: source.label,
        definitions: schema.definitions.size,
        rootDefinition,
        rootProperties,
      },
      results,
    );
    reports.push(report);

    if (showText) printSummary(report, options.verbose);
  }

  const result: ValidateRunResult = {
    valid: reports.every(sourcePassed),
    files: files.length,
    sources: reports,
  };
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  }
  return result;
}
