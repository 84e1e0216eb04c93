import chalk from 'chalk';
import { loadConfig } from '../core/config.js';
import { isSchemaCached, schemaCachePath } from '../core/schema-loader.js';
import { header, label, table, value } from '../utils/output.js';

export interface SourcesOptions {
  json?: boolean;
  noEnv?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export async function listSources(options: SourcesOptions = {}): Promise<void> {
  const config = await loadConfig({ cwd: options.cwd, noEnv: options.noEnv, env: options.env });
  const rows = config.sources.map((source) => ({
    ...source,
    cachePath: schemaCachePath(source, config.cacheDir),
    cached: isSchemaCached(source, config.cacheDir),
  }));

  if (options.json) {
    console.log(
      JSON.stringify({ cacheDir: config.cacheDir, documentsDir: config.documentsDir, sources: rows }, null, 2),
    );
    return;
  }

  console.log(header('Schema sources'));
  console.log(
    table([
      [chalk.dim('Key'), chalk.dim('Label'), chalk.dim('Cache'), chalk.dim('URL')],
      ...rows.map((row) => [
        value(row.key),
        row.label,
        row.cached ? chalk.green('cached') : chalk.dim('not cached'),
        row.url,
      ]),
    ]),
  );
  console.log(`\n${label('Cache directory:')}     ${config.cacheDir}`);
  console.log(`${label('Documents directory:')} ${config.documentsDir}`);
}
