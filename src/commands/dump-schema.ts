import chalk from 'chalk';
import { loadConfig, selectSources } from '../core/config.js';
import { loadSchema } from '../core/schema-loader.js';
import { lookupDefinition } from '../core/definition-lookup.js';

export interface DumpSchemaOptions {
  source?: string[];
  noEnv?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/** Print a definition from every configured source. Returns how many sources had it. */
export async function dumpSchema(name: string, options: DumpSchemaOptions = {}): Promise<number> {
  const config = await loadConfig({ cwd: options.cwd, noEnv: options.noEnv, env: options.env });
  const sources = selectSources(config.sources, options.source);

  let found = 0;
  for (const source of sources) {
    const { schema } = await loadSchema(source, { cacheDir: config.cacheDir });
    const lookup = lookupDefinition(schema, name);

    if (lookup.kind === 'found') {
      found++;
      console.log(`\n${chalk.bold(`[${source.label}]`)} ${lookup.fullName}:`);
      console.log(JSON.stringify(lookup.raw, null, 2));
    } else if (lookup.suggestions.length > 0) {
      console.log(`\n${chalk.bold(`[${source.label}]`)} '${name}' not found. Did you mean:`);
      for (const suggestion of lookup.suggestions) {
        console.log(`  ${suggestion}`);
      }
    } else {
      console.log(
        `\n${chalk.bold(`[${source.label}]`)} '${name}' not found in ${lookup.total} definitions.`,
      );
    }
  }
  return found;
}
