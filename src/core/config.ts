import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import os from 'node:os';
import { parse as parseDotenv } from 'dotenv';

export interface SchemaSource {
  key: string;
  label: string;
  url: string;
}

export interface ValidatorConfig {
  sources: SchemaSource[];
  cacheDir: string;
  documentsDir: string;
}

export interface ConfigOptions {
  /** Directory searched for `.env`. Defaults to the working directory. */
  cwd?: string;
  envFilePath?: string;
  noEnv?: boolean;
  env?: NodeJS.ProcessEnv;
  cacheDir?: string;
  documentsDir?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const DEFAULT_SOURCES: readonly (SchemaSource & { envVar: string })[] = [
  {
    key: 'product',
    label: 'Product API (recipient)',
    url: 'https://test-productapi-firstbase.gs1.ch/docs/v01/productApi',
    envVar: 'FIRSTBASE_PRODUCT_API_URL',
  },
  {
    key: 'catalogue',
    label: 'Catalogue Item API (sender)',
    url: 'https://test-webapi-firstbase.gs1.ch:5443/docs/v01/catalogueItemApi',
    envVar: 'FIRSTBASE_CATALOGUE_API_URL',
  },
];

export const DEFAULT_DOCUMENTS_DIR = 'firstbase_json';

function validateUrlScheme(url: string, label: string): void {
  if (!url.startsWith('https://') && !url.startsWith('http://')) {
    throw new ConfigError(
      `Invalid URL scheme for ${label}: only https:// and http:// are allowed, got "${url}"`,
    );
  }
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.FIRSTBASE_VALIDATOR_HOME;
  if (explicit) {
    return explicit.startsWith('~') ? join(os.homedir(), explicit.slice(1)) : explicit;
  }
  return join(os.homedir(), '.firstbase-validator');
}

async function readEnvFile(path: string): Promise<Record<string, string>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    // No .env file
    return {};
  }
  return parseDotenv(Buffer.from(content));
}

/**
 * Resolve settings. Precedence: explicit options > `.env` > environment > defaults.
 */
export async function loadConfig(options: ConfigOptions = {}): Promise<ValidatorConfig> {
  const cwd = options.cwd ?? process.cwd();
  const fileVars = options.noEnv
    ? {}
    : await readEnvFile(options.envFilePath ?? join(cwd, '.env'));
  const env = options.env ?? process.env;
  const lookup = (name: string): string | undefined => fileVars[name] ?? env[name];

  const sources = DEFAULT_SOURCES.map(({ key, label, url, envVar }) => {
    const resolvedUrl = lookup(envVar) ?? url;
    validateUrlScheme(resolvedUrl, label);
    return { key, label, url: resolvedUrl };
  });

  const stateDir = resolveStateDir({ ...env, ...fileVars });
  const cacheDir = options.cacheDir ?? lookup('FIRSTBASE_CACHE_DIR') ?? join(stateDir, 'cache');
  const documentsDir =
    options.documentsDir ?? lookup('FIRSTBASE_JSON_DIR') ?? DEFAULT_DOCUMENTS_DIR;

  return {
    sources,
    cacheDir: resolve(cwd, cacheDir),
    documentsDir: resolve(cwd, documentsDir),
  };
}

/** Restrict sources to the requested keys, keeping configured order. */
export function selectSources(sources: SchemaSource[], keys?: string[]): SchemaSource[] {
  if (!keys || keys.length === 0) return sources;
  const unknown = keys.filter((key) => !sources.some((s) => s.key === key));
  if (unknown.length > 0) {
    const known = sources.map((s) => s.key).join(', ');
    throw new ConfigError(`Unknown schema source "${unknown[0]}" (known: ${known})`);
  }
  return sources.filter((s) => keys.includes(s.key));
}
