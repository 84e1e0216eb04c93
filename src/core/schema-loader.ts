import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import type { SwaggerDocument } from '../types/swagger.js';
import type { Schema } from '../types/schema.js';
import type { SchemaSource } from './config.js';
import { checkSwaggerShape } from './swagger-shape.js';
import { compileSchema } from './schema-compiler.js';
import { VERSION } from '../version.js';

const FETCH_TIMEOUT_MS = 30_000;

export interface SchemaLoadOptions {
  cacheDir: string;
  /** Ignore any cached copy and download again. */
  refresh?: boolean;
}

export interface LoadedSchema {
  source: SchemaSource;
  schema: Schema;
  fromCache: boolean;
}

export class SchemaFetchError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'SchemaFetchError';
  }
}

export class SchemaShapeError extends Error {
  constructor(
    message: string,
    public readonly errors: string[] = [],
  ) {
    super(errors.length > 0 ? `${message}: ${errors.join('; ')}` : message);
    this.name = 'SchemaShapeError';
  }
}

export function schemaCachePath(source: SchemaSource, cacheDir: string): string {
  return join(cacheDir, `${source.key}.json`);
}

export function toSwaggerDocument(data: unknown, origin: string): SwaggerDocument {
  const shape = checkSwaggerShape(data);
  if (!shape.valid) {
    throw new SchemaShapeError(`${origin} is not a Swagger document with definitions`, shape.errors);
  }
  return shape.document;
}

function parseJson(text: string, origin: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new SchemaShapeError(
      `Invalid JSON in ${origin}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

async function downloadSwagger(source: SchemaSource): Promise<string> {
  let response: Response;
  try {
    response = await fetch(source.url, {
      headers: {
        Accept: 'application/json',
        'User-Agent': `firstbase-validator/${VERSION}`,
      },
      signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
    });
  } catch (err) {
    throw new SchemaFetchError(
      `Failed to download ${source.label} from ${source.url}: ${err instanceof Error ? err.message : String(err)}`,
      err,
    );
  }

  if (!response.ok) {
    throw new SchemaFetchError(
      `${source.label} returned HTTP ${response.status}: ${response.statusText}`,
    );
  }
  return response.text();
}

/**
 * Read a source's Swagger document from the cache, or download it and write
 * the cache. The cached copy never expires; pass `refresh` to replace it.
 */
export async function loadSwaggerDocument(
  source: SchemaSource,
  options: SchemaLoadOptions,
): Promise<{ document: SwaggerDocument; fromCache: boolean }> {
  const cachePath = schemaCachePath(source, options.cacheDir);

  if (!options.refresh && existsSync(cachePath)) {
    const raw = await readFile(cachePath, 'utf-8');
    return { document: toSwaggerDocument(parseJson(raw, cachePath), cachePath), fromCache: true };
  }

  const body = await downloadSwagger(source);
  const document = toSwaggerDocument(parseJson(body, source.url), source.url);

  await mkdir(options.cacheDir, { recursive: true });
  await writeFile(cachePath, body);
  return { document, fromCache: false };
}

export async function loadSchema(
  source: SchemaSource,
  options: SchemaLoadOptions,
): Promise<LoadedSchema> {
  const { document, fromCache } = await loadSwaggerDocument(source, options);
  return { source, schema: compileSchema(document), fromCache };
}

/** Delete cached documents so the next load downloads them again. */
export async function clearSchemaCache(
  sources: readonly SchemaSource[],
  cacheDir: string,
): Promise<string[]> {
  const removed: string[] = [];
  for (const source of sources) {
    const cachePath = schemaCachePath(source, cacheDir);
    if (!existsSync(cachePath)) continue;
    await unlink(cachePath);
    removed.push(cachePath);
  }
  return removed;
}

export function isSchemaCached(source: SchemaSource, cacheDir: string): boolean {
  return existsSync(schemaCachePath(source, cacheDir));
}
