import type { Schema } from '../types/schema.js';
import { PREFERRED_NAMESPACE } from './schema-index.js';

export const ROOT_ENTITY = 'TradeItem';

/** First definition named `*.<entity>` inside the preferred namespace. */
export function findRootDefinition(
  schema: Schema,
  entity: string = ROOT_ENTITY,
  marker: string = PREFERRED_NAMESPACE,
): string | undefined {
  for (const name of schema.definitions.keys()) {
    if (name.endsWith(`.${entity}`) && name.includes(marker)) return name;
  }
  return undefined;
}
