// Typed view of schema.json

import schemaJson from './schema.json' with { type: 'json' };

/**
 * Schema property definition
 */
export interface ConfigProperty {
  type: string;
  default?: unknown;
  env?: string;
  envInverted?: boolean;
  flag?: string;
  flagInverted?: boolean;
  enum?: string[];
  minimum?: number;
  maximum?: number;
  description?: string;
}

export interface ConfigSchema {
  properties: Record<string, ConfigProperty>;
}

export const schema: ConfigSchema = schemaJson;

export function schemaEntries(): Array<[string, ConfigProperty]> {
  return Object.entries(schema.properties);
}
