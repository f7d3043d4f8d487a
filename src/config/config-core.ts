// Core configuration infrastructure: resolves schema properties from
// defaults, the config file, env vars and CLI flags.

import { readFileSync } from 'node:fs';
import { Env } from '../env.ts';
import { ensureError } from '../errors.ts';
import { getLogger } from '../logging.ts';
import { getConfigFile } from '../xdg.ts';
import { type ConfigProperty, schemaEntries } from './schema.ts';

const logger = getLogger('Config');

/**
 * Priority order (lowest to highest):
 * 1. Schema defaults
 * 2. File config (~/.config/quire/config.json)
 * 3. Env vars
 * 4. CLI flags (highest - explicit user intent)
 */
export type ConfigSource = 'default' | 'file' | 'env' | 'cli' | 'runtime';

export interface ConfigInitOptions {
  cliFlags?: Record<string, unknown>;
  /** Parsed file contents; when omitted the file at `configFile` is read */
  fileConfig?: Record<string, unknown>;
  configFile?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class ConfigCore {
  protected data: Record<string, unknown> = {};
  protected sources: Record<string, ConfigSource> = {};

  constructor(fileConfig: Record<string, unknown>, cliFlags: Record<string, unknown>) {
    const schemaKeys = new Set<string>();

    for (const [path, prop] of schemaEntries()) {
      schemaKeys.add(path);
      const { value, source } = this.resolveValue(path, prop, fileConfig, cliFlags);
      this.data[path] = value;
      this.sources[path] = source;
    }

    // Custom keys from the file are kept as-is
    for (const [path, value] of Object.entries(this.flattenObject(fileConfig))) {
      if (!schemaKeys.has(path)) {
        this.data[path] = value;
        this.sources[path] = 'file';
      }
    }
  }

  /**
   * Flatten a nested object into dot-notation keys.
   * e.g., { a: { b: 1 } } => { 'a.b': 1 }
   */
  private flattenObject(obj: Record<string, unknown>, prefix = ''): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const path = prefix ? `${prefix}.${key}` : key;
      if (isRecord(value)) {
        Object.assign(result, this.flattenObject(value, path));
      } else {
        result[path] = value;
      }
    }
    return result;
  }

  private resolveValue(
    path: string,
    prop: ConfigProperty,
    fileConfig: Record<string, unknown>,
    cliFlags: Record<string, unknown>
  ): { value: unknown; source: ConfigSource } {
    // flagInverted is applied by parseCliFlags
    if (prop.flag) {
      const flagVal = this.getPath(cliFlags, path);
      if (flagVal !== undefined) {
        return { value: flagVal, source: 'cli' };
      }
    }

    if (prop.env) {
      const envVal = Env.get(prop.env);
      if (envVal !== undefined) {
        const parsed = this.parseEnvValue(envVal, prop);
        if (parsed !== undefined) {
          return { value: prop.envInverted ? !parsed : parsed, source: 'env' };
        }
        logger.warn(`Ignoring invalid value for ${prop.env}`, { value: envVal });
      }
    }

    const fileVal = this.getPath(fileConfig, path);
    if (fileVal !== undefined) return { value: fileVal, source: 'file' };

    return { value: prop.default, source: 'default' };
  }

  private parseEnvValue(value: string, prop: ConfigProperty): unknown {
    switch (prop.type) {
      case 'boolean':
        return value === 'true' || value === '1';
      case 'integer': {
        const parsed = parseInt(value, 10);
        return isNaN(parsed) ? undefined : parsed;
      }
      case 'number': {
        const parsed = parseFloat(value);
        return isNaN(parsed) ? undefined : parsed;
      }
      default:
        if (prop.enum) {
          const match = prop.enum.find(option => option.toLowerCase() === value.toLowerCase());
          return match;
        }
        return value;
    }
  }

  private getPath(obj: Record<string, unknown>, path: string): unknown {
    // Flat keys first (CLI flags), then nested lookup (file config)
    if (path in obj) {
      return obj[path];
    }

    let current: unknown = obj;
    for (const part of path.split('.')) {
      if (!isRecord(current)) return undefined;
      current = current[part];
    }
    return current;
  }

  /**
   * Read the JSON config file. A missing file yields an empty config; an
   * unreadable or malformed one is logged and ignored.
   */
  static loadConfigFile(configPath: string = getConfigFile()): Record<string, unknown> {
    let content: string;
    try {
      content = readFileSync(configPath, 'utf8');
    } catch (error) {
      const err = ensureError(error);
      if ('code' in err && err.code === 'ENOENT') {
        return {};
      }
      logger.warn(`Could not read config file ${configPath}`, { error: err.message });
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (isRecord(parsed)) {
        return parsed;
      }
      logger.warn(`Config file ${configPath} does not contain an object`);
    } catch (error) {
      logger.warn(`Invalid JSON in config file ${configPath}`, { error: ensureError(error).message });
    }
    return {};
  }

  // Generic accessors

  getValue(path: string): unknown {
    return this.data[path];
  }

  getSource(path: string): ConfigSource | undefined {
    return this.sources[path];
  }

  has(path: string): boolean {
    return path in this.data;
  }

  /** Override a value at runtime */
  set(path: string, value: unknown): void {
    this.data[path] = value;
    this.sources[path] = 'runtime';
  }

  getString(path: string, fallback: string): string {
    const value = this.data[path];
    return typeof value === 'string' ? value : fallback;
  }

  getNumber(path: string, fallback: number): number {
    const value = this.data[path];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
  }

  getBoolean(path: string, fallback: boolean): boolean {
    const value = this.data[path];
    return typeof value === 'boolean' ? value : fallback;
  }
}
