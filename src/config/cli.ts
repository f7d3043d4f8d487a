// Command line flags and help text, both derived from schema.json

import { ConfigError } from '../errors.ts';
import { type ConfigProperty, schemaEntries } from './schema.ts';

export interface ParsedCliFlags {
  /** Flag values keyed by schema path */
  flags: Record<string, unknown>;
  /** Positional arguments and flags the schema does not know */
  remaining: string[];
}

interface FlagTarget {
  path: string;
  prop: ConfigProperty;
}

function flagTargets(): Map<string, FlagTarget> {
  const targets = new Map<string, FlagTarget>();
  for (const [path, prop] of schemaEntries()) {
    if (prop.flag) {
      targets.set(prop.flag, { path, prop });
    }
  }
  return targets;
}

function enumSuffix(prop: ConfigProperty): string {
  return prop.enum ? ` [${prop.enum.join('|')}]` : '';
}

/**
 * Split `--name=value` into its parts; anything else is returned as a bare name.
 */
function splitArg(arg: string): [name: string, inline: string | undefined] {
  const eq = arg.indexOf('=');
  if (!arg.startsWith('--') || eq <= 0) {
    return [arg, undefined];
  }
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}

function convert(flag: string, raw: string, prop: ConfigProperty): unknown {
  if (prop.type === 'boolean') {
    return raw === 'true' || raw === '1';
  }

  if (prop.type === 'integer' || prop.type === 'number') {
    const n = prop.type === 'integer' ? parseInt(raw, 10) : parseFloat(raw);
    if (Number.isNaN(n)) {
      throw new ConfigError(`Invalid ${prop.type} value for ${flag}: ${raw}`);
    }
    const tooLow = prop.minimum !== undefined && n < prop.minimum;
    const tooHigh = prop.maximum !== undefined && n > prop.maximum;
    if (tooLow || tooHigh) {
      throw new ConfigError(`${flag} must be between ${prop.minimum ?? '-inf'} and ${prop.maximum ?? 'inf'}: ${raw}`);
    }
    return n;
  }

  if (!prop.enum) {
    return raw;
  }
  // Enum values match case-insensitively and are stored in their schema spelling
  const wanted = raw.toLowerCase();
  const option = prop.enum.find(candidate => candidate.toLowerCase() === wanted);
  if (option === undefined) {
    throw new ConfigError(`Invalid value for ${flag}: ${raw}${enumSuffix(prop)}`);
  }
  return option;
}

/**
 * Pull schema flags out of `args`. A value comes from `--flag=value` or from
 * the next argument unless that one is itself a `--` flag. Boolean flags take
 * no value.
 * @throws ConfigError for a missing or invalid flag value
 */
export function parseCliFlags(args: string[]): ParsedCliFlags {
  const targets = flagTargets();
  const flags: Record<string, unknown> = {};
  const remaining: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const [name, inline] = splitArg(args[i]);
    const target = targets.get(name);
    if (!target) {
      remaining.push(args[i]);
      continue;
    }

    const { path, prop } = target;
    if (prop.type === 'boolean') {
      flags[path] = !prop.flagInverted;
      continue;
    }

    let raw = inline;
    if (raw === undefined) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ConfigError(`${name} requires a value${enumSuffix(prop)}`);
      }
      raw = next;
      i++;
    }
    flags[path] = convert(name, raw, prop);
  }

  return { flags, remaining };
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function flagLabel(flag: string, prop: ConfigProperty): string {
  return prop.type === 'boolean' ? flag : `${flag} <value>`;
}

/** Every schema key grouped by its first path segment, for `--help-config` */
export function generateConfigHelp(): string {
  const groups = new Map<string, Array<[string, ConfigProperty]>>();
  for (const entry of schemaEntries()) {
    const dot = entry[0].indexOf('.');
    const group = dot === -1 ? 'general' : entry[0].slice(0, dot);
    groups.set(group, [...(groups.get(group) ?? []), entry]);
  }

  const out = ['Configuration Options:', ''];
  for (const group of [...groups.keys()].sort()) {
    out.push(`  ${capitalize(group)}:`);
    for (const [path, prop] of groups.get(group) ?? []) {
      const names = [prop.flag && flagLabel(prop.flag, prop), prop.env].filter(Boolean);
      const kind = prop.enum ? enumSuffix(prop) : prop.type === 'boolean' ? '' : ` (${prop.type})`;
      const fallback = prop.default === undefined || prop.default === '' ? '' : ` (default: ${String(prop.default)})`;
      const inverted = prop.envInverted ? ' [inverted]' : '';

      out.push(`    ${names.length > 0 ? names.join(' | ') : `[config: ${path}]`}`);
      out.push(`      ${prop.description || path}${kind}${fallback}${inverted}`);
    }
    out.push('');
  }
  return out.join('\n');
}

/** One line per flag, sorted, for `--help` */
export function generateFlagHelp(): string {
  const rows = schemaEntries()
    .flatMap(([, prop]) => (prop.flag ? [{ flag: prop.flag, prop }] : []))
    .sort((a, b) => a.flag.localeCompare(b.flag))
    .map(({ flag, prop }) => {
      const env = prop.env ? ` (env: ${prop.env})` : '';
      return `  ${flagLabel(flag, prop).padEnd(22)} ${prop.description ?? ''}${env}`;
    });
  return ['Options:', ...rows].join('\n');
}

/** Environment variables the schema reads, for `--help-env` */
export function generateEnvVarHelp(): string {
  const out = ['Environment Variables:', ''];
  const entries = schemaEntries()
    .flatMap(([, prop]) => (prop.env ? [{ env: prop.env, prop }] : []))
    .sort((a, b) => a.env.localeCompare(b.env));

  for (const { env, prop } of entries) {
    let accepts = '';
    if (prop.enum) {
      accepts = enumSuffix(prop);
    } else if (prop.type === 'boolean') {
      accepts = ' [true|false|1|0]';
    } else if (prop.type !== 'string') {
      accepts = ` (${prop.type})`;
    }
    const inverted = prop.envInverted ? ' [set to disable]' : '';
    out.push(`  ${env}`, `    ${prop.description ?? ''}${accepts}${inverted}`);
  }
  return out.join('\n');
}
