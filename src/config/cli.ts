// CLI argument parser driven by schema.json

import schema from './schema.json' with { type: 'json' };
import { ConfigError } from '../errors.ts';

export interface ConfigProperty {
  type: string;
  default?: unknown;
  env?: string;
  flag?: string;
  enum?: string[];
  minimum?: number;
  maximum?: number;
  description?: string;
}

export interface ConfigSchema {
  properties: Record<string, ConfigProperty>;
}

export interface ParsedCliFlags {
  flags: Record<string, unknown>;
  help: boolean;
}

export const CONFIG_SCHEMA: ConfigSchema = schema;

const HELP_FLAGS = new Set(['--help', '-h']);

/**
 * Parse CLI arguments based on schema flag definitions.
 * Accepts `--flag value` and `--flag=value`; anything else is rejected.
 */
export function parseCliFlags(args: readonly string[]): ParsedCliFlags {
  const flags: Record<string, unknown> = {};
  let help = false;

  const flagMap = new Map<string, { path: string; prop: ConfigProperty }>();
  for (const [path, prop] of Object.entries(CONFIG_SCHEMA.properties)) {
    if (prop.flag) {
      flagMap.set(prop.flag, { path, prop });
    }
  }

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (HELP_FLAGS.has(arg)) {
      help = true;
      i++;
      continue;
    }

    const eqIndex = arg.indexOf('=');
    let flagName: string;
    let flagValue: string | undefined;

    if (eqIndex > 0 && arg.startsWith('--')) {
      flagName = arg.substring(0, eqIndex);
      flagValue = arg.substring(eqIndex + 1);
    } else {
      flagName = arg;
      flagValue = undefined;
    }

    const entry = flagMap.get(flagName);
    if (!entry) {
      throw new ConfigError(arg.startsWith('-') ? `Unknown option: ${flagName}` : `Unexpected argument: ${arg}`);
    }

    const { path, prop } = entry;
    if (flagValue === undefined) {
      if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
        flagValue = args[i + 1];
        i++;
      } else {
        const enumHint = prop.enum ? ` [${prop.enum.join('|')}]` : '';
        throw new ConfigError(`${flagName} requires a value${enumHint}`);
      }
    }

    flags[path] = parseValue(flagValue, prop, flagName);
    i++;
  }

  return { flags, help };
}

/**
 * Parse a string value to the type the schema declares.
 * `origin` names the flag or env var in error messages.
 */
export function parseValue(value: string, prop: ConfigProperty, origin: string): string | number {
  switch (prop.type) {
    case 'integer': {
      if (!/^-?\d+$/.test(value.trim())) {
        throw new ConfigError(`Invalid integer value for ${origin}: ${value}`);
      }
      return parseInt(value, 10);
    }
    case 'number': {
      const numVal = Number(value);
      if (value.trim() === '' || isNaN(numVal)) {
        throw new ConfigError(`Invalid number value for ${origin}: ${value}`);
      }
      return numVal;
    }
    default: {
      // Enum values match case-insensitively and are stored as declared
      const declared = prop.enum?.find((allowed) => allowed.toLowerCase() === value.toLowerCase());
      return declared ?? value;
    }
  }
}

/**
 * Generate help text for config options from schema
 */
export function generateConfigHelp(): string {
  const lines: string[] = [];

  lines.push('Usage: teletext-viewer [options]');
  lines.push('');
  lines.push('Options:');

  const categories = new Map<string, Array<{ path: string; prop: ConfigProperty }>>();
  for (const [path, prop] of Object.entries(CONFIG_SCHEMA.properties)) {
    const category = path.includes('.') ? path.split('.')[0] : 'general';
    const entries = categories.get(category) ?? [];
    entries.push({ path, prop });
    categories.set(category, entries);
  }

  for (const [category, entries] of categories) {
    const categoryTitle = category.charAt(0).toUpperCase() + category.slice(1);
    lines.push(`  ${categoryTitle}:`);

    for (const { path, prop } of entries) {
      const parts: string[] = [];
      if (prop.flag) {
        parts.push(`${prop.flag} <value>`);
      }
      if (prop.env) {
        parts.push(prop.env);
      }

      let typeInfo = '';
      if (prop.enum) {
        typeInfo = ` [${prop.enum.join('|')}]`;
      } else if (prop.minimum !== undefined && prop.maximum !== undefined) {
        typeInfo = ` (${prop.minimum}-${prop.maximum})`;
      } else if (prop.type !== 'string') {
        typeInfo = ` (${prop.type})`;
      }

      const defaultStr = prop.default !== undefined ? ` (default: ${String(prop.default)})` : '';

      lines.push(`    ${parts.join(' | ')}`);
      lines.push(`      ${prop.description || path}${typeInfo}${defaultStr}`);
    }
    lines.push('');
  }

  lines.push('  --help, -h');
  lines.push('      Show this help');

  return lines.join('\n');
}
