// Viewer configuration resolved from schema defaults, environment and CLI flags.
// Priority: cli > env > default. There is no config file.

import { Env } from '../env.ts';
import { ConfigError } from '../errors.ts';
import { type LogFormat, type LogLevel, isLogFormat, isLogLevel } from '../logging.ts';
import { GRAPHICS_PREFERENCES, type GraphicsPreference } from '../capability-detector.ts';
import { CONFIG_SCHEMA, type ConfigProperty, parseCliFlags, parseValue } from './cli.ts';

export type ConfigSource = 'default' | 'env' | 'cli';

export interface ConfigLoadResult {
  config: ViewerConfig;
  help: boolean;
}

function isGraphicsPreference(value: unknown): value is GraphicsPreference {
  return GRAPHICS_PREFERENCES.some((mode) => mode === value);
}

export class ViewerConfig {
  private data: Record<string, unknown> = {};
  private sources: Record<string, ConfigSource> = {};

  constructor(cliFlags: Record<string, unknown> = {}) {
    for (const [path, prop] of Object.entries(CONFIG_SCHEMA.properties)) {
      const { value, source } = this.resolveValue(path, prop, cliFlags);
      if (value !== undefined) {
        this.validate(path, prop, value, source);
      }
      this.data[path] = value;
      this.sources[path] = source;
    }
  }

  /**
   * Parse command line arguments and build the config from them.
   */
  static load(args: readonly string[]): ConfigLoadResult {
    const { flags, help } = parseCliFlags(args);
    return { config: new ViewerConfig(flags), help };
  }

  private resolveValue(
    path: string,
    prop: ConfigProperty,
    cliFlags: Record<string, unknown>,
  ): { value: unknown; source: ConfigSource } {
    if (prop.flag && cliFlags[path] !== undefined) {
      return { value: cliFlags[path], source: 'cli' };
    }

    if (prop.env) {
      const envVal = Env.get(prop.env);
      if (envVal !== undefined) {
        return { value: parseValue(envVal, prop, prop.env), source: 'env' };
      }
    }

    return { value: prop.default, source: 'default' };
  }

  private validate(path: string, prop: ConfigProperty, value: unknown, source: ConfigSource): void {
    const origin = source === 'cli' ? prop.flag : source === 'env' ? prop.env : path;

    if (prop.enum && !prop.enum.some((allowed) => allowed === value)) {
      throw new ConfigError(`Invalid value for ${origin}: ${String(value)} [${prop.enum.join('|')}]`);
    }
    if (typeof value === 'number') {
      if (prop.minimum !== undefined && value < prop.minimum) {
        throw new ConfigError(`${origin} must be at least ${prop.minimum}, got ${value}`);
      }
      if (prop.maximum !== undefined && value > prop.maximum) {
        throw new ConfigError(`${origin} must be at most ${prop.maximum}, got ${value}`);
      }
    }
  }

  getValue(key: string): unknown {
    return this.data[key];
  }

  getSource(key: string): ConfigSource | undefined {
    return this.sources[key];
  }

  getString(key: string, defaultValue: string): string {
    const value = this.data[key];
    return typeof value === 'string' ? value : defaultValue;
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.data[key];
    return typeof value === 'number' ? value : defaultValue;
  }

  get startPage(): number {
    return this.getNumber('page.start', 100);
  }

  get graphicsMode(): GraphicsPreference {
    const value = this.data['graphics.mode'];
    return isGraphicsPreference(value) ? value : 'auto';
  }

  get fetchTimeoutMs(): number {
    return this.getNumber('fetch.timeoutMs', 10000);
  }

  get baseUrl(): string {
    return this.getString('fetch.baseUrl', '');
  }

  get logLevel(): LogLevel {
    const value = this.getString('log.level', 'INFO');
    return isLogLevel(value) ? value : 'INFO';
  }

  get logFormat(): LogFormat {
    const value = this.data['log.format'];
    return isLogFormat(value) ? value : 'structured';
  }

  // undefined means the logger's default path
  get logFile(): string | undefined {
    const value = this.data['log.file'];
    return typeof value === 'string' ? value : undefined;
  }

  /**
   * Resolved values with their sources, one per line (logged at startup).
   */
  describe(): string {
    return Object.keys(CONFIG_SCHEMA.properties)
      .map((path) => `${path}=${String(this.data[path])} (${this.sources[path]})`)
      .join('\n');
  }
}
