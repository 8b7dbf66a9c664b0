/**
 * Environment variable access.
 *
 * Use Env.get() instead of process.env throughout the codebase so tests can
 * override values without mutating the real process environment.
 */

import process from 'node:process';

export class Env {
  private static overrides: Map<string, string | undefined> | null = null;

  /**
   * Get env var value (fresh value each call).
   * Returns undefined if the var is unset.
   */
  static get(name: string): string | undefined {
    if (this.overrides?.has(name)) {
      return this.overrides.get(name);
    }
    return process.env[name];
  }

  /**
   * Check if env var exists.
   */
  static has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Replace the visible environment for the duration of a test.
   * Names mapped to undefined read as unset even if the process has them.
   */
  static withOverrides<T>(values: Record<string, string | undefined>, fn: () => T): T {
    const previous = this.overrides;
    this.overrides = new Map(Object.entries(values));
    try {
      return fn();
    } finally {
      this.overrides = previous;
    }
  }

  /**
   * Async variant of withOverrides; the overrides stay in place until the
   * returned promise settles.
   */
  static async withOverridesAsync<T>(
    values: Record<string, string | undefined>,
    fn: () => Promise<T>,
  ): Promise<T> {
    const previous = this.overrides;
    this.overrides = new Map(Object.entries(values));
    try {
      return await fn();
    } finally {
      this.overrides = previous;
    }
  }

  /**
   * Build an override map that masks every variable not listed.
   * Detection tests use this so the host terminal cannot leak in.
   */
  static isolatedValues(values: Record<string, string | undefined>): Record<string, string | undefined> {
    const masked: Record<string, string | undefined> = {};
    for (const name of Object.keys(process.env)) {
      masked[name] = undefined;
    }
    return { ...masked, ...values };
  }
}
