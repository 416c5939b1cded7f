/**
 * Accent Table
 *
 * Locale code → display label. Built-in entries can be extended or
 * overridden from a YAML file at startup; the result is frozen.
 */

import { readFileSync, existsSync } from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, toError } from '../errors.js';
import type { AccentTable } from '../types.js';

export const FALLBACK_ACCENT_LABEL = 'Other English';

const BUILT_IN_ACCENTS: ReadonlyArray<readonly [string, string]> = [
  ['en-US', 'American'],
  ['en-GB', 'British'],
  ['en-AU', 'Australian'],
  ['en-IN', 'Indian'],
  ['en-CA', 'Canadian'],
  ['en-IE', 'Irish'],
  ['en-GB-SCT', 'Scottish'],
];

const accentFileSchema = z.object({
  accents: z.record(
    z.string().regex(/^en(-[A-Za-z0-9]+)*$/, 'accent codes must be English locale codes'),
    z.string().trim().min(1),
  ),
});

class FrozenAccentTable extends Map<string, string> {
  private sealed = false;

  seal(): this {
    this.sealed = true;
    return this;
  }

  override set(key: string, value: string): this {
    if (this.sealed) throw new TypeError('Accent table is read-only');
    return super.set(key, value);
  }

  override delete(key: string): boolean {
    if (this.sealed) throw new TypeError('Accent table is read-only');
    return super.delete(key);
  }

  override clear(): void {
    if (this.sealed) throw new TypeError('Accent table is read-only');
    super.clear();
  }
}

export function buildAccentTable(overrides: Record<string, string> = {}): AccentTable {
  const table = new FrozenAccentTable(BUILT_IN_ACCENTS);
  for (const [code, label] of Object.entries(overrides)) {
    table.set(code, label);
  }
  return table.seal();
}

export const DEFAULT_ACCENT_TABLE: AccentTable = buildAccentTable();

export function loadAccentTable(configPath?: string): AccentTable {
  if (!configPath) return DEFAULT_ACCENT_TABLE;
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Accent table file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Invalid YAML in ${configPath}: ${toError(err).message}`);
  }

  const parsed = accentFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Invalid accent table in ${configPath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`,
    );
  }

  return buildAccentTable(parsed.data.accents);
}
