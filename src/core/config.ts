/**
 * Config — schema, defaults and per-call reads of hush.yaml.
 *
 * Nothing here is cached: every read goes back to the file, so edits
 * made by hand (or by a host UI) apply to the very next message.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { parse as parseYaml } from './yaml.js';
import { MATCH_MODES } from '../types/index.js';
import type { ConfigReader, HushConfig, MatchConfig, PermissionConfig } from '../types/index.js';

export const CONFIG_VERSION = '1.0.0';

export function defaultConfig(): HushConfig {
  return {
    plugin: { config_version: CONFIG_VERSION, enabled: true },
    phrases: { enabled: true, list: [], match_mode: 'contains', case_sensitive: false },
    regex: { enabled: true, patterns: [], case_sensitive: false },
    logging: { log_ignored: true, debug: false },
    user_control: { list_type: 'whitelist', list: [] },
  };
}

const flag = (fallback: boolean) => z.boolean().catch(fallback);

/**
 * A list of entries as written by hand: strings, or numbers that
 * YAML read as numbers (user ids, digit-only phrases).
 * Anything else is dropped entry by entry, never the whole list.
 */
const entryList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
      .map(String)
  );

/** Rule lists additionally drop empty entries and repeats */
export const ruleListSchema = entryList.transform((items) =>
  [...new Set(items.filter((item) => item.length > 0))]
);

const matchModeSchema = z.enum(MATCH_MODES).catch('contains');

/** Missing means whitelist; anything else is passed through for the gate to judge */
const listTypeSchema = z.unknown().transform((value) =>
  value === undefined ? 'whitelist' : String(value)
);

const defaults = defaultConfig();

export const configSchema = z.object({
  plugin: z.object({
    config_version: z.string().catch(CONFIG_VERSION),
    enabled: flag(defaults.plugin.enabled),
  }).catch(defaults.plugin),
  phrases: z.object({
    enabled: flag(defaults.phrases.enabled),
    list: ruleListSchema,
    match_mode: matchModeSchema,
    case_sensitive: flag(defaults.phrases.case_sensitive),
  }).catch(defaults.phrases),
  regex: z.object({
    enabled: flag(defaults.regex.enabled),
    patterns: ruleListSchema,
    case_sensitive: flag(defaults.regex.case_sensitive),
  }).catch(defaults.regex),
  logging: z.object({
    log_ignored: flag(defaults.logging.log_ignored),
    debug: flag(defaults.logging.debug),
  }).catch(defaults.logging),
  user_control: z.object({
    list_type: listTypeSchema,
    list: entryList,
  }).catch(defaults.user_control),
});

/**
 * Apply defaults to whatever the file held.
 * A wrong-typed value falls back to its own default; the rest is kept.
 */
export function parseConfig(raw: unknown): HushConfig {
  return configSchema.parse(raw ?? {});
}

/** The whole effective config, section by section, through any reader */
export function readEffectiveConfig(source: ConfigReader): HushConfig {
  const reader = pin(source);
  return parseConfig({
    plugin: reader.get('plugin'),
    phrases: reader.get('phrases'),
    regex: reader.get('regex'),
    logging: reader.get('logging'),
    user_control: reader.get('user_control'),
  });
}

/**
 * Walk a dotted key through nested plain objects.
 */
export function lookup(source: unknown, key: string): unknown {
  let current: unknown = source;
  for (const part of key.split('.')) {
    if (typeof current !== 'object' || current === null || Array.isArray(current)) {
      return undefined;
    }
    current = Object.getOwnPropertyDescriptor(current, part)?.value;
  }
  return current;
}

/**
 * ConfigReader over a YAML file. Every get() re-reads the file;
 * a missing or broken file reads as empty (defaults apply downstream).
 * snapshot() reads it once and answers every key from that read.
 */
export function createFileConfigReader(path: string): ConfigReader {
  return {
    get(key: string): unknown {
      return lookup(readConfigFile(path), key);
    },
    snapshot(): ConfigReader {
      return createStaticConfigReader(readConfigFile(path));
    },
  };
}

/**
 * ConfigReader over an in-memory object. Handy for hosts that keep
 * their own config store, and for tests.
 */
export function createStaticConfigReader(source: unknown): ConfigReader {
  return {
    get(key: string): unknown {
      return lookup(source, key);
    },
  };
}

function readConfigFile(path: string): unknown {
  try {
    return parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    console.warn(`[hush] config unavailable at ${path}:`, error instanceof Error ? error.message : error);
    return {};
  }
}

/** One consistent view of the reader, where it offers one */
function pin(reader: ConfigReader): ConfigReader {
  return reader.snapshot?.() ?? reader;
}

export function readMatchConfig(source: ConfigReader): MatchConfig {
  const reader = pin(source);
  return {
    enabled: flag(true).parse(reader.get('plugin.enabled')),
    phrasesEnabled: flag(true).parse(reader.get('phrases.enabled')),
    matchMode: matchModeSchema.parse(reader.get('phrases.match_mode')),
    phraseCaseSensitive: flag(false).parse(reader.get('phrases.case_sensitive')),
    regexEnabled: flag(true).parse(reader.get('regex.enabled')),
    regexCaseSensitive: flag(false).parse(reader.get('regex.case_sensitive')),
    logIgnored: flag(true).parse(reader.get('logging.log_ignored')),
    debug: flag(false).parse(reader.get('logging.debug')),
  };
}

export function readPermissionConfig(source: ConfigReader): PermissionConfig {
  const reader = pin(source);
  return {
    listType: listTypeSchema.parse(reader.get('user_control.list_type')),
    list: entryList.parse(reader.get('user_control.list')),
  };
}
