/**
 * Configuration types.
 *
 * One YAML file (hush.yaml) holds both the tunables and the rule lists.
 * It is shared with whatever else edits it by hand, so hush only ever
 * rewrites the two list keys and leaves everything else alone.
 */

import type { MatchMode } from './rules.js';

/** Shape of hush.yaml after defaults are applied */
export interface HushConfig {
  plugin: {
    config_version: string;
    enabled: boolean;
  };
  phrases: {
    enabled: boolean;
    list: string[];
    match_mode: MatchMode;
    case_sensitive: boolean;
  };
  regex: {
    enabled: boolean;
    patterns: string[];
    case_sensitive: boolean;
  };
  logging: {
    /** Log every intercepted message */
    log_ignored: boolean;
    /** Log every checked message and invalid stored patterns */
    debug: boolean;
  };
  user_control: {
    /**
     * Kept as the raw string so an unknown value can fail closed
     * instead of silently becoming a whitelist.
     */
    list_type: string;
    list: string[];
  };
}

/** Tunables for one intercept decision, read fresh per message */
export interface MatchConfig {
  enabled: boolean;
  phrasesEnabled: boolean;
  matchMode: MatchMode;
  phraseCaseSensitive: boolean;
  regexEnabled: boolean;
  regexCaseSensitive: boolean;
  logIgnored: boolean;
  debug: boolean;
}

export interface PermissionConfig {
  listType: string;
  list: string[];
}

/**
 * Key/value access to host configuration.
 * Keys are dotted paths into the config file, e.g. 'phrases.match_mode'.
 * Returns undefined for anything that is not set.
 */
export interface ConfigReader {
  get(key: string): unknown;
  /**
   * Point-in-time view for reading several keys at once. Readers that
   * load from disk implement it so one snapshot costs one read.
   */
  snapshot?(): ConfigReader;
}
