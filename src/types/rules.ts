/**
 * Rule types — what hush blocks.
 *
 * Two flat lists live in the config file:
 *   phrases:  literal text, compared according to a match mode
 *   patterns: regular expression sources, searched anywhere in the message
 *
 * Both lists keep insertion order, never contain empty strings
 * and never contain the same entry twice.
 */

/**
 * How a phrase is compared against message text.
 * - 'contains':   phrase appears anywhere (default)
 * - 'exact':      whole message equals the phrase
 * - 'startswith': message begins with the phrase
 * - 'endswith':   message ends with the phrase
 */
export type MatchMode = 'contains' | 'exact' | 'startswith' | 'endswith';

export const MATCH_MODES = ['contains', 'exact', 'startswith', 'endswith'] as const satisfies readonly MatchMode[];

export interface RuleSet {
  phrases: string[];
  patterns: string[];
}

export type RuleKind = 'phrase' | 'pattern';

/** Outcome of a single add/delete against the rule store */
export type MutationResult =
  | 'added'
  | 'deleted'
  /** add: entry already present */
  | 'exists'
  /** delete: entry not present */
  | 'missing'
  /** empty entry */
  | 'invalid'
  /** the file could not be read back or replaced; nothing changed */
  | 'write-failed';

export type PatternValidation =
  | { valid: true }
  | { valid: false; error: string };
