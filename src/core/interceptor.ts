/**
 * The interceptor — runs on every incoming message, before the
 * host's other handlers see it.
 *
 * Flow:
 *   1. Plugin disabled → pass
 *   2. No text → pass
 *   3. Phrase hit → stop
 *   4. Pattern hit → stop
 *   5. Otherwise → pass
 *
 * Phrases are checked first, so a message that hits both is
 * reported as a phrase block.
 */

import { readMatchConfig } from './config.js';
import { findPhraseMatch, findRegexMatch } from './match-engine.js';
import type { RuleStore } from './rule-store.js';
import type { ConfigReader, InterceptResult, InterceptorDefinition, MessageContext } from '../types/index.js';

export const REASONS = {
  phrase: 'blocked by phrase',
  pattern: 'blocked by pattern',
} as const;

export interface InterceptorDeps {
  store: RuleStore;
  config: ConfigReader;
}

const PASS: InterceptResult = [true, true, null, null, null];

const stop = (reason: string): InterceptResult => [true, false, reason, null, null];

/** First 50 characters, for logs. Counts code points, not UTF-16 units. */
export function preview(text: string): string {
  return `${Array.from(text).slice(0, 50).join('')}...`;
}

export function createInterceptor({ store, config }: InterceptorDeps): InterceptorDefinition {
  return {
    name: 'ignore_message_handler',
    description: 'Drop messages that match a blocked phrase or pattern',

    async handler(message: MessageContext): Promise<InterceptResult> {
      const settings = readMatchConfig(config);
      if (!settings.enabled) return PASS;

      const text = message.text;
      if (!text) return PASS;

      if (settings.debug) {
        console.debug(`[hush] checking message: ${preview(text)}`);
      }

      // Nothing is read from disk unless a matcher is switched on.
      if (!settings.phrasesEnabled && !settings.regexEnabled) return PASS;
      const rules = await store.snapshot();

      if (settings.phrasesEnabled) {
        const hit = findPhraseMatch(text, rules.phrases, settings.matchMode, settings.phraseCaseSensitive);
        if (hit !== null) {
          if (settings.logIgnored) {
            console.info(`[hush] phrase '${hit}' blocked message: ${preview(text)}`);
          }
          return stop(REASONS.phrase);
        }
      }

      if (settings.regexEnabled) {
        const hit = findRegexMatch(text, rules.patterns, settings.regexCaseSensitive, {
          debug: settings.debug,
        });
        if (hit !== null) {
          if (settings.logIgnored) {
            console.info(`[hush] pattern '${hit}' blocked message: ${preview(text)}`);
          }
          return stop(REASONS.pattern);
        }
      }

      return PASS;
    },
  };
}
