/**
 * /ignore commands — manage the rule lists from chat.
 *
 * The host tries patterns top to bottom and the first match wins.
 * Each verb must be followed by whitespace, so `addr` never reads
 * as `add` with an argument of "r ...".
 */

import { readMatchConfig, readPermissionConfig } from './config.js';
import { validatePattern } from './match-engine.js';
import { checkPermission } from './permissions.js';
import type { RuleStore } from './rule-store.js';
import type {
  CommandContext,
  CommandDefinition,
  CommandResult,
  ConfigReader,
  MutationResult,
} from '../types/index.js';

export interface CommandDeps {
  store: RuleStore;
  config: ConfigReader;
}

export const HELP_TEXT = [
  '📋 Ignore list commands',
  '',
  '/ignore list - show blocked phrases and patterns',
  '/ignore add <phrase> - block a phrase',
  '/ignore addr <regex> - block a regular expression',
  '/ignore del <phrase> - unblock a phrase',
  '/ignore delr <regex> - unblock a regular expression',
  '',
  'Examples:',
  '/ignore add advert',
  '/ignore addr ^/spam.*',
  '/ignore del promo',
].join('\n');

export const MESSAGES = {
  noPermission: '❌ You do not have permission to run this command',
  usage: {
    add: '❌ Tell me which phrase to block\nUsage: /ignore add <phrase>',
    addr: '❌ Tell me which regular expression to block\nUsage: /ignore addr <regex>',
    del: '❌ Tell me which phrase to unblock\nUsage: /ignore del <phrase>',
    delr: '❌ Tell me which regular expression to unblock\nUsage: /ignore delr <regex>',
  },
  invalidPattern: (error: string) => `❌ Pattern does not compile: ${error}`,
  saveFailed: '❌ Could not save the rule list, nothing was changed',
} as const;

const ok = (summary: string): CommandResult => ({ ok: true, summary, intercept: true });
const fail = (summary: string): CommandResult => ({ ok: false, summary, intercept: true });

/** Phrase or pattern, as named in replies */
interface Subject {
  label: string;
  group: 'phrase' | 'pattern';
}

const PHRASE: Subject = { label: 'phrase', group: 'phrase' };
const PATTERN: Subject = { label: 'regular expression', group: 'pattern' };

export function createIgnoreCommands({ store, config }: CommandDeps): CommandDefinition[] {
  /**
   * Shared front half of every mutating command:
   * permission, then a non-empty argument.
   * Returns the argument, or the result to hand back.
   */
  async function prepare(
    context: CommandContext,
    subject: Subject,
    usage: string
  ): Promise<{ value: string } | { result: CommandResult }> {
    if (!checkPermission(context.userId, readPermissionConfig(config))) {
      await context.sendText(MESSAGES.noPermission);
      return { result: fail('permission denied') };
    }

    const value = context.groups[subject.group]?.trim() ?? '';
    if (!value) {
      await context.sendText(usage);
      return { result: fail('missing argument') };
    }

    return { value };
  }

  async function report(
    context: CommandContext,
    subject: Subject,
    value: string,
    outcome: MutationResult,
    usage: string
  ): Promise<CommandResult> {
    switch (outcome) {
      case 'added':
        await context.sendText(`✅ Blocked ${subject.label}: ${value}`);
        return ok(`added ${subject.group}: ${value}`);

      case 'deleted':
        await context.sendText(`✅ Unblocked ${subject.label}: ${value}`);
        return ok(`deleted ${subject.group}: ${value}`);

      case 'exists':
        await context.sendText(`⚠️ Already blocked ${subject.label}: ${value}`);
        return fail('already exists');

      case 'missing':
        await context.sendText(`⚠️ Not a blocked ${subject.label}: ${value}`);
        return fail('not found');

      case 'invalid':
        await context.sendText(usage);
        return fail('missing argument');

      case 'write-failed':
        await context.sendText(MESSAGES.saveFailed);
        return fail('save failed');
    }
  }

  return [
    {
      name: 'ignore',
      description: 'Show ignore list help',
      pattern: /^\/ignore\s*$/,
      async handler(context) {
        await context.sendText(HELP_TEXT);
        return ok('help');
      },
    },

    {
      name: 'ignore_list',
      description: 'List blocked phrases and patterns',
      pattern: /^\/ignore\s+list\s*$/,
      async handler(context) {
        const { phrases, patterns } = await store.snapshot();
        const { matchMode } = readMatchConfig(config);
        await context.sendText(renderList(phrases, patterns, matchMode));
        return ok('list');
      },
    },

    {
      name: 'ignore_add',
      description: 'Block a phrase',
      pattern: /^\/ignore\s+add\s+(?<phrase>.+)$/,
      async handler(context) {
        const prepared = await prepare(context, PHRASE, MESSAGES.usage.add);
        if ('result' in prepared) return prepared.result;
        const outcome = await store.addPhraseDetailed(prepared.value);
        return report(context, PHRASE, prepared.value, outcome, MESSAGES.usage.add);
      },
    },

    {
      name: 'ignore_addr',
      description: 'Block a regular expression',
      pattern: /^\/ignore\s+addr\s+(?<pattern>.+)$/,
      async handler(context) {
        const prepared = await prepare(context, PATTERN, MESSAGES.usage.addr);
        if ('result' in prepared) return prepared.result;

        const validation = validatePattern(prepared.value);
        if (!validation.valid) {
          await context.sendText(MESSAGES.invalidPattern(validation.error));
          return fail('invalid pattern');
        }

        const outcome = await store.addPatternDetailed(prepared.value);
        return report(context, PATTERN, prepared.value, outcome, MESSAGES.usage.addr);
      },
    },

    {
      name: 'ignore_del',
      description: 'Unblock a phrase',
      pattern: /^\/ignore\s+del\s+(?<phrase>.+)$/,
      async handler(context) {
        const prepared = await prepare(context, PHRASE, MESSAGES.usage.del);
        if ('result' in prepared) return prepared.result;
        const outcome = await store.deletePhraseDetailed(prepared.value);
        return report(context, PHRASE, prepared.value, outcome, MESSAGES.usage.del);
      },
    },

    {
      name: 'ignore_delr',
      description: 'Unblock a regular expression',
      pattern: /^\/ignore\s+delr\s+(?<pattern>.+)$/,
      async handler(context) {
        const prepared = await prepare(context, PATTERN, MESSAGES.usage.delr);
        if ('result' in prepared) return prepared.result;
        const outcome = await store.deletePatternDetailed(prepared.value);
        return report(context, PATTERN, prepared.value, outcome, MESSAGES.usage.delr);
      },
    },
  ];
}

/**
 * Numbered listing of both sections, `(empty)` for an empty one.
 */
export function renderList(phrases: string[], patterns: string[], matchMode: string): string {
  const numbered = (items: string[]) =>
    items.length > 0
      ? items.map((item, i) => `  ${i + 1}. ${item}`)
      : ['  (empty)'];

  return [
    '📋 Ignore list',
    '',
    `Phrases (mode: ${matchMode})`,
    ...numbered(phrases),
    '',
    'Regular expressions',
    ...numbered(patterns),
  ].join('\n');
}
