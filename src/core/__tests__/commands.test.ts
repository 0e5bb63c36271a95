import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createStaticConfigReader } from '../config.js';
import { createIgnoreCommands, HELP_TEXT, MESSAGES, renderList } from '../commands.js';
import { createRuleStore, nodeIO } from '../rule-store.js';
import type { RuleStore } from '../rule-store.js';
import type { CommandDefinition, CommandResult } from '../../types/index.js';

const ADMIN = '10001';

interface Invocation {
  command: string | null;
  result: CommandResult | null;
  replies: string[];
}

/** Route text the way a host does: first matching pattern wins */
async function invoke(commands: CommandDefinition[], text: string, userId = ADMIN): Promise<Invocation> {
  const replies: string[] = [];
  for (const command of commands) {
    const match = command.pattern.exec(text);
    if (!match) continue;
    const result = await command.handler({
      userId,
      text,
      groups: { ...match.groups },
      sendText: async (reply) => {
        replies.push(reply);
      },
    });
    return { command: command.name, result, replies };
  }
  return { command: null, result: null, replies };
}

describe('/ignore commands', () => {
  let dir: string;
  let store: RuleStore;
  let settings: Record<string, unknown>;
  let commands: CommandDefinition[];

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'hush-commands-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    store = createRuleStore();
    await store.load(join(dir, 'hush.yaml'));

    settings = {
      phrases: { match_mode: 'contains' },
      user_control: { list_type: 'whitelist', list: [10001] },
    };
    commands = createIgnoreCommands({ store, config: createStaticConfigReader(settings) });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('routing', () => {
    it.each([
      ['/ignore', 'ignore'],
      ['/ignore  ', 'ignore'],
      ['/ignore list', 'ignore_list'],
      ['/ignore add advert', 'ignore_add'],
      ['/ignore addr ^ad', 'ignore_addr'],
      ['/ignore del advert', 'ignore_del'],
      ['/ignore delr ^ad', 'ignore_delr'],
    ])('routes %j to %s', async (text, name) => {
      expect((await invoke(commands, text)).command).toBe(name);
    });

    it('ignores unrelated text and unknown subcommands', async () => {
      expect((await invoke(commands, 'hello')).command).toBeNull();
      expect((await invoke(commands, '/ignore purge')).command).toBeNull();
      expect((await invoke(commands, '/ignored')).command).toBeNull();
    });
  });

  describe('help', () => {
    it('replies with the help text', async () => {
      const { result, replies } = await invoke(commands, '/ignore');
      expect(replies).toEqual([HELP_TEXT]);
      expect(result).toEqual({ ok: true, summary: 'help', intercept: true });
    });
  });

  describe('list', () => {
    it('shows placeholders for empty sections', async () => {
      const { replies } = await invoke(commands, '/ignore list');
      expect(replies).toEqual([
        '📋 Ignore list\n\nPhrases (mode: contains)\n  (empty)\n\nRegular expressions\n  (empty)',
      ]);
    });

    it('numbers entries from 1 and shows the current match mode', async () => {
      await store.addPhrase('advert');
      await store.addPhrase('promo');
      await store.addPattern('^/spam.*');
      settings.phrases = { match_mode: 'exact' };

      const { replies } = await invoke(commands, '/ignore list');
      expect(replies).toEqual([
        '📋 Ignore list\n\nPhrases (mode: exact)\n  1. advert\n  2. promo\n\nRegular expressions\n  1. ^/spam.*',
      ]);
    });

    it('needs no permission', async () => {
      const { result } = await invoke(commands, '/ignore list', 'stranger');
      expect(result?.ok).toBe(true);
    });
  });

  describe('add', () => {
    it('adds a trimmed phrase', async () => {
      const { result, replies } = await invoke(commands, '/ignore add  advert ');

      expect(replies).toEqual(['✅ Blocked phrase: advert']);
      expect(result).toEqual({ ok: true, summary: 'added phrase: advert', intercept: true });
      expect(await store.listPhrases()).toEqual(['advert']);
    });

    it('keeps inner spaces', async () => {
      await invoke(commands, '/ignore add buy now');
      expect(await store.listPhrases()).toEqual(['buy now']);
    });

    it('reports an existing phrase', async () => {
      await invoke(commands, '/ignore add advert');
      const { result, replies } = await invoke(commands, '/ignore add advert');

      expect(replies).toEqual(['⚠️ Already blocked phrase: advert']);
      expect(result).toEqual({ ok: false, summary: 'already exists', intercept: true });
    });

    it('refuses users outside the whitelist', async () => {
      const { result, replies } = await invoke(commands, '/ignore add advert', 'stranger');

      expect(replies).toEqual([MESSAGES.noPermission]);
      expect(result).toEqual({ ok: false, summary: 'permission denied', intercept: true });
      expect(await store.listPhrases()).toEqual([]);
    });

    it('checks permission before the argument', async () => {
      const { replies } = await invoke(commands, '/ignore add   ', 'stranger');
      expect(replies).toEqual([MESSAGES.noPermission]);
    });

    it('shows usage for a blank argument', async () => {
      const { result, replies } = await invoke(commands, '/ignore add   ');

      expect(replies).toEqual([MESSAGES.usage.add]);
      expect(result).toEqual({ ok: false, summary: 'missing argument', intercept: true });
    });

    it('reads the permission list on every call', async () => {
      expect((await invoke(commands, '/ignore add a', 'u2')).result?.ok).toBe(false);

      settings.user_control = { list_type: 'blacklist', list: ['u3'] };
      expect((await invoke(commands, '/ignore add a', 'u2')).result?.ok).toBe(true);
      expect((await invoke(commands, '/ignore add b', 'u3')).result?.ok).toBe(false);
    });

    it('reports a failed save', async () => {
      const failing = createRuleStore({ ...nodeIO, rename: () => Promise.reject(new Error('disk full')) });
      await failing.load(join(dir, 'hush.yaml'));
      const failingCommands = createIgnoreCommands({ store: failing, config: createStaticConfigReader(settings) });

      const { result, replies } = await invoke(failingCommands, '/ignore add advert');

      expect(replies).toEqual([MESSAGES.saveFailed]);
      expect(result).toEqual({ ok: false, summary: 'save failed', intercept: true });
    });
  });

  describe('addr', () => {
    it('adds a pattern that compiles', async () => {
      const { result, replies } = await invoke(commands, '/ignore addr ^/spam.*');

      expect(replies).toEqual(['✅ Blocked regular expression: ^/spam.*']);
      expect(result).toEqual({ ok: true, summary: 'added pattern: ^/spam.*', intercept: true });
      expect(await store.listPatterns()).toEqual(['^/spam.*']);
    });

    it('rejects a pattern that does not compile before it reaches the store', async () => {
      const { result, replies } = await invoke(commands, '/ignore addr (');

      expect(replies).toEqual([
        '❌ Pattern does not compile: Invalid regular expression: /(/: Unterminated group',
      ]);
      expect(result).toEqual({ ok: false, summary: 'invalid pattern', intercept: true });
      expect(await store.listPatterns()).toEqual([]);
    });

    it('reports an existing pattern', async () => {
      await invoke(commands, '/ignore addr offer');
      const { replies } = await invoke(commands, '/ignore addr offer');
      expect(replies).toEqual(['⚠️ Already blocked regular expression: offer']);
    });

    it('shows usage for a blank argument', async () => {
      const { replies } = await invoke(commands, '/ignore addr  ');
      expect(replies).toEqual([MESSAGES.usage.addr]);
    });
  });

  describe('del', () => {
    it('deletes a phrase', async () => {
      await store.addPhrase('advert');
      const { result, replies } = await invoke(commands, '/ignore del advert');

      expect(replies).toEqual(['✅ Unblocked phrase: advert']);
      expect(result).toEqual({ ok: true, summary: 'deleted phrase: advert', intercept: true });
      expect(await store.listPhrases()).toEqual([]);
    });

    it('reports a phrase that is not blocked', async () => {
      const { result, replies } = await invoke(commands, '/ignore del promo');

      expect(replies).toEqual(['⚠️ Not a blocked phrase: promo']);
      expect(result).toEqual({ ok: false, summary: 'not found', intercept: true });
    });

    it('refuses users outside the whitelist', async () => {
      await store.addPhrase('advert');
      const { replies } = await invoke(commands, '/ignore del advert', 'stranger');

      expect(replies).toEqual([MESSAGES.noPermission]);
      expect(await store.listPhrases()).toEqual(['advert']);
    });

    it('shows usage for a blank argument', async () => {
      const { replies } = await invoke(commands, '/ignore del  ');
      expect(replies).toEqual([MESSAGES.usage.del]);
    });
  });

  describe('delr', () => {
    it('deletes a pattern, even one that no longer compiles', async () => {
      await store.addPattern('(');
      const { replies } = await invoke(commands, '/ignore delr (');

      expect(replies).toEqual(['✅ Unblocked regular expression: (']);
      expect(await store.listPatterns()).toEqual([]);
    });

    it('reports a pattern that is not blocked', async () => {
      const { replies } = await invoke(commands, '/ignore delr ^x');
      expect(replies).toEqual(['⚠️ Not a blocked regular expression: ^x']);
    });

    it('shows usage for a blank argument', async () => {
      const { replies } = await invoke(commands, '/ignore delr  ');
      expect(replies).toEqual([MESSAGES.usage.delr]);
    });
  });
});

describe('renderList', () => {
  it('renders both sections', () => {
    expect(renderList(['a'], [], 'startswith')).toBe(
      '📋 Ignore list\n\nPhrases (mode: startswith)\n  1. a\n\nRegular expressions\n  (empty)'
    );
  });
});
