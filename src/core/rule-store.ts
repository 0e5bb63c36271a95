/**
 * Rule store — the blocked phrase and pattern lists, kept in hush.yaml.
 *
 * The file is the source of truth. Reads always go back to disk, so
 * hand edits show up without a restart. Writes are read-modify-write
 * over the whole file and run one at a time through a single queue;
 * two commands landing together both survive.
 *
 * Each write goes to a temp file that is renamed over the target,
 * so the file on disk is always either the old or the new version.
 * Only `phrases.list` and `regex.patterns` are ever rewritten.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Document } from 'yaml';
import { defaultConfig, lookup, ruleListSchema } from './config.js';
import { parseEditable, setList, stringify, toPlain } from './yaml.js';
import type { MutationResult, RuleKind, RuleSet } from '../types/index.js';

/** File operations the store needs. Swappable for tests. */
export interface RuleStoreIO {
  readFile(path: string): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
  mkdir(path: string): Promise<void>;
}

export const nodeIO: RuleStoreIO = {
  readFile: (path) => readFile(path, 'utf-8'),
  writeFile: (path, data) => writeFile(path, data, 'utf-8'),
  rename: (from, to) => rename(from, to),
  remove: (path) => rm(path, { force: true }),
  mkdir: async (path) => {
    await mkdir(path, { recursive: true });
  },
};

export class RuleStoreClosedError extends Error {
  constructor() {
    super('Rule store is closed');
    this.name = 'RuleStoreClosedError';
  }
}

/** Where each list lives in the config file */
const LOCATION: Record<RuleKind, { section: string; key: string }> = {
  phrase: { section: 'phrases', key: 'list' },
  pattern: { section: 'regex', key: 'patterns' },
};

type FileState =
  | { status: 'ok'; doc: Document }
  | { status: 'missing' }
  | { status: 'unreadable'; error: unknown };

export function createRuleStore(io: RuleStoreIO = nodeIO) {
  let path: string | null = null;
  let closed = false;
  let tempCounter = 0;

  /** Tail of the write queue. Always settles, never rejects. */
  let queue: Promise<void> = Promise.resolve();

  function requirePath(): string {
    if (!path) throw new Error('Rule store not loaded. Call load() first.');
    return path;
  }

  function enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task);
    queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async function readState(file: string): Promise<FileState> {
    let text: string;
    try {
      text = await io.readFile(file);
    } catch (error) {
      if (isNotFound(error)) return { status: 'missing' };
      return { status: 'unreadable', error };
    }

    try {
      return { status: 'ok', doc: parseEditable(text) };
    } catch (error) {
      return { status: 'unreadable', error };
    }
  }

  /** Read both lists. Never throws; problems read as empty lists. */
  async function readRules(): Promise<RuleSet> {
    const file = path;
    if (!file) {
      console.warn('[hush] rules requested before load()');
      return { phrases: [], patterns: [] };
    }

    const state = await readState(file);

    if (state.status !== 'ok') {
      console.warn(
        `[hush] rules unavailable at ${file}:`,
        state.status === 'missing' ? 'file not found' : errorMessage(state.error)
      );
      return { phrases: [], patterns: [] };
    }

    return rulesFrom(state.doc);
  }

  async function persist(file: string, content: string): Promise<boolean> {
    const temp = `${file}.${process.pid}.${++tempCounter}.tmp`;
    try {
      await io.writeFile(temp, content);
      await io.rename(temp, file);
      return true;
    } catch (error) {
      console.error(`[hush] failed to write ${file}:`, errorMessage(error));
      try {
        await io.remove(temp);
      } catch (cleanupError) {
        console.error(`[hush] failed to remove ${temp}:`, errorMessage(cleanupError));
      }
      return false;
    }
  }

  function mutate(kind: RuleKind, action: 'add' | 'delete', entry: string): Promise<MutationResult> {
    if (closed) return Promise.reject(new RuleStoreClosedError());

    return enqueue(async (): Promise<MutationResult> => {
      const file = requirePath();
      if (!entry) return 'invalid';

      const state = await readState(file);
      if (state.status === 'unreadable') {
        // Unparsable: leave it for the operator to fix.
        console.error(`[hush] refusing to rewrite ${file}:`, errorMessage(state.error));
        return 'write-failed';
      }

      const doc = state.status === 'ok' ? state.doc : parseEditable(stringify(defaultConfig()));
      const items = listFrom(toPlain(doc), kind);

      if (action === 'add') {
        if (items.includes(entry)) return 'exists';
        items.push(entry);
      } else {
        const index = items.indexOf(entry);
        if (index === -1) return 'missing';
        items.splice(index, 1);
      }

      const { section, key } = LOCATION[kind];
      try {
        setList(doc, section, key, items);
      } catch (error) {
        console.error(`[hush] cannot place ${section}.${key} in ${file}:`, errorMessage(error));
        return 'write-failed';
      }

      if (!(await persist(file, doc.toString()))) return 'write-failed';
      return action === 'add' ? 'added' : 'deleted';
    });
  }

  return {
    /** Path of the backing file, null before load() */
    get path(): string | null {
      return path;
    },

    /**
     * Point the store at its file. A missing file is created with
     * default settings and empty lists. Never throws on I/O problems.
     */
    async load(file: string): Promise<RuleSet> {
      path = file;
      closed = false;

      const state = await readState(file);
      if (state.status === 'missing') {
        await enqueue(async () => {
          await io.mkdir(dirname(file));
          if (await persist(file, stringify(defaultConfig()))) {
            console.log(`[hush] created ${file}`);
          }
        }).catch((error: unknown) => {
          console.warn(`[hush] could not create ${file}:`, errorMessage(error));
        });
        return { phrases: [], patterns: [] };
      }

      if (state.status === 'unreadable') {
        console.warn(`[hush] rules unavailable at ${file}:`, errorMessage(state.error));
        return { phrases: [], patterns: [] };
      }

      return rulesFrom(state.doc);
    },

    /** Both lists, straight from disk */
    snapshot(): Promise<RuleSet> {
      return readRules();
    },

    async listPhrases(): Promise<string[]> {
      return (await readRules()).phrases;
    },

    async listPatterns(): Promise<string[]> {
      return (await readRules()).patterns;
    },

    addPhraseDetailed(phrase: string): Promise<MutationResult> {
      return mutate('phrase', 'add', phrase);
    },

    deletePhraseDetailed(phrase: string): Promise<MutationResult> {
      return mutate('phrase', 'delete', phrase);
    },

    /** Caller validates the pattern compiles; the store only stores. */
    addPatternDetailed(pattern: string): Promise<MutationResult> {
      return mutate('pattern', 'add', pattern);
    },

    deletePatternDetailed(pattern: string): Promise<MutationResult> {
      return mutate('pattern', 'delete', pattern);
    },

    async addPhrase(phrase: string): Promise<boolean> {
      return (await mutate('phrase', 'add', phrase)) === 'added';
    },

    async deletePhrase(phrase: string): Promise<boolean> {
      return (await mutate('phrase', 'delete', phrase)) === 'deleted';
    },

    async addPattern(pattern: string): Promise<boolean> {
      return (await mutate('pattern', 'add', pattern)) === 'added';
    },

    async deletePattern(pattern: string): Promise<boolean> {
      return (await mutate('pattern', 'delete', pattern)) === 'deleted';
    },

    /**
     * Wait for queued writes, then refuse new ones.
     * Reads keep working; load() reopens.
     */
    async close(): Promise<void> {
      closed = true;
      await queue;
    },
  };
}

export type RuleStore = ReturnType<typeof createRuleStore>;

function rulesFrom(doc: Document): RuleSet {
  const plain = toPlain(doc);
  return {
    phrases: listFrom(plain, 'phrase'),
    patterns: listFrom(plain, 'pattern'),
  };
}

function listFrom(plain: unknown, kind: RuleKind): string[] {
  const { section, key } = LOCATION[kind];
  return ruleListSchema.parse(lookup(plain, `${section}.${key}`));
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
