/**
 * The plugin — everything hush registers with a host.
 *
 * The rule store is created and loaded by whoever boots the host,
 * then handed in here. One store per process; every command and
 * every message goes through the same instance.
 */

import { createIgnoreCommands } from './commands.js';
import { createInterceptor } from './interceptor.js';
import type { RuleStore } from './rule-store.js';
import type { PluginHost } from '../types/index.js';

export const PLUGIN_NAME = 'hush';
export const PLUGIN_VERSION = '0.1.0';

export function createHushPlugin(store: RuleStore) {
  return {
    name: PLUGIN_NAME,
    version: PLUGIN_VERSION,

    /** Interceptor first, then the /ignore commands in match order */
    register(host: PluginHost): void {
      const deps = { store, config: host.config };
      host.registerInterceptor(createInterceptor(deps));
      for (const command of createIgnoreCommands(deps)) {
        host.registerCommand(command);
      }
    },
  };
}

export type HushPlugin = ReturnType<typeof createHushPlugin>;
