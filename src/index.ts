/**
 * hush — message filter for chat bots.
 *
 * Entry point. Loads the rule store, registers the plugin with the
 * HTTP bridge host, starts the server. One process, one port.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { resolve } from 'node:path';

import { createFileConfigReader } from './core/config.js';
import { createRuleStore } from './core/rule-store.js';
import { createHushPlugin } from './core/plugin.js';
import { createHttpHost } from './server/host.js';
import { createAPI } from './server/api.js';

const CONFIG_PATH = process.env.HUSH_CONFIG_PATH ?? resolve(process.cwd(), 'hush.yaml');
const HOST = process.env.HUSH_HOST ?? '0.0.0.0';
const PORT = Number(process.env.HUSH_PORT ?? 3000);
const ADMIN_TOKEN = process.env.HUSH_ADMIN_TOKEN || undefined;

async function main() {
  console.log('');
  console.log('  ┌─────────────────────────┐');
  console.log('  │         h u s h          │');
  console.log('  │  message filter for bots │');
  console.log('  └─────────────────────────┘');
  console.log('');

  // 1. Load rules (creates the file on first run)
  console.log(`  config: ${CONFIG_PATH}`);
  const store = createRuleStore();
  const rules = await store.load(CONFIG_PATH);

  // 2. Register the plugin with the bridge host
  const host = createHttpHost(createFileConfigReader(CONFIG_PATH));
  const plugin = createHushPlugin(store);
  plugin.register(host);
  console.log(`  plugin: ${plugin.name} v${plugin.version}`);

  if (!ADMIN_TOKEN) {
    console.warn('  ⚠  HUSH_ADMIN_TOKEN is not set. Admin routes are disabled.');
  }

  // 3. Create server
  const app = new Hono();
  app.use('*', logger());
  app.route('/', createAPI(host, store, ADMIN_TOKEN));

  // 4. Start
  const server = serve({
    fetch: app.fetch,
    port: PORT,
    hostname: HOST,
  }, () => {
    console.log('');
    console.log(`  ✓ listening on http://${HOST}:${PORT}`);
    console.log(`  ✓ rules: ${rules.phrases.length} phrases, ${rules.patterns.length} patterns`);
    console.log(`  ✓ commands: ${host.commands.join(', ')}`);
    console.log('');
  });

  // 5. Stop: let queued rule writes finish before exiting
  const shutdown = (signal: string) => {
    console.log(`  ${signal} received, shutting down`);
    server.close();
    store.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Failed to flush rule store:', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('Failed to start hush:', error);
  process.exit(1);
});
