/**
 * API routes for hush.
 *
 * Two audiences, two prefixes:
 *   /api/messages  — the bot framework (every incoming message)
 *   /api/admin/*   — operators (token-protected, read-only)
 */

import { Hono } from 'hono';
import { createMiddleware } from 'hono/factory';
import { z } from 'zod';
import { readEffectiveConfig } from '../core/config.js';
import { PLUGIN_VERSION } from '../core/plugin.js';
import type { RuleStore } from '../core/rule-store.js';
import type { HttpHost } from './host.js';

const messageSchema = z.object({
  userId: z
    .union([z.string(), z.number()])
    .optional()
    .transform((value) => (value === undefined ? '' : String(value))),
  text: z
    .string()
    .nullable()
    .optional()
    .transform((value) => value ?? null),
});

export function createAPI(host: HttpHost, store: RuleStore, adminToken: string | undefined) {
  const api = new Hono();

  // ── Bot framework routes ───────────────────────────────

  /** Run commands and interceptors for one incoming message */
  api.post('/api/messages', async (c) => {
    const body: unknown = await c.req.json().catch(() => undefined);
    const parsed = messageSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Expected { userId?, text? }' }, 400);
    }

    const result = await host.dispatch(parsed.data);
    return c.json(result);
  });

  // ── Admin routes ───────────────────────────────────────

  /** Middleware: check admin token */
  const adminAuth = createMiddleware(async (c, next) => {
    if (!adminToken) {
      return c.json({ error: 'Admin API disabled: HUSH_ADMIN_TOKEN is not set' }, 503);
    }
    const token = c.req.header('Authorization')?.replace('Bearer ', '');
    if (token !== adminToken) {
      return c.json({ error: 'Unauthorized' }, 401);
    }
    await next();
  });

  /** Current rule lists, straight from the file */
  api.get('/api/admin/rules', adminAuth, async (c) => {
    const { phrases, patterns } = await store.snapshot();
    return c.json({ phrases, patterns });
  });

  /** Effective config with defaults applied */
  api.get('/api/admin/config', adminAuth, (c) => {
    return c.json({ path: store.path, config: readEffectiveConfig(host.config), commands: host.commands });
  });

  /** Health check */
  api.get('/api/health', (c) => {
    return c.json({ status: 'ok', version: PLUGIN_VERSION });
  });

  return api;
}
