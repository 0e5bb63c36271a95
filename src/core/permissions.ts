/**
 * Permission gate — who may change the rule lists.
 *
 * whitelist: only listed users may
 * blacklist: everyone except listed users may
 * anything else: nobody may
 */

import type { PermissionConfig } from '../types/index.js';

export function checkPermission(
  userId: string,
  config: PermissionConfig | null | undefined
): boolean {
  if (!userId || !config) return false;

  const users = new Set(config.list.map(String));

  switch (config.listType) {
    case 'whitelist':
      return users.has(userId);

    case 'blacklist':
      return !users.has(userId);

    default:
      return false;
  }
}
