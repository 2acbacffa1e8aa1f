/**
 * @vezor/hono — Vezor middleware for Hono
 *
 * @example
 * ```ts
 * import { Hono } from 'hono';
 * import { vezor } from '@vezor/hono';
 *
 * const app = new Hono();
 *
 * app.use(vezor({ group: 'production-api' }));
 *
 * app.get('/', (c) => {
 *   const dbUrl = c.get('secrets').DATABASE_URL;
 *   return c.json({ ok: true });
 * });
 * ```
 */

import type { MiddlewareHandler } from 'hono';
import type { VezorClient, VezorDefaults } from '@vezor/sdk-node';
import { createClient } from '@vezor/sdk-node';

export interface VezorHonoConfig extends VezorDefaults {
  /** Group whose secrets are pulled. */
  group: string;
  /** Existing client. When set, the connection settings above are ignored. */
  client?: VezorClient;
}

export interface VezorInjectConfig extends VezorHonoConfig {
  /** Replace variables that are already set. Default: false. */
  overwrite?: boolean;
}

// Augment Hono context
declare module 'hono' {
  interface ContextVariableMap {
    secrets: Record<string, string>;
  }
}

function clientFor(config: VezorHonoConfig): VezorClient {
  const { group: _group, client, ...defaults } = config;
  return client ?? createClient(defaults);
}

/**
 * Hono middleware that pulls a group's secrets and sets them on
 * `c.get('secrets')`.
 *
 * Secrets are pulled on every request. Failures are logged and rethrown
 * to Hono's error handler.
 */
export function vezor(config: VezorHonoConfig): MiddlewareHandler {
  const client = clientFor(config);

  return async (c, next) => {
    try {
      const { secrets } = await client.pullGroupSecrets(config.group, 'json');
      c.set('secrets', secrets ?? {});
    } catch (err) {
      console.warn(
        `[vezor] Failed to pull secrets for group "${config.group}": ${err instanceof Error ? err.message : String(err)}`,
      );
      throw err;
    }
    await next();
  };
}

/**
 * One-shot: pull a group's secrets into process.env.
 * Call at app startup before routes are registered.
 */
export async function inject(config: VezorInjectConfig): Promise<number> {
  const count = await clientFor(config).injectIntoEnv(config.group, {
    overwrite: config.overwrite ?? false,
  });

  console.log(`[vezor] Injected ${count} secrets from group "${config.group}"`);
  return count;
}

export type { VezorHonoConfig as Config };
