import type { VezorClientConfig, VezorDefaults } from './types.js';
import { VezorClient } from './client.js';

export const DEFAULT_BASE_URL = 'https://api.vezor.io';

/**
 * Resolve client settings from explicit defaults, then VEZOR_* environment
 * variables, then the hosted API URL.
 *
 * | Field            | Variable              |
 * |------------------|-----------------------|
 * | `baseUrl`        | VEZOR_API_URL         |
 * | `token`          | VEZOR_TOKEN           |
 * | `organizationId` | VEZOR_ORGANIZATION_ID |
 * | `debug`          | VEZOR_DEBUG=true      |
 */
export function resolveConfig(
  defaults: VezorDefaults = {},
  envVars: NodeJS.ProcessEnv = process.env,
): VezorClientConfig {
  const env = (name: string): string | undefined => {
    const val = envVars[name];
    return val && val.length > 0 ? val : undefined;
  };

  return {
    baseUrl: defaults.baseUrl ?? env('VEZOR_API_URL') ?? DEFAULT_BASE_URL,
    token: defaults.token ?? env('VEZOR_TOKEN'),
    organizationId: defaults.organizationId ?? env('VEZOR_ORGANIZATION_ID'),
    debug: defaults.debug ?? env('VEZOR_DEBUG') === 'true',
  };
}

/**
 * Create a client from {@link resolveConfig}.
 *
 * @example
 * ```typescript
 * const vezor = createClient({ organizationId: 'org-uuid' });
 * const tags = await vezor.getTags();
 * ```
 */
export function createClient(
  defaults?: VezorDefaults,
  envVars?: NodeJS.ProcessEnv,
): VezorClient {
  return new VezorClient(resolveConfig(defaults, envVars));
}
