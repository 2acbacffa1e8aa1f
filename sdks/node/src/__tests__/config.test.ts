import { describe, it, expect } from 'vitest';
import { resolveConfig, createClient, DEFAULT_BASE_URL } from '../config.js';
import { VezorClient } from '../client.js';

describe('resolveConfig', () => {
  it('falls back to the hosted API with nothing set', () => {
    expect(resolveConfig({}, {})).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      token: undefined,
      organizationId: undefined,
      debug: false,
    });
  });

  it('reads VEZOR_* environment variables', () => {
    const config = resolveConfig(
      {},
      {
        VEZOR_API_URL: 'https://vezor.internal',
        VEZOR_TOKEN: 'test-token',
        VEZOR_ORGANIZATION_ID: 'org-123',
        VEZOR_DEBUG: 'true',
      },
    );

    expect(config).toEqual({
      baseUrl: 'https://vezor.internal',
      token: 'test-token',
      organizationId: 'org-123',
      debug: true,
    });
  });

  it('prefers explicit defaults over the environment', () => {
    const config = resolveConfig(
      { baseUrl: 'https://vezor.local', token: 'explicit-token' },
      { VEZOR_API_URL: 'https://vezor.internal', VEZOR_TOKEN: 'env-token' },
    );

    expect(config.baseUrl).toBe('https://vezor.local');
    expect(config.token).toBe('explicit-token');
  });

  it('treats empty variables as unset', () => {
    const config = resolveConfig({}, { VEZOR_API_URL: '', VEZOR_TOKEN: '' });

    expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(config.token).toBeUndefined();
  });
});

describe('createClient', () => {
  it('builds a client from resolved settings', () => {
    const client = createClient({ organizationId: 'org-1' }, { VEZOR_TOKEN: 'test-token' });

    expect(client).toBeInstanceOf(VezorClient);
    expect(client.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(client.token).toBe('test-token');
    expect(client.organizationId).toBe('org-1');
  });
});
