import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as core from '@actions/core';
import { run } from '../run.js';

vi.mock('@actions/core', () => ({
  getInput: vi.fn(),
  info: vi.fn(),
  setSecret: vi.fn(),
  exportVariable: vi.fn(),
  setOutput: vi.fn(),
  setFailed: vi.fn(),
}));

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function jsonResponse(data: unknown, status = 200) {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function withInputs(inputs: Record<string, string>) {
  vi.mocked(core.getInput).mockImplementation((name: string) => inputs[name] ?? '');
}

describe('run()', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockFetch.mockReset();
  });

  it('masks, exports and outputs every secret in the group', async () => {
    withInputs({ token: 'test-token', group: 'production-api', 'organization-id': 'org-123' });
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ secrets: { DATABASE_URL: 'postgres://db', API_KEY: 'test-secret' } }),
    );

    await run();

    const [url, opts] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.vezor.io/api/v1/groups/production-api/secrets?format=json');
    expect(opts.headers.Authorization).toBe('Bearer test-token');
    expect(opts.headers['X-Organization-Id']).toBe('org-123');

    expect(core.setSecret).toHaveBeenCalledWith('postgres://db');
    expect(core.setSecret).toHaveBeenCalledWith('test-secret');
    expect(core.exportVariable).toHaveBeenCalledWith('DATABASE_URL', 'postgres://db');
    expect(core.exportVariable).toHaveBeenCalledWith('API_KEY', 'test-secret');
    expect(core.setOutput).toHaveBeenCalledWith('API_KEY', 'test-secret');
    expect(core.setOutput).toHaveBeenCalledWith('count', '2');
    expect(core.setFailed).not.toHaveBeenCalled();
  });

  it('filters keys and honours export-env and mask switches', async () => {
    withInputs({
      token: 'test-token',
      group: 'production-api',
      url: 'https://vezor.test',
      keys: 'API_KEY, MISSING',
      'export-env': 'false',
      mask: 'false',
    });
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ secrets: { DATABASE_URL: 'postgres://db', API_KEY: 'test-secret' } }),
    );

    await run();

    expect(mockFetch.mock.calls[0][0]).toBe(
      'https://vezor.test/api/v1/groups/production-api/secrets?format=json',
    );
    expect(core.setSecret).not.toHaveBeenCalled();
    expect(core.exportVariable).not.toHaveBeenCalled();
    expect(core.setOutput).toHaveBeenCalledTimes(2);
    expect(core.setOutput).toHaveBeenCalledWith('API_KEY', 'test-secret');
    expect(core.setOutput).toHaveBeenCalledWith('count', '1');
  });

  it('fails the step on API errors', async () => {
    withInputs({ token: 'test-token', group: 'production-api' });
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'invalid token' }, 401));

    await run();

    expect(core.setFailed).toHaveBeenCalledWith('invalid token');
    expect(core.setOutput).not.toHaveBeenCalled();
  });
});
