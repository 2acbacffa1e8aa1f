import { describe, it, expect } from 'vitest';
import {
  raiseForStatus,
  VezorError,
  VezorApiError,
  VezorValidationError,
} from '../errors.js';

async function raised(res: Response): Promise<unknown> {
  return raiseForStatus(res).then(
    () => undefined,
    (err: unknown) => err,
  );
}

describe('raiseForStatus', () => {
  it('returns for 2xx responses', async () => {
    await expect(raiseForStatus(new Response('{}', { status: 201 }))).resolves.toBeUndefined();
  });

  it('skips an empty error field', async () => {
    const err = await raised(
      new Response(JSON.stringify({ error: '', message: 'key_name is required' }), { status: 400 }),
    );

    expect(err).toBeInstanceOf(VezorValidationError);
    expect(err).toHaveProperty('message', 'key_name is required');
  });

  it('ignores non-string error fields', async () => {
    const err = await raised(
      new Response(JSON.stringify({ error: { code: 409 }, message: 'conflict' }), { status: 409 }),
    );

    expect(err).toHaveProperty('message', 'conflict');
    expect(err).toHaveProperty('statusCode', 409);
  });

  it('treats a JSON array body as an empty mapping', async () => {
    const err = await raised(new Response('["a","b"]', { status: 422 }));

    expect(err).toBeInstanceOf(VezorApiError);
    expect(err).toHaveProperty('message', '["a","b"]');
    expect(err).toHaveProperty('response', {});
  });

  it('sets error names for every subclass', () => {
    const err = new VezorApiError('teapot', 418);

    expect(err).toBeInstanceOf(VezorError);
    expect(err.name).toBe('VezorApiError');
    expect(err.response).toEqual({});
    expect(err.body).toBe('');
  });
});
