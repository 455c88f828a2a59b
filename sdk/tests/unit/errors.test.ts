import { describe, expect, it } from 'vitest';
import {
  OldAuthError,
  OldError,
  OldForbiddenError,
  OldNotFoundError,
  OldServerError,
  OldValidationError,
  createOldError,
} from '../../src/errors.js';
import { OldClient } from '../../src/client.js';
import { createFetchMock, jsonResponse } from '../fixtures/fetch.js';

function clientFor(response: () => Response) {
  const { fetchMock } = createFetchMock(response);
  return new OldClient({
    apiKey: 'test-key',
    baseUrl: 'https://old.example.test',
    fetch: fetchMock,
  });
}

describe('error mapping', () => {
  it('maps status codes to specialized error types', () => {
    expect(createOldError('auth', { status: 401, code: 'HTTP_401' })).toBeInstanceOf(OldAuthError);
    expect(createOldError('forbidden', { status: 403, code: 'HTTP_403' })).toBeInstanceOf(
      OldForbiddenError,
    );
    expect(createOldError('missing', { status: 404, code: 'HTTP_404' })).toBeInstanceOf(
      OldNotFoundError,
    );
    expect(createOldError('invalid', { status: 400, code: 'HTTP_400' })).toBeInstanceOf(
      OldValidationError,
    );
    expect(createOldError('invalid', { status: 422, code: 'HTTP_422' })).toBeInstanceOf(
      OldValidationError,
    );
    expect(createOldError('broken', { status: 502, code: 'HTTP_502' })).toBeInstanceOf(
      OldServerError,
    );
  });

  it('falls back to the base error for other statuses', () => {
    const error = createOldError('teapot', { status: 418, code: 'HTTP_418' });

    expect(error.constructor).toBe(OldError);
    expect(error.errors).toEqual({});
  });

  it('maps a 401 response to OldAuthError', async () => {
    const client = clientFor(() =>
      jsonResponse({ error: 'Authentication is required to access this resource.' }, 401, {
        'www-authenticate': 'Bearer',
      }),
    );

    const failure = client.listCorpora();

    await expect(failure).rejects.toBeInstanceOf(OldAuthError);
    await expect(failure).rejects.toMatchObject({
      status: 401,
      message: 'Authentication is required to access this resource.',
      headers: { 'www-authenticate': 'Bearer' },
    });
  });

  it('maps a 403 response to OldForbiddenError', async () => {
    const client = clientFor(() =>
      jsonResponse({ error: 'You are not authorized to access this resource.' }, 403),
    );

    await expect(client.createCorpus({ name: 'Stories' })).rejects.toBeInstanceOf(OldForbiddenError);
  });

  it('maps a 404 response to OldNotFoundError', async () => {
    const client = clientFor(() => jsonResponse({ error: 'There is no corpus with id 9' }, 404));

    await expect(client.getCorpus(9)).rejects.toMatchObject({
      name: 'OldNotFoundError',
      message: 'There is no corpus with id 9',
    });
  });

  it('carries field errors on validation failures', async () => {
    const client = clientFor(() =>
      jsonResponse(
        {
          errors: {
            name: 'Please enter a value',
            tags: 'There is no tag with id 4.',
          },
        },
        400,
      ),
    );

    try {
      await client.createCorpus({ name: '', tags: [4] });
      throw new Error('Expected createCorpus to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(OldValidationError);
      if (!(error instanceof OldValidationError)) return;
      expect(error.message).toBe('name: Please enter a value; tags: There is no tag with id 4.');
      expect(error.errors).toEqual({
        name: 'Please enter a value',
        tags: 'There is no tag with id 4.',
      });
    }
  });

  it('uses a generic message when the body is not JSON', async () => {
    const client = clientFor(() => new Response('Bad Gateway', { status: 502 }));

    await expect(client.listCorpusBackups()).rejects.toMatchObject({
      name: 'OldServerError',
      status: 502,
      code: 'HTTP_502',
      message: 'OLD API request failed with status 502',
    });
  });
});
